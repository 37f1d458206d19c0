/**
 * @redup/syntax
 * Phrase-structure expansion (tree building), reduplication attachment
 * and phrase-structure validation.
 */
import type {
  LanguageDescription, MorphologicalSpec, PhraseStructureRule, ReduplicationRule, SyntaxNode
} from "@redup/shared-types";
import {
  GrammarError, NoAttachmentSiteError, REDUPLICANT_HEAD, REDUPLICANT_PHRASE
} from "@redup/shared-types";
import { isVowelInitial } from "@redup/phonology";
import { makeNode, preorder, replaceAt } from "./tree.js";
import type { TreePath } from "./tree.js";

export * from "./tree.js";

export interface SyntaxValidationIssue {
  ruleId: string; severity: "error" | "warning"; message: string; entityRef?: string;
}

export interface BuildOptions {
  /** Overrides the description's start label */
  startLabel?: string;
  /** Features added to every node with the given label */
  features?: MorphologicalSpec;
  /**
   * Accept rule-less labels that have no vocabulary entry. The derivation
   * pipeline sets this so the gap is reported by vocabulary insertion.
   */
  allowUnlistedTerminals?: boolean;
}

export interface AttachmentContext {
  /** Prospective exponent of a constituent, computed without touching the tree */
  spellOut: (node: SyntaxNode) => string;
  vowels: readonly string[];
}

export interface AttachmentSite {
  rule: ReduplicationRule;
  ruleIndex: number;
  path: TreePath;
}

export interface AttachmentVariant extends AttachmentSite {
  tree: SyntaxNode;
}

type GrammarTables = Pick<LanguageDescription, "startLabel" | "phraseStructure" | "vocabulary">;

// ─── Tree building ────────────────────────────────────────────────────────────

/**
 * Expand the start label into a tree. The first rule listed for a mother
 * is the only one ever used.
 */
export function buildTree(grammar: GrammarTables, options: BuildOptions = {}): SyntaxNode {
  const start = options.startLabel ?? grammar.startLabel;
  if (!start) throw new GrammarError("", "No start label: the phrase-structure rules are empty.");
  const rules = indexRules(grammar.phraseStructure);
  const heads = new Set(grammar.vocabulary.map(e => e.head));

  const expand = (label: string, annotated: readonly string[], path: readonly string[]): SyntaxNode => {
    if (path.includes(label)) {
      throw new GrammarError(label, `Cyclic phrase-structure rules: ${[...path, label].join(" → ")}.`);
    }
    const features = mergeFeatures(annotated, options.features?.[label] ?? []);
    const rule = rules.get(label);
    if (!rule) {
      if (!options.allowUnlistedTerminals && !heads.has(label)) {
        throw new GrammarError(label, `"${label}" has no phrase-structure rule and no vocabulary entry.`);
      }
      return makeNode(label, [], features);
    }
    const next = [...path, label];
    return makeNode(label, rule.daughters.map(d => expand(d.label, d.features, next)), features);
  };

  return expand(start, [], []);
}

/** First rule per mother, in source order */
export function indexRules(rules: readonly PhraseStructureRule[]): Map<string, PhraseStructureRule> {
  const map = new Map<string, PhraseStructureRule>();
  for (const rule of rules) {
    if (!map.has(rule.mother)) map.set(rule.mother, rule);
  }
  return map;
}

// ─── Reduplication attachment ─────────────────────────────────────────────────

/**
 * Walk the tree in pre-order; at each node try the rules in order. The first
 * node/rule pair whose environment holds is the site.
 */
export function findAttachmentSite(
  tree: SyntaxNode,
  rules: readonly ReduplicationRule[],
  ctx: AttachmentContext
): AttachmentSite | null {
  for (const { node, path } of preorder(tree)) {
    for (const [ruleIndex, rule] of rules.entries()) {
      if (rule.target !== node.label) continue;
      if (environmentHolds(rule.environment, ctx.spellOut(node), ctx.vowels)) {
        return { rule, ruleIndex, path };
      }
    }
  }
  return null;
}

/** Like {@link findAttachmentSite}, but a missing site is an error */
export function requireAttachmentSite(
  tree: SyntaxNode,
  rules: readonly ReduplicationRule[],
  ctx: AttachmentContext
): AttachmentSite {
  const site = findAttachmentSite(tree, rules, ctx);
  if (site) return site;
  const targets = rules.map(r => r.environment ? `${r.target} (${r.environment})` : r.target);
  throw new NoAttachmentSiteError(
    rules.map(r => r.target).join(",") || REDUPLICANT_PHRASE,
    targets.length === 0
      ? "No reduplication rules are defined."
      : `No node satisfies any reduplication rule: ${targets.join(", ")}.`
  );
}

/** Insert RedP above the first licensed site */
export function attachReduplicant(
  tree: SyntaxNode,
  rules: readonly ReduplicationRule[],
  ctx: AttachmentContext
): SyntaxNode {
  return attachAt(tree, requireAttachmentSite(tree, rules, ctx));
}

/**
 * One attached tree per rule that finds a site, in rule order. Each rule
 * takes its first pre-order match.
 */
export function attachmentVariants(
  tree: SyntaxNode,
  rules: readonly ReduplicationRule[],
  ctx: AttachmentContext
): AttachmentVariant[] {
  const variants: AttachmentVariant[] = [];
  rules.forEach((rule, ruleIndex) => {
    const site = findAttachmentSite(tree, [rule], ctx);
    if (site) variants.push({ rule, ruleIndex, path: site.path, tree: attachAt(tree, site) });
  });
  return variants;
}

export function attachAt(tree: SyntaxNode, site: Pick<AttachmentSite, "rule" | "path">): SyntaxNode {
  return replaceAt(tree, site.path, node => ({
    label: REDUPLICANT_PHRASE,
    children: [makeNode(REDUPLICANT_HEAD), node],
    features: [],
    environment: site.rule.environment,
  }));
}

/**
 * Environment predicates:
 *   ""          always
 *   VOWEL       constituent begins with a vowel
 *   CONSONANT   constituent begins with a consonant
 *   #xy / xy#   begins / ends with xy
 *   xy          contains xy
 */
export function environmentHolds(environment: string, form: string, vowels: readonly string[]): boolean {
  if (!environment) return true;
  if (environment === "VOWEL") return isVowelInitial(form, vowels);
  if (environment === "CONSONANT") return form.length > 0 && !isVowelInitial(form, vowels);
  if (environment.length > 1 && environment.startsWith("#")) return form.startsWith(environment.slice(1));
  if (environment.length > 1 && environment.endsWith("#")) return form.endsWith(environment.slice(0, -1));
  return form.includes(environment);
}

// ─── Validation ───────────────────────────────────────────────────────────────

export function validatePhraseStructure(description: LanguageDescription): SyntaxValidationIssue[] {
  const issues: SyntaxValidationIssue[] = [];
  const start = description.startLabel;
  if (!start) {
    issues.push({ ruleId: "SYN_001", severity: "error", message: "No start label is declared." });
    return issues;
  }
  const rules = indexRules(description.phraseStructure);
  const heads = new Set(description.vocabulary.map(e => e.head));

  const seenMothers = new Set<string>();
  description.phraseStructure.forEach((rule, idx) => {
    if (seenMothers.has(rule.mother)) {
      issues.push({
        ruleId: "SYN_002", severity: "warning",
        message: `Rule ${idx + 1} for "${rule.mother}" is shadowed by an earlier rule and never applies.`,
        entityRef: rule.mother,
      });
    }
    seenMothers.add(rule.mother);
    for (const d of rule.daughters) {
      if (d.label === REDUPLICANT_PHRASE || d.label === REDUPLICANT_HEAD) {
        issues.push({
          ruleId: "SYN_003", severity: "warning",
          message: `"${d.label}" is reserved for reduplication and should not appear in phrase-structure rules.`,
          entityRef: rule.mother,
        });
      }
    }
  });

  // Depth-first walk over the first-rule expansion to find cycles and leaves
  const reachable = new Set<string>();
  const leaves = new Set<string>();
  const onPath = new Set<string>();
  const walk = (label: string): void => {
    if (onPath.has(label)) {
      issues.push({
        ruleId: "SYN_010", severity: "error",
        message: `Cyclic phrase-structure rules through "${label}": tree building would never terminate.`,
        entityRef: label,
      });
      return;
    }
    if (reachable.has(label)) return;
    reachable.add(label);
    const rule = rules.get(label);
    if (!rule) { leaves.add(label); return; }
    onPath.add(label);
    for (const d of rule.daughters) walk(d.label);
    onPath.delete(label);
  };
  walk(start);

  for (const leaf of leaves) {
    if (!heads.has(leaf)) {
      issues.push({
        ruleId: "SYN_011", severity: "error",
        message: `Terminal "${leaf}" has no vocabulary entry.`,
        entityRef: leaf,
      });
    }
  }
  for (const mother of rules.keys()) {
    if (!reachable.has(mother)) {
      issues.push({
        ruleId: "SYN_012", severity: "warning",
        message: `Rule for "${mother}" is unreachable from the start label "${start}".`,
        entityRef: mother,
      });
    }
  }
  for (const rule of description.reduplication) {
    if (!reachable.has(rule.target)) {
      issues.push({
        ruleId: "SYN_020", severity: "error",
        message: `Reduplication target "${rule.target}" never appears in the tree.`,
        entityRef: rule.target,
      });
    }
  }
  return issues;
}

// ─── Internals ────────────────────────────────────────────────────────────────

function mergeFeatures(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}
