/**
 * @redup/morphology
 * Vocabulary insertion (terminal spell-out, deepest cycle first) and
 * the prosodic template that shapes the reduplicant.
 */
import type {
  LanguageDescription, SyntaxNode, Template, VocabularyEntry
} from "@redup/shared-types";
import {
  DEFAULT_VOWELS, REDUPLICANT_HEAD, REDUPLICANT_PHRASE, TemplateError, VocabularyInsertionError
} from "@redup/shared-types";
import { countNuclei, segment } from "@redup/phonology";
import { indexRules, preorder, replaceAt, terminals, treeDepth, withPhonology } from "@redup/syntax";

export interface MorphologyValidationIssue {
  ruleId: string; severity: "error"|"warning"; message: string; entityRef?: string;
}

export interface FilledReduplicant {
  tree: SyntaxNode;
  /** Exponent assigned to RED */
  reduplicant: string;
  /** Prospective exponent of the copied constituent */
  source: string;
}

// ─── Vocabulary insertion ─────────────────────────────────────────────────────

/**
 * First entry for the node's label whose features the node carries.
 * Entries are tried in source order.
 */
export function matchEntry(node: SyntaxNode, vocabulary: readonly VocabularyEntry[]): VocabularyEntry | undefined {
  return vocabulary.find(e => e.head === node.label && e.features.every(f => node.features.includes(f)));
}

/**
 * What a constituent would spell out as, without inserting anything.
 * Assigned exponents win; unmatched terminals contribute "".
 */
export function prospectivePhonology(node: SyntaxNode, vocabulary: readonly VocabularyEntry[]): string {
  return terminals(node)
    .map(({ node: t }) => t.phonology ?? matchEntry(t, vocabulary)?.phonology ?? "")
    .join("");
}

/**
 * Spell out every terminal, deepest cycle first and left to right within a
 * cycle. Returns the tree after each cycle that inserted something; the last
 * one is fully inserted. Terminals that already carry an exponent (a filled
 * RED) are left alone, so a depth holding only those adds no cycle.
 */
export function insertionCycles(tree: SyntaxNode, vocabulary: readonly VocabularyEntry[]): SyntaxNode[] {
  const cycles: SyntaxNode[] = [];
  let current = tree;
  for (let depth = treeDepth(tree); depth >= 0; depth--) {
    const targets = terminals(current).filter(t => t.depth === depth && t.node.phonology === undefined);
    if (targets.length === 0) continue;
    for (const { node, path } of targets) {
      const entry = matchEntry(node, vocabulary);
      if (!entry) throw new VocabularyInsertionError(node.label, describeMiss(node, vocabulary));
      current = replaceAt(current, path, n => withPhonology(n, entry.phonology));
    }
    cycles.push(current);
  }
  return cycles;
}

export function insertVocabulary(tree: SyntaxNode, vocabulary: readonly VocabularyEntry[]): SyntaxNode {
  const cycles = insertionCycles(tree, vocabulary);
  return cycles[cycles.length - 1] ?? tree;
}

// ─── Prosodic template ────────────────────────────────────────────────────────

/**
 * Shape copied material to the template.
 *   full        the source, unchanged
 *   bisyllabic  everything up to and including the second nucleus (no coda);
 *               with fewer than two nuclei the epenthesis vowel is appended
 *               after all available material
 * An empty source yields an empty reduplicant for either shape.
 */
export function fillTemplate(source: string, template: Template, vowels: readonly string[] = DEFAULT_VOWELS): string {
  if (!source) return "";
  if (template.shape === "full") return source;

  const vowelSet = new Set(vowels);
  const kept: string[] = [];
  let nuclei = 0;
  for (const seg of segment(source, vowels)) {
    kept.push(seg);
    if (vowelSet.has(seg)) nuclei++;
    if (nuclei === 2) break;
  }
  if (nuclei === 2) return kept.join("");

  const padded = kept.join("") + template.epenthesis;
  if (countNuclei(segment(padded, vowels), vowels) < 2) {
    throw new TemplateError(
      source,
      template.epenthesis
        ? `"${source}" cannot fill a bisyllabic template even with epenthetic "${template.epenthesis}".`
        : `"${source}" has fewer than two nuclei and no epenthesis vowel is declared.`
    );
  }
  return padded;
}

/**
 * Copy the prospective exponent of RED's sister into RED, shaped by the
 * template. Returns a new tree.
 */
export function fillReduplicant(
  tree: SyntaxNode,
  template: Template,
  vocabulary: readonly VocabularyEntry[],
  vowels: readonly string[] = DEFAULT_VOWELS
): FilledReduplicant {
  const site = preorder(tree).find(p =>
    p.node.label === REDUPLICANT_PHRASE && p.node.children[0]?.label === REDUPLICANT_HEAD
  );
  const base = site?.node.children[1];
  if (!site || !base) {
    throw new TemplateError(REDUPLICANT_PHRASE, "The tree has no reduplicant phrase to fill.");
  }
  const source = prospectivePhonology(base, vocabulary);
  let reduplicant: string;
  try {
    reduplicant = fillTemplate(source, template, vowels);
  } catch (err) {
    if (err instanceof TemplateError) {
      throw new TemplateError(base.label, `Copy of "${base.label}": ${err.message}`);
    }
    throw err;
  }
  const filled = replaceAt(tree, [...site.path, 0], red => withPhonology(red, reduplicant));
  return { tree: filled, reduplicant, source };
}

// ─── Validation ───────────────────────────────────────────────────────────────

export function validateVocabulary(description: LanguageDescription): MorphologyValidationIssue[] {
  const issues: MorphologyValidationIssue[] = [];
  const mothers = indexRules(description.phraseStructure);
  const daughters = new Set(description.phraseStructure.flatMap(r => r.daughters.map(d => d.label)));
  daughters.add(description.startLabel);

  const closed = new Set<string>();
  let previousHead: string | null = null;
  for (const [idx, entry] of description.vocabulary.entries()) {
    const ref = `${entry.head}[${entry.features.join(".")}]`;
    if (mothers.has(entry.head) || !daughters.has(entry.head)) {
      issues.push({ruleId:"MORPH_001",severity:"warning",message:`Vocabulary entry ${idx + 1} for "${entry.head}" never applies: "${entry.head}" is not a terminal.`,entityRef:ref});
    }
    if (entry.head !== previousHead) {
      if (closed.has(entry.head)) {
        issues.push({ruleId:"MORPH_002",severity:"warning",message:`Entries for "${entry.head}" are not grouped together.`,entityRef:entry.head});
      }
      if (previousHead !== null) closed.add(previousHead);
      previousHead = entry.head;
    }
    const shadow = description.vocabulary
      .slice(0, idx)
      .find(e => e.head === entry.head && e.features.every(f => entry.features.includes(f)));
    if (shadow) {
      issues.push({ruleId:"MORPH_003",severity:"warning",message:`Vocabulary entry ${idx + 1} (${ref} ↔ "${entry.phonology}") is shadowed by an earlier, less specific entry.`,entityRef:ref});
    }
  }

  const { template, vowels } = description;
  if (template.epenthesis && !vowels.includes(template.epenthesis)) {
    issues.push({ruleId:"MORPH_010",severity:"error",message:`Epenthesis "${template.epenthesis}" is not a vowel.`,entityRef:template.epenthesis});
  }
  for (const rule of description.reduplication) {
    if (rule.epenthesis && !vowels.includes(rule.epenthesis)) {
      issues.push({ruleId:"MORPH_010",severity:"error",message:`Epenthesis "${rule.epenthesis}" for "${rule.target}" is not a vowel.`,entityRef:rule.epenthesis});
    }
  }
  if (template.shape === "bisyllabic" && !template.epenthesis && description.reduplication.every(r => !r.epenthesis)) {
    issues.push({ruleId:"MORPH_011",severity:"warning",message:"Bisyllabic template without an epenthesis vowel: monosyllabic sources will fail."});
  }
  return issues;
}

// ─── Internals ────────────────────────────────────────────────────────────────

function describeMiss(node: SyntaxNode, vocabulary: readonly VocabularyEntry[]): string {
  const candidates = vocabulary.filter(e => e.head === node.label);
  if (candidates.length === 0) return `No vocabulary entry for terminal "${node.label}".`;
  return `No vocabulary entry for "${node.label}" matches features [${node.features.join(", ")}].`;
}
