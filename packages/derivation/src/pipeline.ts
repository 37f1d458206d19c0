/**
 * Derivation Pipeline
 *
 * Runs one derivation through every stage in order:
 *   1. built         phrase-structure expansion
 *   2. attached      RedP inserted above the licensed site
 *   3. filled        RED receives the templated copy of its sister
 *   4. inserted      vocabulary insertion, deepest cycle first
 *   5. phonologized  ordered rewrite rules over the spelled-out word
 *
 * Base forms skip stages 2–3. A frozen snapshot is taken after every stage;
 * any DerivationError aborts the derivation with no partial output.
 */

import type {
  Derivation, DerivationSnapshot, DerivationStage, LanguageDescription,
  ReduplicationRule, SyntaxNode
} from "@redup/shared-types";
import { NoAttachmentSiteError } from "@redup/shared-types";
import { applyToMorphemes } from "@redup/phonology";
import {
  attachAt, buildTree, freezeTree, replaceAt, requireAttachmentSite, spelledOut, terminals, withPhonology
} from "@redup/syntax";
import type { AttachmentContext } from "@redup/syntax";
import { fillReduplicant, insertionCycles, prospectivePhonology } from "@redup/morphology";
import type { DerivationRequest, SnapshotListener } from "./types.js";

export function derive(
  description: LanguageDescription,
  request: DerivationRequest = {},
  onSnapshot?: SnapshotListener
): Derivation {
  const spec = request.features ?? {};
  const snapshots: DerivationSnapshot[] = [];
  const capture = (stage: DerivationStage, tree: SyntaxNode, cycle?: number): SyntaxNode => {
    const frozen = freezeTree(tree);
    const snapshot: DerivationSnapshot = cycle === undefined ? { stage, tree: frozen } : { stage, cycle, tree: frozen };
    snapshots.push(snapshot);
    onSnapshot?.(snapshot);
    return frozen;
  };

  // ── 1. Build ──────────────────────────────────────────────────────────────
  let tree = capture("built", buildTree(description, { features: spec, allowUnlistedTerminals: true }));

  // ── 2–3. Attach + fill ────────────────────────────────────────────────────
  let rule: ReduplicationRule | undefined;
  let reduplicant: string | undefined;
  if (request.reduplicate !== false) {
    const candidates = selectRules(description, request.ruleIndex);
    const site = requireAttachmentSite(tree, candidates, attachmentContext(description));
    rule = site.rule;
    tree = capture("attached", attachAt(tree, site));

    const template = { ...description.template, epenthesis: rule.epenthesis || description.template.epenthesis };
    const filled = fillReduplicant(tree, template, description.vocabulary, description.vowels);
    reduplicant = filled.reduplicant;
    tree = capture("filled", filled.tree);
  }

  // ── 4. Vocabulary insertion ───────────────────────────────────────────────
  const cycles = insertionCycles(tree, description.vocabulary);
  if (request.cycleSnapshots) {
    cycles.slice(0, -1).forEach((c, i) => capture("inserted", c, i));
  }
  tree = capture("inserted", cycles[cycles.length - 1] ?? tree);

  // ── 5. Phonology ──────────────────────────────────────────────────────────
  tree = capture("phonologized", phonologizeTree(tree, description));

  return {
    word: spelledOut(tree),
    spec,
    snapshots,
    ...(reduplicant !== undefined ? { reduplicant } : {}),
    ...(rule ? { rule } : {}),
  };
}

/** Dry-run spell-out used by attachment predicates */
export function attachmentContext(description: LanguageDescription): AttachmentContext {
  return {
    spellOut: node => prospectivePhonology(node, description.vocabulary),
    vowels: description.vowels,
  };
}

/**
 * Run the phonological rules over the terminals' exponents and write each
 * rewritten morpheme back to the terminal that owns it.
 */
export function phonologizeTree(tree: SyntaxNode, description: LanguageDescription): SyntaxNode {
  const leaves = terminals(tree);
  const before = leaves.map(t => t.node.phonology ?? "");
  const after = applyToMorphemes(before, description.phonology, description.vowels);
  let out = tree;
  leaves.forEach((leaf, i) => {
    const form = after[i] ?? "";
    if (form !== before[i]) out = replaceAt(out, leaf.path, n => withPhonology(n, form));
  });
  return out;
}

// ─── Internals ────────────────────────────────────────────────────────────────

function selectRules(description: LanguageDescription, ruleIndex: number | undefined): ReduplicationRule[] {
  if (ruleIndex === undefined) return description.reduplication;
  const rule = description.reduplication[ruleIndex];
  if (!rule) {
    throw new NoAttachmentSiteError(
      String(ruleIndex),
      `Reduplication rule ${ruleIndex} does not exist (${description.reduplication.length} defined).`
    );
  }
  return [rule];
}
