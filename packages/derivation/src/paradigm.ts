/**
 * Paradigm batch: every vocabulary choice × {base, each reduplication rule}.
 *
 * Each cell is derived independently: a failure is recorded against its
 * cell and the batch carries on with the rest.
 */

import type { LanguageDescription, MorphologicalSpec, VocabularyEntry } from "@redup/shared-types";
import { DerivationError } from "@redup/shared-types";
import { buildTree, findAttachmentSite } from "@redup/syntax";
import { attachmentContext, derive } from "./pipeline.js";
import type { DerivationOutcome, ParadigmCell, ParadigmOptions, ParadigmResult } from "./types.js";

/**
 * One specification per combination of vocabulary entries (one entry per
 * head), deduplicated by the resulting feature set. Heads keep the order in
 * which they first appear in the vocabulary.
 */
export function featureSpecs(vocabulary: readonly VocabularyEntry[]): Array<{ label: string; spec: MorphologicalSpec }> {
  const byHead = new Map<string, VocabularyEntry[]>();
  for (const entry of vocabulary) {
    const group = byHead.get(entry.head) ?? [];
    group.push(entry);
    byHead.set(entry.head, group);
  }

  const seen = new Set<string>();
  const specs: Array<{ label: string; spec: MorphologicalSpec }> = [];
  for (const combo of cartesian([...byHead.values()])) {
    const spec: MorphologicalSpec = {};
    for (const entry of combo) {
      if (entry.features.length > 0) spec[entry.head] = [...entry.features];
    }
    const key = JSON.stringify(spec);
    if (seen.has(key)) continue;
    seen.add(key);
    const values = combo.flatMap(e => e.features);
    specs.push({ label: values.length > 0 ? values.join(".") : "elsewhere", spec });
  }
  return specs;
}

export function paradigmCells(description: LanguageDescription): ParadigmCell[] {
  const specs = featureSpecs(description.vocabulary);
  return cellsFor(specs, description.reduplication.length);
}

/**
 * Number of cells {@link paradigmCells} yields, counted without enumerating
 * the combinations: distinct feature sets per head, multiplied together,
 * times one base cell plus one cell per reduplication rule.
 */
export function paradigmSize(description: LanguageDescription): number {
  const choices = new Map<string, Set<string>>();
  for (const entry of description.vocabulary) {
    const set = choices.get(entry.head) ?? new Set<string>();
    set.add(JSON.stringify(entry.features));
    choices.set(entry.head, set);
  }
  let specs = 1;
  for (const set of choices.values()) specs *= set.size;
  return specs * (1 + description.reduplication.length);
}

/** Base cells for every spec, then one reduplicated cell per spec and rule */
export function cellsFor(
  specs: ReadonlyArray<{ label: string; spec: MorphologicalSpec }>,
  ruleCount: number
): ParadigmCell[] {
  const base: ParadigmCell[] = specs.map((s, index) => ({ ...s, index, kind: "base" }));
  const reduplicated: ParadigmCell[] = specs.flatMap((s, index) =>
    Array.from({ length: ruleCount }, (_unused, ruleIndex) => ({ ...s, index, kind: "reduplicated" as const, ruleIndex }))
  );
  return [...base, ...reduplicated];
}

export function deriveParadigm(
  description: LanguageDescription,
  options: ParadigmOptions = {},
  cells: readonly ParadigmCell[] = paradigmCells(description)
): ParadigmResult {
  const start = Date.now();
  const outcomes = cells.map(cell => deriveCell(description, cell, options));
  const words = (kind: ParadigmCell["kind"]) =>
    outcomes.flatMap(o => (o.status === "ok" && o.cell.kind === kind ? [o.derivation.word] : []));
  return {
    outcomes,
    baseWords: words("base"),
    reduplicatedWords: words("reduplicated"),
    durationMs: Date.now() - start,
  };
}

export function deriveCell(
  description: LanguageDescription,
  cell: ParadigmCell,
  options: ParadigmOptions = {}
): DerivationOutcome {
  try {
    if (cell.kind === "reduplicated" && cell.ruleIndex !== undefined) {
      const rule = description.reduplication[cell.ruleIndex];
      const tree = buildTree(description, { features: cell.spec, allowUnlistedTerminals: true });
      if (rule && !findAttachmentSite(tree, [rule], attachmentContext(description))) {
        const env = rule.environment ? ` in environment ${rule.environment}` : "";
        return { status: "unlicensed", cell, reason: `No "${rule.target}" node${env}.` };
      }
    }
    const derivation = derive(description, {
      features: cell.spec,
      reduplicate: cell.kind === "reduplicated",
      ...(cell.ruleIndex !== undefined ? { ruleIndex: cell.ruleIndex } : {}),
      ...(options.cycleSnapshots ? { cycleSnapshots: true } : {}),
    });
    return { status: "ok", cell, derivation };
  } catch (err) {
    if (err instanceof DerivationError) return { status: "failed", cell, error: err };
    throw err;
  }
}

/** Numbered list in the order base forms, marker line, reduplicated forms */
export function formatWordList(baseWords: readonly string[], reduplicatedWords: readonly string[]): string {
  const lines = baseWords.map((w, i) => `${i}. ${w}`);
  lines.push("--- reduplicated words ---");
  reduplicatedWords.forEach((w, i) => lines.push(`${baseWords.length + i}. ${w}`));
  return lines.join("\n") + "\n";
}

// ─── Internals ────────────────────────────────────────────────────────────────

function cartesian<T>(arrays: T[][]): T[][] {
  return arrays.reduce<T[][]>((acc, arr) => acc.flatMap(prefix => arr.map(item => [...prefix, item])), [[]]);
}
