/**
 * Derive action - everything `redup derive` does after option parsing.
 * Kept free of process exits so it can run under test.
 */

import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { LanguageDescription, MorphologicalSpec } from "@redup/shared-types";
import {
  cellsFor, deriveParadigm, evaluateWords, featureSpecs, formatWordList
} from "@redup/derivation";
import type { DerivationOutcome, EvaluationReport, ParadigmCell } from "@redup/derivation";
import { renderSnapshot, snapshotFileName } from "@redup/render";
import type { RenderFormat } from "@redup/render";
import { logger } from "../utils/logger.js";

export const WORD_LIST_FILE = "all_words.txt";

const STEP_FILE = /^(base_word_\d+|redup_word_\d+_variant_\d+)_step_\d+(_FINAL)?\.(svg|txt)$/;

export interface DeriveOptions {
  output: string;
  format: RenderFormat;
  /** Derive only this specification instead of the whole paradigm */
  features?: MorphologicalSpec;
  cycles?: boolean;
}

export interface DeriveSummary {
  files: string[];
  baseWords: string[];
  reduplicatedWords: string[];
  failed: Array<Extract<DerivationOutcome, { status: "failed" }>>;
  evaluation: EvaluationReport | null;
}

export async function runDerive(description: LanguageDescription, options: DeriveOptions): Promise<DeriveSummary> {
  const outDir = resolve(options.output);
  await mkdir(outDir, { recursive: true });
  await clearPreviousOutput(outDir);

  const cells = options.features
    ? cellsFor([{ label: specLabel(options.features), spec: options.features }], description.reduplication.length)
    : undefined;
  const result = deriveParadigm(description, options.cycles ? { cycleSnapshots: true } : {}, cells);
  logger.info({ cells: result.outcomes.length, durationMs: result.durationMs }, "paradigm derived");

  const files: string[] = [];
  const failed: DeriveSummary["failed"] = [];
  // Reduplicated words are numbered on from the base words
  const baseCount = result.outcomes.filter(o => o.cell.kind === "base").length;
  let reduplicatedCount = 0;
  for (const outcome of result.outcomes) {
    if (outcome.status === "failed") {
      const { code, stage, subject, message } = outcome.error;
      logger.warn({ cell: cellRef(outcome.cell), code, stage, subject }, message);
      failed.push(outcome);
      continue;
    }
    if (outcome.status === "unlicensed") {
      logger.debug({ cell: cellRef(outcome.cell) }, outcome.reason);
      continue;
    }
    const { snapshots } = outcome.derivation;
    const word = outcome.cell.kind === "base" ? outcome.cell.index : baseCount + reduplicatedCount++;
    for (const [step, snapshot] of snapshots.entries()) {
      const name = snapshotFileName({
        kind: outcome.cell.kind,
        word,
        ...(outcome.cell.ruleIndex !== undefined ? { variant: outcome.cell.ruleIndex } : {}),
        step,
        final: step === snapshots.length - 1,
      }, options.format);
      await writeFile(join(outDir, name), renderSnapshot(snapshot, step, options.format), "utf8");
      files.push(name);
    }
  }

  await writeFile(join(outDir, WORD_LIST_FILE), formatWordList(result.baseWords, result.reduplicatedWords), "utf8");
  files.push(WORD_LIST_FILE);

  const evaluation = description.evaluation
    ? evaluateWords([...result.baseWords, ...result.reduplicatedWords], description.evaluation)
    : null;

  return {
    files,
    baseWords: result.baseWords,
    reduplicatedWords: result.reduplicatedWords,
    failed,
    evaluation,
  };
}

// ─── Internals ────────────────────────────────────────────────────────────────

/** Remove step diagrams and the word list left by an earlier run */
async function clearPreviousOutput(outDir: string): Promise<void> {
  const stale = (await readdir(outDir)).filter(f => f === WORD_LIST_FILE || STEP_FILE.test(f));
  await Promise.all(stale.map(f => rm(join(outDir, f), { force: true })));
  if (stale.length > 0) logger.debug({ outDir, removed: stale.length }, "cleared previous output");
}

function specLabel(spec: MorphologicalSpec): string {
  const values = Object.values(spec).flat();
  return values.length > 0 ? values.join(".") : "elsewhere";
}

function cellRef(cell: ParadigmCell): string {
  return cell.kind === "base" ? `base:${cell.label}` : `redup:${cell.label}:${cell.ruleIndex ?? 0}`;
}
