import type { DerivationSnapshot } from "@redup/shared-types";
import { renderAscii } from "./text.js";
import { renderSvg } from "./svg.js";

export type RenderFormat = "svg" | "txt";

export interface SnapshotFileRef {
  kind: "base" | "reduplicated";
  /** Word number; reduplicated words are numbered on after the base words */
  word: number;
  /** Attachment variant, for reduplicated words */
  variant?: number;
  step: number;
  final: boolean;
}

/**
 * `base_word_00_step_00.svg`, `redup_word_04_variant_00_step_04_FINAL.svg`;
 * steps count from 0
 */
export function snapshotFileName(ref: SnapshotFileRef, format: RenderFormat = "svg"): string {
  const prefix = ref.kind === "base"
    ? `base_word_${pad(ref.word)}`
    : `redup_word_${pad(ref.word)}_variant_${pad(ref.variant ?? 0)}`;
  return `${prefix}_step_${pad(ref.step)}${ref.final ? "_FINAL" : ""}.${format}`;
}

/** Stage heading used on every rendered snapshot */
export function snapshotTitle(snapshot: DerivationSnapshot, step: number): string {
  const cycle = snapshot.cycle !== undefined ? ` (cycle ${snapshot.cycle})` : "";
  return `Step ${step}: ${snapshot.stage}${cycle}`;
}

export function renderSnapshot(snapshot: DerivationSnapshot, step: number, format: RenderFormat): string {
  const title = snapshotTitle(snapshot, step);
  return format === "svg"
    ? renderSvg(snapshot.tree, { title })
    : `${title}\n${renderAscii(snapshot.tree)}\n`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}
