import type {
  Derivation, DerivationError, DerivationSnapshot, MorphologicalSpec
} from "@redup/shared-types";

// ─── Single derivation ────────────────────────────────────────────────────────

export interface DerivationRequest {
  /** Extra features per label (a morphological specification) */
  features?: MorphologicalSpec;
  /** false derives the plain base form, skipping attachment and the template */
  reduplicate?: boolean;
  /** Attach with this reduplication rule only, instead of the first licensed site */
  ruleIndex?: number;
  /** Also capture the tree after every insertion cycle */
  cycleSnapshots?: boolean;
}

/** Called synchronously with each frozen snapshot as soon as it is taken */
export type SnapshotListener = (snapshot: DerivationSnapshot) => void;

// ─── Paradigm batch ───────────────────────────────────────────────────────────

export interface ParadigmCell {
  /** Position of the feature combination in the paradigm */
  index: number;
  /** Feature combination, e.g. "prog.past"; "elsewhere" when no features are set */
  label: string;
  spec: MorphologicalSpec;
  kind: "base" | "reduplicated";
  /** Reduplication rule used, for reduplicated cells */
  ruleIndex?: number;
}

export type DerivationOutcome =
  | { status: "ok"; cell: ParadigmCell; derivation: Derivation }
  | { status: "failed"; cell: ParadigmCell; error: DerivationError }
  /** The cell's reduplication rule finds no site for this specification */
  | { status: "unlicensed"; cell: ParadigmCell; reason: string };

export interface ParadigmResult {
  outcomes: DerivationOutcome[];
  baseWords: string[];
  reduplicatedWords: string[];
  durationMs: number;
}

export interface ParadigmOptions {
  cycleSnapshots?: boolean;
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

export interface EvaluationReport {
  passed: boolean;
  /** Produced but not expected */
  unexpected: string[];
  /** Expected but not produced */
  missing: string[];
}
