/**
 * Language Description Schema
 *
 * Single source of truth for the rule tables and tree values every
 * package reads. A description is loaded once and never mutated; trees
 * are rebuilt per derivation and treated as values.
 */

// ─── Syntax tree ─────────────────────────────────────────────────────────────

export interface SyntaxNode {
  /** Category symbol, e.g. "T", "Root", "RedP" */
  readonly label: string;
  /** Zero (terminal), one or two daughters */
  readonly children: readonly SyntaxNode[];
  /** Privative feature values, e.g. ["past", "3sg"] */
  readonly features: readonly string[];
  /** Exponent assigned by vocabulary insertion; absent until then */
  readonly phonology?: string;
  /** Environment of the reduplication rule that licensed this RedP */
  readonly environment?: string;
}

/** Label of the phrase introduced above a reduplication site */
export const REDUPLICANT_PHRASE = "RedP";
/** Label of the terminal that receives the copied material */
export const REDUPLICANT_HEAD = "RED";

// ─── Phrase structure ────────────────────────────────────────────────────────

export interface Daughter {
  label: string;
  /** Features annotated in the rule, e.g. T[past.3sg] → ["past","3sg"] */
  features: string[];
}

export interface PhraseStructureRule {
  mother: string;
  /** Unary or binary branching only */
  daughters: [Daughter] | [Daughter, Daughter];
}

// ─── Vocabulary ──────────────────────────────────────────────────────────────

export interface VocabularyEntry {
  /** Terminal label the entry spells out */
  head: string;
  /** Features the node must carry for the entry to apply; [] = elsewhere */
  features: string[];
  /** Phonological exponent; "" is a null exponent */
  phonology: string;
}

// ─── Reduplication ───────────────────────────────────────────────────────────

export interface ReduplicationRule {
  /** Label of the constituent RedP may dominate */
  target: string;
  /**
   * Phonological environment the copied constituent must satisfy.
   * "" | "VOWEL" | "CONSONANT" | "#xy" | "xy#" | "xy"
   */
  environment: string;
  /** Epenthesis vowel declared alongside the rule, "" if none */
  epenthesis: string;
}

export type TemplateShape = "full" | "bisyllabic";

export interface Template {
  shape: TemplateShape;
  /** Vowel used to complete a bisyllabic template, "" if none */
  epenthesis: string;
}

// ─── Phonology ───────────────────────────────────────────────────────────────

export interface PhonologyRule {
  /** Segment sequence to rewrite; never empty */
  target: string;
  replacement: string;
  /** "" (any), "#" (word edge), "+" (morpheme boundary), "V", "C", or a literal */
  left: string;
  right: string;
}

// ─── Description ─────────────────────────────────────────────────────────────

export interface LanguageDescription {
  /** Display name, usually the input folder name */
  name: string;
  startLabel: string;
  /** In source order; the first rule for a mother wins */
  phraseStructure: PhraseStructureRule[];
  /** In source order, grouped by head */
  vocabulary: VocabularyEntry[];
  reduplication: ReduplicationRule[];
  template: Template;
  phonology: PhonologyRule[];
  /** Segments counted as syllable nuclei */
  vowels: string[];
  /** Expected surface forms, when an evaluation list is supplied */
  evaluation?: string[];
}

export const DEFAULT_VOWELS: readonly string[] = ["a", "e", "i", "o", "u"];

// ─── Derivation ──────────────────────────────────────────────────────────────

export type DerivationStage = "built" | "attached" | "filled" | "inserted" | "phonologized";

export const STAGE_ORDER: readonly DerivationStage[] = [
  "built", "attached", "filled", "inserted", "phonologized",
];

export interface DerivationSnapshot {
  stage: DerivationStage;
  /** Insertion cycle index (deepest first) when cycle snapshots are requested */
  cycle?: number;
  tree: SyntaxNode;
}

/** Label → features added to every node with that label */
export type MorphologicalSpec = Record<string, string[]>;

export interface Derivation {
  /** Final surface form */
  word: string;
  /** Reduplicant exponent, absent for base forms */
  reduplicant?: string;
  /** Reduplication rule that licensed the RedP, absent for base forms */
  rule?: ReduplicationRule;
  spec: MorphologicalSpec;
  snapshots: DerivationSnapshot[];
}

// ─── Validation ──────────────────────────────────────────────────────────────

export type ValidationModule = "phonology" | "morphology" | "syntax" | "cross-module";

export interface ValidationIssue {
  ruleId: string;
  module: ValidationModule;
  severity: "error" | "warning";
  message: string;
  /** Label, rule or vowel the issue is about */
  entityRef?: string;
}
