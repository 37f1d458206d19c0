/**
 * @redup/derivation — Public API surface
 */
export { derive, attachmentContext, phonologizeTree } from "./pipeline.js";
export { deriveParadigm, deriveCell, paradigmCells, paradigmSize, cellsFor, featureSpecs, formatWordList } from "./paradigm.js";
export { evaluateWords } from "./evaluation.js";
export type {
  DerivationRequest, SnapshotListener,
  ParadigmCell, DerivationOutcome, ParadigmResult, ParadigmOptions,
  EvaluationReport,
} from "./types.js";
