import type { EvaluationReport } from "./types.js";

/**
 * Compare produced surface forms with an expected list. Order and
 * duplicates are ignored; both directions are reported.
 */
export function evaluateWords(produced: readonly string[], expected: readonly string[]): EvaluationReport {
  const producedSet = new Set(produced);
  const expectedSet = new Set(expected);
  const unexpected = [...producedSet].filter(w => !expectedSet.has(w));
  const missing = [...expectedSet].filter(w => !producedSet.has(w));
  return { passed: unexpected.length === 0 && missing.length === 0, unexpected, missing };
}
