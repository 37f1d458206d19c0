/**
 * @redup/validation — Description Validation
 *
 * Runs before any derivation is attempted and reports every problem at
 * once instead of failing on the first bad derivation.
 *
 * Four passes:
 *   1. Phonological: vowel set, rewrite rules
 *   2. Morphological: vocabulary ordering, epenthesis vowels
 *   3. Syntactic: start label, cycles, unlisted terminals, reachability
 *   4. Cross-module: reduplication rules and phonological rules checked
 *                      against the material the vocabulary can produce
 */
import type {
  LanguageDescription, ValidationIssue, ValidationModule
} from "@redup/shared-types";
import { GrammarError } from "@redup/shared-types";
import { validatePhonologyRules } from "@redup/phonology";
import { validateVocabulary } from "@redup/morphology";
import { validatePhraseStructure } from "@redup/syntax";

// ─── Public surface ───────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;         // true only if no errors (warnings are OK)
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  summary: ValidationSummary;
  durationMs: number;
}

export interface ValidationSummary {
  phonology: PassResult;
  morphology: PassResult;
  syntax: PassResult;
  crossModule: PassResult;
}

export interface PassResult {
  passed: boolean;
  errorCount: number;
  warningCount: number;
}

export function validate(description: LanguageDescription): ValidationResult {
  const start = Date.now();
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // ── Pass 1: Phonological ─────────────────────────────────────────────────
  classify(tag(validatePhonologyRules(description.phonology, description.vowels), "phonology"), errors, warnings);

  // ── Pass 2: Morphological ────────────────────────────────────────────────
  classify(tag(validateVocabulary(description), "morphology"), errors, warnings);

  // ── Pass 3: Syntactic ────────────────────────────────────────────────────
  classify(tag(validatePhraseStructure(description), "syntax"), errors, warnings);

  // ── Pass 4: Cross-module ─────────────────────────────────────────────────
  classify(runCrossModulePass(description), errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    summary: {
      phonology: passResult(errors, warnings, "phonology"),
      morphology: passResult(errors, warnings, "morphology"),
      syntax: passResult(errors, warnings, "syntax"),
      crossModule: passResult(errors, warnings, "cross-module"),
    },
    durationMs: Date.now() - start,
  };
}

/** Throws a GrammarError carrying the first error found, if any */
export function assertValid(description: LanguageDescription): ValidationResult {
  const result = validate(description);
  const first = result.errors[0];
  if (first) {
    const more = result.errors.length > 1 ? ` (+${result.errors.length - 1} more)` : "";
    throw new GrammarError(first.entityRef ?? first.ruleId, `[${first.ruleId}] ${first.message}${more}`);
  }
  return result;
}

/** One line per issue, errors first */
export function formatIssues(result: ValidationResult): string[] {
  return [...result.errors, ...result.warnings].map(i =>
    `${i.severity === "error" ? "error" : "warn "} ${i.ruleId} ${i.message}`
  );
}

// ─── Pass 4: Cross-module ─────────────────────────────────────────────────────

const KEYWORD_ENVIRONMENTS = new Set(["VOWEL", "CONSONANT"]);
const CONTEXT_TOKENS = new Set(["", "#", "+", "V", "C"]);

function runCrossModulePass(description: LanguageDescription): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const material = [
    ...description.vocabulary.map(e => e.phonology),
    ...description.phonology.map(r => r.replacement),
    description.template.epenthesis,
    ...description.reduplication.map(r => r.epenthesis),
  ].join(" ");

  if (description.reduplication.length === 0) {
    issues.push({
      ruleId: "CROSS_001", severity: "warning", module: "cross-module",
      message: "No reduplication rules: only base forms can be derived.",
    });
  }

  // Literal environments must be producible by some exponent
  for (const rule of description.reduplication) {
    const env = rule.environment;
    if (!env || KEYWORD_ENVIRONMENTS.has(env)) continue;
    const literal = env.replace(/^#|#$/g, "");
    if (literal && !material.includes(literal)) {
      issues.push({
        ruleId: "CROSS_010", severity: "warning", module: "cross-module",
        message: `Environment "${env}" for "${rule.target}" mentions "${literal}", which no exponent contains.`,
        entityRef: rule.target,
      });
    }
  }

  // Phonological rules whose target or literal context never occurs
  description.phonology.forEach((rule, idx) => {
    const ref = `phonology[${idx}]`;
    if (rule.target && !material.includes(rule.target)) {
      issues.push({
        ruleId: "CROSS_020", severity: "warning", module: "cross-module",
        message: `Rule ${idx + 1} targets "${rule.target}", which no exponent contains.`,
        entityRef: ref,
      });
    }
    for (const ctx of [rule.left, rule.right]) {
      if (!CONTEXT_TOKENS.has(ctx) && !material.includes(ctx)) {
        issues.push({
          ruleId: "CROSS_021", severity: "warning", module: "cross-module",
          message: `Rule ${idx + 1} has context "${ctx}", which no exponent contains.`,
          entityRef: ref,
        });
      }
    }
  });

  if (description.evaluation && description.evaluation.length === 0) {
    issues.push({
      ruleId: "CROSS_030", severity: "warning", module: "cross-module",
      message: "The evaluation list is empty: every derived word will be reported as unexpected.",
    });
  }

  return issues;
}

// ─── Internals ────────────────────────────────────────────────────────────────

interface RawIssue {
  ruleId: string;
  severity: "error" | "warning";
  message: string;
  entityRef?: string;
}

function tag(raw: readonly RawIssue[], module: ValidationModule): ValidationIssue[] {
  return raw.map(i => ({ ...i, module }));
}

function classify(issues: readonly ValidationIssue[], errors: ValidationIssue[], warnings: ValidationIssue[]): void {
  for (const issue of issues) {
    if (issue.severity === "error") errors.push(issue);
    else warnings.push(issue);
  }
}

function passResult(errors: ValidationIssue[], warnings: ValidationIssue[], module: ValidationModule): PassResult {
  const e = errors.filter(i => i.module === module).length;
  const w = warnings.filter(i => i.module === module).length;
  return { passed: e === 0, errorCount: e, warningCount: w };
}
