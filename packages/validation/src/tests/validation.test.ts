import { describe, expect, it } from "vitest";
import type { LanguageDescription } from "@redup/shared-types";
import { FIXTURE_BABA, FIXTURE_ILO, FIXTURE_TOBAK, GrammarError } from "@redup/shared-types";
import { assertValid, formatIssues, validate } from "../index.js";

// ─── Fixtures ─────────────────────────────────────────────────────────────────

describe("fixtures", () => {
  it.each([
    ["baba", FIXTURE_BABA],
    ["tobak", FIXTURE_TOBAK],
    ["ilo", FIXTURE_ILO],
  ])("%s passes every pass without warnings", (_name, description) => {
    const result = validate(description);
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });
});

// ─── Errors ───────────────────────────────────────────────────────────────────

describe("errors", () => {
  const noVowels: LanguageDescription = { ...FIXTURE_TOBAK, vowels: [] };

  it("collects errors from every pass and summarises them", () => {
    const result = validate(noVowels);
    expect(result.valid).toBe(false);
    expect(result.errors.map(i => [i.module, i.ruleId])).toEqual([
      ["phonology", "PHON_001"],
      ["morphology", "MORPH_010"],
      ["morphology", "MORPH_010"],
    ]);
    expect(result.summary.phonology).toEqual({ passed: false, errorCount: 1, warningCount: 0 });
    expect(result.summary.morphology).toEqual({ passed: false, errorCount: 2, warningCount: 0 });
    expect(result.summary.syntax.passed).toBe(true);
  });

  it("assertValid throws the first error", () => {
    expect(() => assertValid(noVowels)).toThrow(GrammarError);
    expect(() => assertValid(noVowels))
      .toThrow("[PHON_001] At least one vowel is required to syllabify forms. (+2 more)");
    expect(assertValid(FIXTURE_BABA).valid).toBe(true);
  });
});

// ─── Cross-module ─────────────────────────────────────────────────────────────

describe("cross-module pass", () => {
  it("warns about rules that can never apply", () => {
    const description: LanguageDescription = {
      ...FIXTURE_BABA,
      reduplication: [],
      phonology: [{ target: "q", replacement: "k", left: "zz", right: "" }],
      evaluation: [],
    };
    const result = validate(description);
    expect(result.valid).toBe(true);
    expect(result.warnings.map(i => i.ruleId)).toEqual(["CROSS_001", "CROSS_020", "CROSS_021", "CROSS_030"]);
    expect(result.summary.crossModule).toEqual({ passed: true, errorCount: 0, warningCount: 4 });
    expect(formatIssues(result)[0]).toBe("warn  CROSS_001 No reduplication rules: only base forms can be derived.");
  });

  it("warns about literal environments no exponent contains", () => {
    const description: LanguageDescription = {
      ...FIXTURE_BABA,
      reduplication: [{ target: "Root", environment: "#zo", epenthesis: "" }],
    };
    expect(validate(description).warnings).toEqual([{
      ruleId: "CROSS_010",
      severity: "warning",
      module: "cross-module",
      message: 'Environment "#zo" for "Root" mentions "zo", which no exponent contains.',
      entityRef: "Root",
    }]);
  });
});
