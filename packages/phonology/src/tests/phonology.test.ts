import { describe, expect, it } from "vitest";
import type { PhonologyRule } from "@redup/shared-types";
import {
  applyPhonologicalRules, applyToMorphemes, countNuclei, formatRule, isVowelInitial,
  segment, syllabify, validatePhonologyRules
} from "../index.js";

const rule = (target: string, replacement: string, left = "", right = ""): PhonologyRule =>
  ({ target, replacement, left, right });

// ─── Segmentation ─────────────────────────────────────────────────────────────

describe("segmentation", () => {
  it("matches multi-character vowels longest first", () => {
    expect(segment("baai", ["a", "aa", "i"])).toEqual(["b", "aa", "i"]);
  });

  it("counts nuclei and detects vowel-initial forms", () => {
    expect(countNuclei(segment("tobak"))).toBe(2);
    expect(isVowelInitial("ilo")).toBe(true);
    expect(isVowelInitial("mi")).toBe(false);
    expect(isVowelInitial("")).toBe(false);
  });

  it("syllabifies with onsets before each vowel and a final coda", () => {
    expect(syllabify(segment("tobak"))).toEqual([
      { onset: ["t"], nucleus: "o", coda: [] },
      { onset: ["b"], nucleus: "a", coda: ["k"] },
    ]);
  });

  it("gives no syllables to a form without vowels", () => {
    expect(syllabify(["k", "r"])).toEqual([]);
  });
});

// ─── Rewrite rules ────────────────────────────────────────────────────────────

describe("rewrite rules", () => {
  it("devoices only the word-initial b in baba", () => {
    expect(applyPhonologicalRules("baba", [rule("b", "p", "#")])).toBe("paba");
  });

  it("is order sensitive", () => {
    const aToE = rule("a", "e");
    const eToI = rule("e", "i");
    expect(applyPhonologicalRules("ba", [aToE, eToI])).toBe("bi");
    expect(applyPhonologicalRules("ba", [eToI, aToE])).toBe("be");
  });

  it("is deterministic", () => {
    const rules = [rule("k", "g", "", "V"), rule("a", "e", "C")];
    expect(applyPhonologicalRules("tobakan", rules)).toBe(applyPhonologicalRules("tobakan", rules));
  });

  it("checks contexts against the input of the pass", () => {
    expect(applyPhonologicalRules("baa", [rule("a", "b", "b")])).toBe("bba");
  });

  it("replaces non-overlapping multi-segment matches left to right", () => {
    expect(applyPhonologicalRules("cabab", [rule("ab", "x", "c")])).toBe("cxab");
    expect(applyPhonologicalRules("aaa", [rule("aa", "b")])).toBe("ba");
  });

  it("deletes word-finally", () => {
    expect(applyPhonologicalRules("bate", [rule("e", "", "", "#")])).toBe("bat");
  });

  it("treats C as a preceding non-vowel, never the word edge", () => {
    expect(applyPhonologicalRules("aba", [rule("a", "e", "C")])).toBe("abe");
  });

  it("voices k between vowels only", () => {
    expect(applyPhonologicalRules("tobak", [rule("k", "g", "", "V")])).toBe("tobak");
    expect(applyPhonologicalRules("tobakan", [rule("k", "g", "", "V")])).toBe("tobagan");
  });

  it("leaves the form alone for an empty target", () => {
    expect(applyPhonologicalRules("ba", [rule("", "x")])).toBe("ba");
  });
});

describe("morpheme-aware rewriting", () => {
  it("sees morpheme boundaries through +", () => {
    expect(applyToMorphemes(["ab", "ba"], [rule("b", "p", "", "+")])).toEqual(["ap", "ba"]);
  });

  it("does not treat the word edges as morpheme boundaries", () => {
    expect(applyToMorphemes(["ab"], [rule("b", "p", "", "+")])).toEqual(["ab"]);
  });

  it("gives replacement material to the morpheme where the match starts", () => {
    expect(applyToMorphemes(["toba", "tobak", "an", ""], [rule("k", "g", "", "V")]))
      .toEqual(["toba", "tobag", "an", ""]);
    expect(applyToMorphemes(["ka", "ta"], [rule("at", "o")])).toEqual(["ko", "a"]);
  });
});

// ─── Formatting & validation ──────────────────────────────────────────────────

describe("formatRule", () => {
  it("prints context and deletion", () => {
    expect(formatRule(rule("b", "p", "#"))).toBe("b -> p / #_");
    expect(formatRule(rule("e", ""))).toBe("e -> ∅");
  });
});

describe("validatePhonologyRules", () => {
  it("requires at least one vowel", () => {
    expect(validatePhonologyRules([], []).map(i => i.ruleId)).toEqual(["PHON_001"]);
  });

  it("reports empty and duplicate vowels and degenerate rules", () => {
    const issues = validatePhonologyRules([rule("", "x"), rule("a", "a")], ["a", "a", ""]);
    expect(issues.map(i => [i.ruleId, i.severity])).toEqual([
      ["PHON_003", "warning"],
      ["PHON_002", "error"],
      ["PHON_010", "error"],
      ["PHON_011", "warning"],
    ]);
  });
});
