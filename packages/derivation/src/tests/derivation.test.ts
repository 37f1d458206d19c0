import { describe, expect, it } from "vitest";
import type { DerivationSnapshot, LanguageDescription } from "@redup/shared-types";
import {
  FIXTURE_BABA, FIXTURE_ILO, FIXTURE_TOBAK, NoAttachmentSiteError, VocabularyInsertionError
} from "@redup/shared-types";
import { nodeAt, terminals } from "@redup/syntax";
import {
  derive, deriveCell, deriveParadigm, evaluateWords, featureSpecs, formatWordList, paradigmCells, paradigmSize
} from "../index.js";

const stages = (snapshots: DerivationSnapshot[]) => snapshots.map(s => s.stage);

// ─── Single derivations ───────────────────────────────────────────────────────

describe("derive", () => {
  it("reduplicates ba fully as baba", () => {
    const d = derive(FIXTURE_BABA);
    expect(d.word).toBe("baba");
    expect(d.reduplicant).toBe("ba");
    expect(d.rule).toEqual({ target: "Root", environment: "", epenthesis: "" });
    expect(stages(d.snapshots)).toEqual(["built", "attached", "filled", "inserted", "phonologized"]);
  });

  it("skips attachment and the template for base forms", () => {
    const d = derive(FIXTURE_BABA, { reduplicate: false });
    expect(d.word).toBe("ba");
    expect(d.reduplicant).toBeUndefined();
    expect(stages(d.snapshots)).toEqual(["built", "inserted", "phonologized"]);
  });

  it("copies two syllables of tobak and voices the intervocalic k", () => {
    expect(derive(FIXTURE_TOBAK).word).toBe("tobatobak");
    expect(derive(FIXTURE_TOBAK, { reduplicate: false }).word).toBe("tobak");

    const d = derive(FIXTURE_TOBAK, { features: { Asp: ["prog"] } });
    expect(d.word).toBe("tobatobagan");
    const final = d.snapshots[d.snapshots.length - 1]?.tree;
    expect(final && nodeAt(final, [0, 0, 0])?.phonology).toBe("toba");
    expect(final && nodeAt(final, [0, 0, 1])?.phonology).toBe("tobag");
  });

  it("is idempotent", () => {
    const a = derive(FIXTURE_TOBAK, { features: { T: ["past"] } });
    const b = derive(FIXTURE_TOBAK, { features: { T: ["past"] } });
    expect(b.word).toBe(a.word);
    expect(b.snapshots).toEqual(a.snapshots);
  });

  it("freezes every snapshot as taken", () => {
    const d = derive(FIXTURE_BABA);
    const built = d.snapshots[0]?.tree;
    expect(built && Object.isFrozen(built)).toBe(true);
    expect(built && terminals(built).map(t => t.node.phonology)).toEqual([undefined]);
  });

  it("reports each snapshot to the listener in order", () => {
    const seen: string[] = [];
    derive(FIXTURE_BABA, {}, s => seen.push(s.stage));
    expect(seen).toEqual(["built", "attached", "filled", "inserted", "phonologized"]);
  });

  it("captures intermediate insertion cycles on request", () => {
    const d = derive(FIXTURE_TOBAK, { cycleSnapshots: true });
    expect(d.snapshots.map(s => [s.stage, s.cycle])).toEqual([
      ["built", undefined],
      ["attached", undefined],
      ["filled", undefined],
      ["inserted", 0],
      ["inserted", 1],
      ["inserted", undefined],
      ["phonologized", undefined],
    ]);
  });

  it("records no cycle snapshot when a depth only holds the filled reduplicant", () => {
    const d = derive(FIXTURE_BABA, { cycleSnapshots: true });
    expect(d.snapshots.map(s => [s.stage, s.cycle])).toEqual([
      ["built", undefined],
      ["attached", undefined],
      ["filled", undefined],
      ["inserted", undefined],
      ["phonologized", undefined],
    ]);
  });

  it("attaches at the first licensed site or with a chosen rule", () => {
    expect(derive(FIXTURE_ILO).word).toBe("nilomilo");
    expect(derive(FIXTURE_ILO, { ruleIndex: 0 }).word).toBe("niloilo");
    expect(derive(FIXTURE_ILO, { reduplicate: false }).word).toBe("nilo");
  });

  it("rejects a rule index that does not exist", () => {
    expect(() => derive(FIXTURE_ILO, { ruleIndex: 5 })).toThrow(NoAttachmentSiteError);
    expect(() => derive(FIXTURE_ILO, { ruleIndex: 5 })).toThrow("Reduplication rule 5 does not exist (2 defined).");
  });

  it("fails at insertion when a terminal has no vocabulary entry", () => {
    const description: LanguageDescription = {
      ...FIXTURE_TOBAK,
      vocabulary: FIXTURE_TOBAK.vocabulary.filter(e => e.head !== "T"),
    };
    let caught: unknown;
    try { derive(description); } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(VocabularyInsertionError);
    expect(caught).toMatchObject({ subject: "T", stage: "inserted" });
  });
});

// ─── Paradigms ────────────────────────────────────────────────────────────────

describe("paradigms", () => {
  it("enumerates one specification per combination of entries", () => {
    expect(featureSpecs(FIXTURE_TOBAK.vocabulary)).toEqual([
      { label: "prog.past", spec: { Asp: ["prog"], T: ["past"] } },
      { label: "prog", spec: { Asp: ["prog"] } },
      { label: "past", spec: { T: ["past"] } },
      { label: "elsewhere", spec: {} },
    ]);
  });

  it("lists base cells before reduplicated cells", () => {
    const cells = paradigmCells(FIXTURE_ILO);
    expect(cells.map(c => [c.kind, c.index, c.ruleIndex])).toEqual([
      ["base", 0, undefined],
      ["reduplicated", 0, 0],
      ["reduplicated", 0, 1],
    ]);
  });

  it("counts cells without enumerating them", () => {
    expect(paradigmSize(FIXTURE_TOBAK)).toBe(paradigmCells(FIXTURE_TOBAK).length);
    expect(paradigmSize(FIXTURE_ILO)).toBe(3);
    const repeated = {
      ...FIXTURE_TOBAK,
      vocabulary: [...FIXTURE_TOBAK.vocabulary, { head: "T", features: ["past"], phonology: "o" }],
    };
    expect(paradigmSize(repeated)).toBe(8);
    expect(paradigmCells(repeated)).toHaveLength(8);
  });

  it("derives the whole tobak paradigm", () => {
    const result = deriveParadigm(FIXTURE_TOBAK);
    expect(result.baseWords).toEqual(["tobaganu", "tobagan", "tobagu", "tobak"]);
    expect(result.reduplicatedWords).toEqual(["tobatobaganu", "tobatobagan", "tobatobagu", "tobatobak"]);
    expect(result.outcomes.every(o => o.status === "ok")).toBe(true);
  });

  it("derives every attachment variant", () => {
    const result = deriveParadigm(FIXTURE_ILO);
    expect(result.baseWords).toEqual(["nilo"]);
    expect(result.reduplicatedWords).toEqual(["niloilo", "nilomilo"]);
  });

  it("marks cells whose rule finds no site as unlicensed", () => {
    const description: LanguageDescription = {
      ...FIXTURE_ILO,
      reduplication: [{ target: "VP", environment: "CONSONANT", epenthesis: "" }],
    };
    const outcome = deriveCell(description, { index: 0, label: "elsewhere", spec: {}, kind: "reduplicated", ruleIndex: 0 });
    expect(outcome).toMatchObject({ status: "unlicensed", reason: 'No "VP" node in environment CONSONANT.' });
    expect(deriveParadigm(description).reduplicatedWords).toEqual([]);
  });

  it("isolates failing cells", () => {
    const description: LanguageDescription = {
      ...FIXTURE_TOBAK,
      vocabulary: [{ head: "V", features: [], phonology: "ta" }, ...FIXTURE_TOBAK.vocabulary.slice(1)],
      reduplication: [{ target: "V", environment: "", epenthesis: "" }],
      template: { shape: "bisyllabic", epenthesis: "" },
    };
    const result = deriveParadigm(description);
    expect(result.baseWords).toEqual(["taanu", "taan", "tau", "ta"]);
    expect(result.reduplicatedWords).toEqual([]);
    const failures = result.outcomes.flatMap(o => (o.status === "failed" ? [o.error.code] : []));
    expect(failures).toEqual(["TEMPLATE_ERROR", "TEMPLATE_ERROR", "TEMPLATE_ERROR", "TEMPLATE_ERROR"]);
  });

  it("numbers the word list across both sections", () => {
    expect(formatWordList(["ba"], ["baba"])).toBe("0. ba\n--- reduplicated words ---\n1. baba\n");
  });
});

// ─── Evaluation ───────────────────────────────────────────────────────────────

describe("evaluateWords", () => {
  it("passes when the sets match", () => {
    const result = deriveParadigm(FIXTURE_BABA);
    expect(evaluateWords([...result.baseWords, ...result.reduplicatedWords], FIXTURE_BABA.evaluation ?? []))
      .toEqual({ passed: true, unexpected: [], missing: [] });
  });

  it("reports both directions", () => {
    expect(evaluateWords(["ba", "baba", "ba"], ["baba", "bab"]))
      .toEqual({ passed: false, unexpected: ["ba"], missing: ["bab"] });
  });
});
