import { describe, expect, it } from "vitest";
import type { SyntaxNode } from "@redup/shared-types";
import { FIXTURE_BABA, FIXTURE_TOBAK } from "@redup/shared-types";
import { derive } from "@redup/derivation";
import {
  esc, nodeCaption, renderAscii, renderBracketed, renderSnapshot, renderSvg, snapshotFileName
} from "../index.js";

const leaf = (label: string, phonology?: string, features: string[] = []): SyntaxNode =>
  phonology === undefined ? { label, children: [], features } : { label, children: [], features, phonology };

const finalTree = (snapshots: ReadonlyArray<{ tree: SyntaxNode }>): SyntaxNode =>
  snapshots[snapshots.length - 1]?.tree ?? leaf("empty");

// ─── Text ─────────────────────────────────────────────────────────────────────

describe("text renderers", () => {
  it("brackets a finished derivation", () => {
    expect(renderBracketed(finalTree(derive(FIXTURE_BABA).snapshots))).toBe("[RedP [RED ba] [Root [T ba]]]");
  });

  it("distinguishes unassigned and null exponents", () => {
    expect(renderBracketed(leaf("T", undefined, ["past"]))).toBe("[T[past]]");
    expect(renderBracketed(leaf("Asp", ""))).toBe("[Asp ∅]");
  });

  it("captions RedP with its environment", () => {
    expect(nodeCaption({ label: "RedP", children: [], features: [], environment: "VOWEL" })).toBe("RedP (VOWEL)");
  });

  it("draws an outline", () => {
    const tree = finalTree(derive(FIXTURE_TOBAK, { reduplicate: false }).snapshots);
    expect(renderAscii(tree)).toBe([
      "TP",
      "├── AspP",
      "│   ├── V = tobak",
      "│   └── Asp = ∅",
      "└── T = ∅",
    ].join("\n"));
  });
});

// ─── SVG ──────────────────────────────────────────────────────────────────────

describe("renderSvg", () => {
  it("sizes the canvas from the captions and escapes text", () => {
    const svg = renderSvg(leaf("T", "a<b"));
    expect(svg.split("\n")[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="88" height="68" viewBox="0 0 88 68">');
    expect(svg).toContain('<text x="44" y="20" text-anchor="middle" class="label">T</text>');
    expect(svg).toContain('<text x="44" y="38" text-anchor="middle" class="exponent">a&lt;b</text>');
    expect(svg.endsWith("</svg>\n")).toBe(true);
  });

  it("connects mothers to daughters and draws the title", () => {
    const svg = renderSvg({ label: "Root", children: [leaf("T")], features: [] }, { title: "Step 1: built" });
    expect(svg).toContain('<text x="20" y="34" class="title">Step 1: built</text>');
    expect(svg).toContain('<line x1="36" y1="56" x2="36" y2="96" stroke="#333" stroke-width="1"/>');
  });

  it("escapes markup characters", () => {
    expect(esc('<a & "b">')).toBe("&lt;a &amp; &quot;b&quot;&gt;");
  });
});

// ─── Files ────────────────────────────────────────────────────────────────────

describe("snapshot files", () => {
  it("names base and reduplicated steps", () => {
    expect(snapshotFileName({ kind: "base", word: 0, step: 1, final: false })).toBe("base_word_00_step_01.svg");
    expect(snapshotFileName({ kind: "reduplicated", word: 3, variant: 1, step: 5, final: true }, "txt"))
      .toBe("redup_word_03_variant_01_step_05_FINAL.txt");
  });

  it("titles each rendered step", () => {
    expect(renderSnapshot({ stage: "inserted", cycle: 0, tree: leaf("T", "ba") }, 4, "txt"))
      .toBe("Step 4: inserted (cycle 0)\nT = ba\n");
  });
});
