/**
 * Fixture language descriptions used across package tests and as
 * baseline inputs for the evaluation harness.
 *
 *   1. Baba: one terminal, full-copy reduplication of the root
 *   2. Tobak: aspect/tense paradigm, bisyllabic template, intervocalic voicing
 *   3. Ilo: vowel-conditioned reduplication with an epenthetic vowel
 */

import type { LanguageDescription } from "./schema.js";
import { DEFAULT_VOWELS } from "./schema.js";

// ─── Fixture 1: Baba (full copy) ─────────────────────────────────────────

export const FIXTURE_BABA: LanguageDescription = {
  name: "baba",
  startLabel: "Root",
  phraseStructure: [
    { mother: "Root", daughters: [{ label: "T", features: [] }] },
  ],
  vocabulary: [
    { head: "T", features: [], phonology: "ba" },
  ],
  reduplication: [
    { target: "Root", environment: "", epenthesis: "" },
  ],
  template: { shape: "full", epenthesis: "" },
  phonology: [],
  vowels: [...DEFAULT_VOWELS],
  evaluation: ["ba", "baba"],
};

// ─── Fixture 2: Tobak (bisyllabic, paradigm) ─────────────────────────────

export const FIXTURE_TOBAK: LanguageDescription = {
  name: "tobak",
  startLabel: "TP",
  phraseStructure: [
    { mother: "TP", daughters: [{ label: "AspP", features: [] }, { label: "T", features: [] }] },
    { mother: "AspP", daughters: [{ label: "V", features: [] }, { label: "Asp", features: [] }] },
  ],
  vocabulary: [
    { head: "V", features: [], phonology: "tobak" },
    { head: "Asp", features: ["prog"], phonology: "an" },
    { head: "Asp", features: [], phonology: "" },
    { head: "T", features: ["past"], phonology: "u" },
    { head: "T", features: [], phonology: "" },
  ],
  reduplication: [
    { target: "V", environment: "", epenthesis: "i" },
  ],
  template: { shape: "bisyllabic", epenthesis: "i" },
  phonology: [
    { target: "k", replacement: "g", left: "", right: "V" },
  ],
  vowels: [...DEFAULT_VOWELS],
};

// ─── Fixture 3: Ilo (vowel-initial environment) ──────────────────────────

export const FIXTURE_ILO: LanguageDescription = {
  name: "ilo",
  startLabel: "vP",
  phraseStructure: [
    { mother: "vP", daughters: [{ label: "v", features: [] }, { label: "VP", features: [] }] },
    { mother: "VP", daughters: [{ label: "V", features: [] }] },
  ],
  vocabulary: [
    { head: "v", features: [], phonology: "m" },
    { head: "V", features: [], phonology: "ilo" },
  ],
  reduplication: [
    { target: "VP", environment: "VOWEL", epenthesis: "" },
    { target: "vP", environment: "CONSONANT", epenthesis: "" },
  ],
  template: { shape: "bisyllabic", epenthesis: "a" },
  phonology: [
    { target: "m", replacement: "n", left: "#", right: "" },
  ],
  vowels: [...DEFAULT_VOWELS],
};
