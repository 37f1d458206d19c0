/**
 * @redup/phonology
 * Segmentation, syllabification and the ordered rewrite-rule engine
 * applied to spelled-out words.
 */
import type { PhonologyRule } from "@redup/shared-types";
import { DEFAULT_VOWELS } from "@redup/shared-types";

export interface PhonologyValidationIssue {
  ruleId: string; severity: "error" | "warning"; message: string; entityRef?: string;
}
export interface Syllable {
  onset: string[]; nucleus: string; coda: string[];
}

// ─── Segmentation ─────────────────────────────────────────────────────────────

/**
 * Split a form into segments. Multi-character vowels are matched longest
 * first; everything else is one code point per segment.
 */
export function segment(form: string, vowels: readonly string[] = DEFAULT_VOWELS): string[] {
  const sorted = vowels.filter(v => v.length > 0).sort((a, b) => b.length - a.length);
  const segments: string[] = [];
  let i = 0;
  while (i < form.length) {
    const vowel = sorted.find(v => form.startsWith(v, i));
    const seg = vowel ?? String.fromCodePoint(form.codePointAt(i) ?? 0);
    segments.push(seg);
    i += seg.length;
  }
  return segments;
}

export function isVowelInitial(form: string, vowels: readonly string[] = DEFAULT_VOWELS): boolean {
  const first = segment(form, vowels)[0];
  return first !== undefined && vowels.includes(first);
}

export function countNuclei(segments: readonly string[], vowels: readonly string[] = DEFAULT_VOWELS): number {
  const vowelSet = new Set(vowels);
  return segments.filter(s => vowelSet.has(s)).length;
}

/**
 * Every vowel heads one syllable; consonants are onsets of the following
 * vowel, and consonants after the last vowel are that syllable's coda.
 * A form with no vowel has no syllables.
 */
export function syllabify(segments: readonly string[], vowels: readonly string[] = DEFAULT_VOWELS): Syllable[] {
  const vowelSet = new Set(vowels);
  const sylls: Syllable[] = [];
  let onset: string[] = [];
  for (const seg of segments) {
    if (vowelSet.has(seg)) {
      sylls.push({ onset, nucleus: seg, coda: [] });
      onset = [];
    } else {
      onset.push(seg);
    }
  }
  const last = sylls[sylls.length - 1];
  if (last) last.coda.push(...onset);
  return sylls;
}

// ─── Rewrite rules ────────────────────────────────────────────────────────────

/**
 * Apply each rule once, in order. Output of rule i is the input of rule i+1;
 * nothing is iterated to a fixpoint.
 */
export function applyPhonologicalRules(
  form: string,
  rules: readonly PhonologyRule[],
  vowels: readonly string[] = DEFAULT_VOWELS
): string {
  return applyToMorphemes([form], rules, vowels).join("");
}

/**
 * Same as {@link applyPhonologicalRules} over a morpheme list. Replacement
 * material belongs to the morpheme in which the match starts, so the result
 * can be written back to the terminals that spelled the word out.
 */
export function applyToMorphemes(
  morphemes: readonly string[],
  rules: readonly PhonologyRule[],
  vowels: readonly string[] = DEFAULT_VOWELS
): string[] {
  let current = [...morphemes];
  for (const rule of rules) current = applyRule(current, rule, vowels);
  return current;
}

/**
 * One left-to-right pass of a single rule. Contexts are checked against the
 * pass input; matches never overlap.
 */
export function applyRule(
  morphemes: readonly string[],
  rule: PhonologyRule,
  vowels: readonly string[] = DEFAULT_VOWELS
): string[] {
  if (!rule.target) return [...morphemes];
  const input = morphemes.join("");
  const owners: number[] = [];
  const boundaries = new Set<number>();
  let offset = 0;
  morphemes.forEach((m, idx) => {
    for (let k = 0; k < m.length; k++) owners.push(idx);
    offset += m.length;
    if (offset > 0 && offset < input.length) boundaries.add(offset);
  });

  const out = morphemes.map(() => "");
  const env: Env = { input, boundaries, vowels: vowels.filter(v => v.length > 0) };
  let i = 0;
  while (i < input.length) {
    const owner = owners[i] ?? 0;
    const end = i + rule.target.length;
    if (input.startsWith(rule.target, i) && leftHolds(rule.left, i, env) && rightHolds(rule.right, end, env)) {
      out[owner] = (out[owner] ?? "") + rule.replacement;
      i = end;
    } else {
      out[owner] = (out[owner] ?? "") + input.charAt(i);
      i++;
    }
  }
  return out;
}

export function formatRule(rule: PhonologyRule): string {
  const rhs = rule.replacement === "" ? "∅" : rule.replacement;
  if (!rule.left && !rule.right) return `${rule.target} -> ${rhs}`;
  return `${rule.target} -> ${rhs} / ${rule.left}_${rule.right}`;
}

export function validatePhonologyRules(
  rules: readonly PhonologyRule[],
  vowels: readonly string[]
): PhonologyValidationIssue[] {
  const issues: PhonologyValidationIssue[] = [];
  if (vowels.length === 0)
    issues.push({ruleId:"PHON_001",severity:"error",message:"At least one vowel is required to syllabify forms."});
  const seen = new Set<string>();
  for (const v of vowels) {
    if (!v) issues.push({ruleId:"PHON_002",severity:"error",message:"Empty vowel symbol."});
    else if (seen.has(v)) issues.push({ruleId:"PHON_003",severity:"warning",message:`Duplicate vowel: "${v}".`,entityRef:v});
    seen.add(v);
  }
  rules.forEach((rule, idx) => {
    const ref = `phonology[${idx}]`;
    if (!rule.target)
      issues.push({ruleId:"PHON_010",severity:"error",message:`Rule ${idx + 1} has an empty target.`,entityRef:ref});
    else if (rule.target === rule.replacement)
      issues.push({ruleId:"PHON_011",severity:"warning",message:`Rule ${idx + 1} (${formatRule(rule)}) rewrites its target to itself.`,entityRef:ref});
  });
  return issues;
}

// ─── Internals ────────────────────────────────────────────────────────────────

interface Env { input: string; boundaries: Set<number>; vowels: string[]; }

function leftHolds(token: string, pos: number, env: Env): boolean {
  const precededByVowel = env.vowels.some(v => env.input.endsWith(v, pos));
  switch (token) {
    case "": return true;
    case "#": return pos === 0;
    case "+": return env.boundaries.has(pos);
    case "V": return precededByVowel;
    case "C": return pos > 0 && !precededByVowel;
    default: return env.input.endsWith(token, pos);
  }
}

function rightHolds(token: string, pos: number, env: Env): boolean {
  const followedByVowel = env.vowels.some(v => env.input.startsWith(v, pos));
  switch (token) {
    case "": return true;
    case "#": return pos === env.input.length;
    case "+": return env.boundaries.has(pos);
    case "V": return followedByVowel;
    case "C": return pos < env.input.length && !followedByVowel;
    default: return env.input.startsWith(token, pos);
  }
}
