/**
 * Line parsers for the plain-text description files. Every parser takes
 * the file's text and name and throws DescriptionLoadError with a 1-based
 * line number on the first malformed line. Blank lines are ignored.
 */
import type {
  Daughter, PhraseStructureRule, PhonologyRule, ReduplicationRule, Template, VocabularyEntry
} from "@redup/shared-types";
import { DescriptionLoadError } from "@redup/shared-types";

interface Line { text: string; line: number; }

// ─── psr.txt ──────────────────────────────────────────────────────────────────

export interface ParsedPhraseStructure {
  startLabel: string;
  rules: PhraseStructureRule[];
}

/**
 * `mother,daughter[,daughter]` per line; daughters may carry features as
 * `T[past.3sg]`. A first line without a comma names the start label,
 * otherwise the first rule's mother is the start.
 */
export function parsePhraseStructure(text: string, file = "psr.txt"): ParsedPhraseStructure {
  const lines = contentLines(text);
  let startLabel = "";
  const rules: PhraseStructureRule[] = [];
  for (const [idx, { text: raw, line }] of lines.entries()) {
    if (idx === 0 && !raw.includes(",")) {
      startLabel = parseLabel(raw, file, line);
      continue;
    }
    const parts = raw.split(",").map(p => p.trim());
    const [mother, first, second, ...extra] = parts;
    if (mother === undefined || first === undefined || extra.length > 0) {
      throw new DescriptionLoadError(file, line, `Expected "mother,daughter[,daughter]", got "${raw}".`);
    }
    const daughters: PhraseStructureRule["daughters"] = second === undefined
      ? [parseDaughter(first, file, line)]
      : [parseDaughter(first, file, line), parseDaughter(second, file, line)];
    rules.push({ mother: parseLabel(mother, file, line), daughters });
  }
  return { startLabel: startLabel || (rules[0]?.mother ?? ""), rules };
}

// ─── vi_rules.txt ─────────────────────────────────────────────────────────────

/**
 * `head,feature...,phonology`. `T,` is an empty exponent; a feature column
 * may also hold several dot-separated values.
 */
export function parseVocabulary(text: string, file = "vi_rules.txt"): VocabularyEntry[] {
  return contentLines(text).map(({ text: raw, line }) => {
    const parts = raw.split(",").map(p => p.trim());
    if (parts.length < 2) {
      throw new DescriptionLoadError(file, line, `Expected "head,feature...,phonology", got "${raw}".`);
    }
    const head = parseLabel(parts[0] ?? "", file, line);
    const phonology = parts[parts.length - 1] ?? "";
    const features = parts.slice(1, -1).flatMap(splitFeatures);
    return { head, features, phonology };
  });
}

// ─── red.txt ──────────────────────────────────────────────────────────────────

/** `target[,environment[,epenthesis]]` */
export function parseReduplication(text: string, file = "red.txt"): ReduplicationRule[] {
  return contentLines(text).map(({ text: raw, line }) => {
    const parts = raw.split(",").map(p => p.trim());
    if (parts.length > 3) {
      throw new DescriptionLoadError(file, line, `Expected "target[,environment[,epenthesis]]", got "${raw}".`);
    }
    return {
      target: parseLabel(parts[0] ?? "", file, line),
      environment: parts[1] ?? "",
      epenthesis: parts[2] ?? "",
    };
  });
}

// ─── scope.txt ────────────────────────────────────────────────────────────────

/**
 * Line 1 is the template shape, optional line 2 the epenthesis vowel.
 * Without line 2 the last non-empty epenthesis column of red.txt is used.
 */
export function parseScope(text: string, reduplication: readonly ReduplicationRule[] = [], file = "scope.txt"): Template {
  const [shapeLine, epenthesisLine] = contentLines(text);
  if (!shapeLine) throw new DescriptionLoadError(file, null, "Missing template shape (full or bisyllabic).");
  const shape = shapeLine.text;
  if (shape !== "full" && shape !== "bisyllabic") {
    throw new DescriptionLoadError(file, shapeLine.line, `Unknown template shape "${shape}"; expected full or bisyllabic.`);
  }
  const fromRules = reduplication.map(r => r.epenthesis).filter(e => e !== "");
  return { shape, epenthesis: epenthesisLine?.text ?? fromRules[fromRules.length - 1] ?? "" };
}

// ─── phono_rules.txt ──────────────────────────────────────────────────────────

const EMPTY_REPLACEMENTS = new Set(["∅", "0"]);

/**
 * `target -> replacement [/ left _ right]`; `∅` or `0` deletes the target.
 * Lines without an arrow use the column form `sequence,first,second`: the
 * sequence is rewritten as first + second anywhere in the word.
 */
export function parsePhonologyRules(text: string, file = "phono_rules.txt"): PhonologyRule[] {
  return contentLines(text).map(({ text: raw, line }) => {
    const arrow = raw.indexOf("->");
    if (arrow < 0) {
      if (raw.includes(",")) return parseColumnRule(raw, file, line);
      throw new DescriptionLoadError(file, line, `Expected "target -> replacement / left _ right", got "${raw}".`);
    }
    const target = raw.slice(0, arrow).trim();
    if (!target) throw new DescriptionLoadError(file, line, "Rule has an empty target.");

    const rest = raw.slice(arrow + 2);
    const slash = rest.indexOf("/");
    const rhs = (slash < 0 ? rest : rest.slice(0, slash)).trim();
    const replacement = EMPTY_REPLACEMENTS.has(rhs) ? "" : rhs;
    if (slash < 0) return { target, replacement, left: "", right: "" };

    const context = rest.slice(slash + 1);
    const gap = context.indexOf("_");
    if (gap < 0 || context.indexOf("_", gap + 1) >= 0) {
      throw new DescriptionLoadError(file, line, `Context "${context.trim()}" must contain exactly one "_".`);
    }
    return { target, replacement, left: context.slice(0, gap).trim(), right: context.slice(gap + 1).trim() };
  });
}

function parseColumnRule(raw: string, file: string, line: number): PhonologyRule {
  const [target, first, second, ...extra] = raw.split(",").map(p => p.trim());
  if (!target || first === undefined || second === undefined || extra.length > 0) {
    throw new DescriptionLoadError(file, line, `Expected "sequence,first,second", got "${raw}".`);
  }
  return { target, replacement: first + second, left: "", right: "" };
}

// ─── eval.txt / vowels.txt ────────────────────────────────────────────────────

/** One expected surface form per line */
export function parseEvaluation(text: string): string[] {
  return contentLines(text).map(l => l.text);
}

/** Whitespace-separated vowel symbols */
export function parseVowels(text: string, file = "vowels.txt"): string[] {
  const vowels = text.split(/\s+/).filter(v => v !== "");
  if (vowels.length === 0) throw new DescriptionLoadError(file, null, "No vowels listed.");
  return vowels;
}

// ─── Internals ────────────────────────────────────────────────────────────────

function contentLines(text: string): Line[] {
  return text
    .split(/\r?\n/)
    .map((t, i) => ({ text: t.trim(), line: i + 1 }))
    .filter(l => l.text !== "");
}

function parseLabel(raw: string, file: string, line: number): string {
  const label = raw.trim();
  if (!/^[^\s,\[\]]+$/.test(label)) {
    throw new DescriptionLoadError(file, line, `Invalid label "${raw}".`);
  }
  return label;
}

function parseDaughter(raw: string, file: string, line: number): Daughter {
  const match = /^([^\s,\[\]]+)(?:\[([^\]]*)\])?$/.exec(raw.trim());
  if (!match) throw new DescriptionLoadError(file, line, `Invalid daughter "${raw}"; expected a label or label[feature.feature].`);
  return { label: match[1] ?? "", features: splitFeatures(match[2] ?? "") };
}

function splitFeatures(raw: string): string[] {
  return raw.split(".").map(f => f.trim()).filter(f => f !== "");
}
