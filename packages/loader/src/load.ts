import { readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { LanguageDescription } from "@redup/shared-types";
import { DEFAULT_VOWELS, DescriptionLoadError } from "@redup/shared-types";
import {
  parseEvaluation, parsePhonologyRules, parsePhraseStructure, parseReduplication,
  parseScope, parseVocabulary, parseVowels
} from "./parsers.js";
import { parseDescriptionJson } from "./schema.js";

export const DESCRIPTION_FILES = {
  json: "description.json",
  phraseStructure: "psr.txt",
  vocabulary: "vi_rules.txt",
  reduplication: "red.txt",
  scope: "scope.txt",
  phonology: "phono_rules.txt",
  evaluation: "eval.txt",
  vowels: "vowels.txt",
} as const;

/**
 * Read a description folder. A `description.json` takes precedence over
 * the text files. psr.txt, vi_rules.txt, red.txt and scope.txt are
 * required; the rest are optional.
 */
export async function loadDescription(folder: string): Promise<LanguageDescription> {
  const dir = resolve(folder);
  const name = basename(dir);

  const json = await readOptional(dir, DESCRIPTION_FILES.json);
  if (json !== null) {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (err) {
      throw new DescriptionLoadError(DESCRIPTION_FILES.json, null, `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const description = parseDescriptionJson(value);
    return description.name === "description" ? { ...description, name } : description;
  }

  const psr = parsePhraseStructure(await readRequired(dir, DESCRIPTION_FILES.phraseStructure));
  if (psr.rules.length === 0) {
    throw new DescriptionLoadError(DESCRIPTION_FILES.phraseStructure, null, "No phrase-structure rules.");
  }
  const vocabulary = parseVocabulary(await readRequired(dir, DESCRIPTION_FILES.vocabulary));
  const reduplication = parseReduplication(await readRequired(dir, DESCRIPTION_FILES.reduplication));
  const template = parseScope(await readRequired(dir, DESCRIPTION_FILES.scope), reduplication);
  const phonology = parsePhonologyRules(await readOptional(dir, DESCRIPTION_FILES.phonology) ?? "");
  const vowelText = await readOptional(dir, DESCRIPTION_FILES.vowels);
  const evalText = await readOptional(dir, DESCRIPTION_FILES.evaluation);

  return {
    name,
    startLabel: psr.startLabel,
    phraseStructure: psr.rules,
    vocabulary,
    reduplication,
    template,
    phonology,
    vowels: vowelText !== null ? parseVowels(vowelText) : [...DEFAULT_VOWELS],
    ...(evalText !== null ? { evaluation: parseEvaluation(evalText) } : {}),
  };
}

// ─── Internals ────────────────────────────────────────────────────────────────

async function readRequired(dir: string, file: string): Promise<string> {
  const text = await readOptional(dir, file);
  if (text === null) throw new DescriptionLoadError(file, null, `Required file not found in ${dir}.`);
  return text;
}

async function readOptional(dir: string, file: string): Promise<string | null> {
  try {
    return await readFile(join(dir, file), "utf8");
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
