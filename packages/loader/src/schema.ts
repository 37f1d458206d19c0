/**
 * JSON form of a language description (`description.json`, HTTP bodies).
 * Mirrors LanguageDescription; optional tables default to empty.
 */
import { z } from "zod";
import type { LanguageDescription } from "@redup/shared-types";
import { DEFAULT_VOWELS, DescriptionLoadError } from "@redup/shared-types";

const Label = z.string().min(1).regex(/^[^\s,\[\]]+$/, "Labels may not contain whitespace, commas or brackets");

const DaughterSchema = z.object({
  label: Label,
  features: z.array(z.string().min(1)).default([]),
});

export const PhraseStructureRuleSchema = z.object({
  mother: Label,
  daughters: z.union([z.tuple([DaughterSchema]), z.tuple([DaughterSchema, DaughterSchema])]),
});

export const VocabularyEntrySchema = z.object({
  head: Label,
  features: z.array(z.string().min(1)).default([]),
  phonology: z.string(),
});

export const ReduplicationRuleSchema = z.object({
  target: Label,
  environment: z.string().default(""),
  epenthesis: z.string().default(""),
});

export const PhonologyRuleSchema = z.object({
  target: z.string().min(1),
  replacement: z.string(),
  left: z.string().default(""),
  right: z.string().default(""),
});

export const LanguageDescriptionSchema = z.object({
  name: z.string().default("description"),
  startLabel: z.string().optional(),
  phraseStructure: z.array(PhraseStructureRuleSchema).min(1),
  vocabulary: z.array(VocabularyEntrySchema).min(1),
  reduplication: z.array(ReduplicationRuleSchema).default([]),
  template: z.object({
    shape: z.enum(["full", "bisyllabic"]),
    epenthesis: z.string().default(""),
  }),
  phonology: z.array(PhonologyRuleSchema).default([]),
  vowels: z.array(z.string().min(1)).min(1).optional(),
  evaluation: z.array(z.string()).optional(),
});

export type LanguageDescriptionInput = z.input<typeof LanguageDescriptionSchema>;
export type ParsedDescription = z.output<typeof LanguageDescriptionSchema>;

/** Fill in the defaults that depend on other fields */
export function toDescription(parsed: ParsedDescription): LanguageDescription {
  return {
    name: parsed.name,
    startLabel: parsed.startLabel ?? parsed.phraseStructure[0]?.mother ?? "",
    phraseStructure: parsed.phraseStructure,
    vocabulary: parsed.vocabulary,
    reduplication: parsed.reduplication,
    template: parsed.template,
    phonology: parsed.phonology,
    vowels: parsed.vowels ?? [...DEFAULT_VOWELS],
    ...(parsed.evaluation !== undefined ? { evaluation: parsed.evaluation } : {}),
  };
}

/** Validate an untrusted value; the first issue becomes a DescriptionLoadError */
export function parseDescriptionJson(value: unknown, file = "description.json"): LanguageDescription {
  const parsed = LanguageDescriptionSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new DescriptionLoadError(file, null, `${where}${issue?.message ?? "Invalid description"}`);
  }
  return toDescription(parsed.data);
}
