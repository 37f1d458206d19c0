/**
 * Request body schemas. Every route receives the full description in the
 * body; nothing is stored between requests.
 */
import { z } from "zod";
import type { SyntaxNode } from "@redup/shared-types";
import { LanguageDescriptionSchema } from "@redup/loader";

const SpecSchema = z.record(z.array(z.string().min(1)));

export const DeriveBodySchema = z.object({
  description: LanguageDescriptionSchema,
  features: SpecSchema.optional(),
  reduplicate: z.boolean().optional(),
  ruleIndex: z.number().int().min(0).optional(),
  cycleSnapshots: z.boolean().optional(),
});

export const ParadigmBodySchema = z.object({
  description: LanguageDescriptionSchema,
  cycleSnapshots: z.boolean().optional(),
  /** Include every snapshot of every cell, not just the words */
  includeSnapshots: z.boolean().optional(),
});

export const ValidateBodySchema = z.object({
  description: LanguageDescriptionSchema,
});

interface NodeInput {
  label: string;
  children?: NodeInput[] | undefined;
  features?: string[] | undefined;
  phonology?: string | undefined;
  environment?: string | undefined;
}

const NodeSchema: z.ZodType<NodeInput> = z.lazy(() =>
  z.object({
    label: z.string().min(1),
    children: z.array(NodeSchema).max(2).optional(),
    features: z.array(z.string()).optional(),
    phonology: z.string().optional(),
    environment: z.string().optional(),
  })
);

export const RenderBodySchema = z.object({
  tree: NodeSchema,
  format: z.enum(["svg", "ascii", "bracketed"]).default("svg"),
  title: z.string().max(200).optional(),
});

export function toSyntaxNode(input: NodeInput): SyntaxNode {
  return {
    label: input.label,
    children: (input.children ?? []).map(toSyntaxNode),
    features: input.features ?? [],
    ...(input.phonology !== undefined ? { phonology: input.phonology } : {}),
    ...(input.environment !== undefined ? { environment: input.environment } : {}),
  };
}

export function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid body";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
