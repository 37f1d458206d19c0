/**
 * Derivation Routes. Stateless: the description travels in every body.
 *
 * POST /v1/derive     → one derivation with its snapshots
 * POST /v1/paradigm   → every cell of the paradigm, failures isolated
 * POST /v1/validate   → validation issues
 * POST /v1/render     → a tree as SVG, ASCII outline or bracketing
 *
 * Derivation errors surface through the app's error handler as 422.
 */

import type { FastifyInstance } from "fastify";
import type { DerivationSnapshot } from "@redup/shared-types";
import { toDescription } from "@redup/loader";
import { derive, deriveParadigm, evaluateWords, formatWordList, paradigmCells, paradigmSize } from "@redup/derivation";
import type { DerivationOutcome } from "@redup/derivation";
import { validate } from "@redup/validation";
import { renderAscii, renderBracketed, renderSvg } from "@redup/render";
import { getConfig } from "../config/index.js";
import { badRequest, fail, ok } from "./envelope.js";
import {
  DeriveBodySchema, ParadigmBodySchema, RenderBodySchema, ValidateBodySchema, firstIssue, toSyntaxNode
} from "./schemas.js";

export async function derivationRoutes(fastify: FastifyInstance): Promise<void> {

  // ── Single derivation ──────────────────────────────────────────────────────

  fastify.post("/v1/derive", async (req, reply) => {
    const parsed = DeriveBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(firstIssue(parsed.error), req.id));
    const { description, features, reduplicate, ruleIndex, cycleSnapshots } = parsed.data;

    const derivation = derive(toDescription(description), {
      ...(features !== undefined ? { features } : {}),
      ...(reduplicate !== undefined ? { reduplicate } : {}),
      ...(ruleIndex !== undefined ? { ruleIndex } : {}),
      ...(cycleSnapshots !== undefined ? { cycleSnapshots } : {}),
    });

    return reply.send(ok({
      word: derivation.word,
      reduplicant: derivation.reduplicant ?? null,
      rule: derivation.rule ?? null,
      spec: derivation.spec,
      snapshots: derivation.snapshots.map(describeSnapshot),
    }, req.id));
  });

  // ── Paradigm batch ─────────────────────────────────────────────────────────

  fastify.post("/v1/paradigm", async (req, reply) => {
    const parsed = ParadigmBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(firstIssue(parsed.error), req.id));
    const description = toDescription(parsed.data.description);

    const { maxParadigmCells } = getConfig();
    const size = paradigmSize(description);
    if (size > maxParadigmCells) {
      return reply.code(422).send(fail([{
        code: "PARADIGM_TOO_LARGE",
        message: `The paradigm has ${size} cells; at most ${maxParadigmCells} are derived per request.`,
      }], req.id));
    }
    const cells = paradigmCells(description);

    const result = deriveParadigm(description, parsed.data.cycleSnapshots ? { cycleSnapshots: true } : {}, cells);
    const evaluation = description.evaluation
      ? evaluateWords([...result.baseWords, ...result.reduplicatedWords], description.evaluation)
      : null;

    return reply.send(ok({
      baseWords: result.baseWords,
      reduplicatedWords: result.reduplicatedWords,
      wordList: formatWordList(result.baseWords, result.reduplicatedWords),
      cells: result.outcomes.map(o => describeOutcome(o, parsed.data.includeSnapshots ?? false)),
      evaluation,
      durationMs: result.durationMs,
    }, req.id));
  });

  // ── Validation ─────────────────────────────────────────────────────────────

  fastify.post("/v1/validate", async (req, reply) => {
    const parsed = ValidateBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(firstIssue(parsed.error), req.id));
    return reply.send(ok(validate(toDescription(parsed.data.description)), req.id));
  });

  // ── Rendering ──────────────────────────────────────────────────────────────

  fastify.post("/v1/render", async (req, reply) => {
    const parsed = RenderBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(firstIssue(parsed.error), req.id));
    const tree = toSyntaxNode(parsed.data.tree);
    const { format, title } = parsed.data;

    if (format === "svg") {
      return reply.type("image/svg+xml").send(renderSvg(tree, title !== undefined ? { title } : {}));
    }
    return reply.send(ok({ format, content: format === "ascii" ? renderAscii(tree) : renderBracketed(tree) }, req.id));
  });
}

// ─── Internals ────────────────────────────────────────────────────────────────

function describeSnapshot(s: DerivationSnapshot) {
  return {
    stage: s.stage,
    ...(s.cycle !== undefined ? { cycle: s.cycle } : {}),
    bracketed: renderBracketed(s.tree),
    tree: s.tree,
  };
}

function describeOutcome(o: DerivationOutcome, includeSnapshots: boolean) {
  const cell = {
    label: o.cell.label,
    kind: o.cell.kind,
    spec: o.cell.spec,
    ...(o.cell.ruleIndex !== undefined ? { ruleIndex: o.cell.ruleIndex } : {}),
    status: o.status,
  };
  switch (o.status) {
    case "ok":
      return {
        ...cell,
        word: o.derivation.word,
        ...(includeSnapshots ? { snapshots: o.derivation.snapshots.map(describeSnapshot) } : {}),
      };
    case "failed":
      return {
        ...cell,
        error: { code: o.error.code, stage: o.error.stage, subject: o.error.subject, message: o.error.message },
      };
    case "unlicensed":
      return { ...cell, reason: o.reason };
  }
}
