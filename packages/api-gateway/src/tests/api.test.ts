import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { FIXTURE_BABA, FIXTURE_TOBAK } from "@redup/shared-types";
import { initConfig } from "../config/index.js";
import { buildApp } from "../app.js";

let app: FastifyInstance;

beforeAll(async () => {
  initConfig({ logLevel: "silent", maxParadigmCells: 8 });
  app = await buildApp();
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

// ─── Health ───────────────────────────────────────────────────────────────────

describe("health", () => {
  it("GET /health answers ok", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok" });
  });

  it("unknown routes use the error envelope", async () => {
    const res = await app.inject({ method: "GET", url: "/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ data: null, errors: [{ code: "NOT_FOUND", message: "GET /nope not found." }] });
  });
});

// ─── Derivation ───────────────────────────────────────────────────────────────

describe("POST /v1/derive", () => {
  it("returns the word and every snapshot", async () => {
    const res = await app.inject({
      method: "POST", url: "/v1/derive",
      headers: { "x-request-id": "test-request" },
      payload: { description: FIXTURE_BABA },
    });
    expect(res.statusCode).toBe(200);
    expect(res.headers["x-request-id"]).toBe("test-request");
    const body = res.json();
    expect(body.requestId).toBe("test-request");
    expect(body.data.word).toBe("baba");
    expect(body.data.reduplicant).toBe("ba");
    expect(body.data.snapshots.map((s: { stage: string }) => s.stage))
      .toEqual(["built", "attached", "filled", "inserted", "phonologized"]);
    expect(body.data.snapshots[4].bracketed).toBe("[RedP [RED ba] [Root [T ba]]]");
  });

  it("maps derivation errors to 422", async () => {
    const description = { ...FIXTURE_TOBAK, vocabulary: FIXTURE_TOBAK.vocabulary.filter(e => e.head !== "T") };
    const res = await app.inject({ method: "POST", url: "/v1/derive", payload: { description } });
    expect(res.statusCode).toBe(422);
    expect(res.json().errors).toEqual([{
      code: "VOCABULARY_INSERTION_ERROR",
      stage: "inserted",
      subject: "T",
      message: 'No vocabulary entry for terminal "T".',
    }]);
  });

  it("rejects an invalid body", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/derive", payload: { description: {} } });
    expect(res.statusCode).toBe(400);
    expect(res.json().errors).toEqual([{ code: "BAD_REQUEST", message: "description.phraseStructure: Required" }]);
  });
});

describe("POST /v1/paradigm", () => {
  it("derives every cell", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/paradigm", payload: { description: FIXTURE_TOBAK } });
    expect(res.statusCode).toBe(200);
    const { data } = res.json();
    expect(data.baseWords).toEqual(["tobaganu", "tobagan", "tobagu", "tobak"]);
    expect(data.reduplicatedWords).toEqual(["tobatobaganu", "tobatobagan", "tobatobagu", "tobatobak"]);
    expect(data.cells).toHaveLength(8);
    expect(data.cells[0]).toEqual({
      label: "prog.past", kind: "base", spec: { Asp: ["prog"], T: ["past"] }, status: "ok", word: "tobaganu",
    });
    expect(data.evaluation).toBeNull();
  });

  it("refuses paradigms over the configured size", async () => {
    const description = {
      ...FIXTURE_TOBAK,
      reduplication: [...FIXTURE_TOBAK.reduplication, { target: "AspP", environment: "", epenthesis: "" }],
    };
    const res = await app.inject({ method: "POST", url: "/v1/paradigm", payload: { description } });
    expect(res.statusCode).toBe(422);
    expect(res.json().errors[0].code).toBe("PARADIGM_TOO_LARGE");
  });

  it("refuses a combinatorially large paradigm before enumerating it", async () => {
    const heads = Array.from({ length: 11 }, (_unused, i) => `H${i}`);
    const description = {
      phraseStructure: [{ mother: "S", daughters: [{ label: "H0" }] }],
      vocabulary: heads.flatMap(head => [
        { head, features: ["a"], phonology: "ka" },
        { head, features: ["b"], phonology: "ki" },
        { head, phonology: "ku" },
      ]),
      template: { shape: "full" },
    };
    const started = Date.now();
    const res = await app.inject({ method: "POST", url: "/v1/paradigm", payload: { description } });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(res.statusCode).toBe(422);
    expect(res.json().errors).toEqual([{
      code: "PARADIGM_TOO_LARGE",
      message: "The paradigm has 177147 cells; at most 8 are derived per request.",
    }]);
  });
});

describe("POST /v1/validate", () => {
  it("returns the validation result", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/validate", payload: { description: FIXTURE_BABA } });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ valid: true, errors: [], warnings: [] });
  });
});

describe("POST /v1/render", () => {
  const tree = { label: "Root", children: [{ label: "T", phonology: "ba" }] };

  it("returns SVG", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/render", payload: { tree } });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^image\/svg\+xml/);
    expect(res.body.startsWith("<svg")).toBe(true);
  });

  it("returns text formats in the envelope", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/render", payload: { tree, format: "bracketed" } });
    expect(res.json().data).toEqual({ format: "bracketed", content: "[Root [T ba]]" });
  });
});
