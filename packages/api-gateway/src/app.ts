import { randomUUID } from "node:crypto";
import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { DerivationError } from "@redup/shared-types";

import { getConfig } from "./config/index.js";
import { echoRequestId } from "./middleware/request-id.js";
import { healthRoutes } from "./routes/health.routes.js";
import { derivationRoutes } from "./routes/derivation.routes.js";
import { fail } from "./routes/envelope.js";

export async function buildApp() {
  const config = getConfig();

  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    genReqId: () => randomUUID(),
    trustProxy: true,
    bodyLimit: config.bodyLimit,
    keepAliveTimeout: 5_000,
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
  });

  await fastify.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    keyGenerator: (request) => `ip:${request.ip}`,
    // The builder's result is thrown, so it reaches the error handler below
    errorResponseBuilder: (_request, context) => Object.assign(
      new Error(`Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.`),
      { statusCode: 429, code: "RATE_LIMITED" }
    ),
  });

  fastify.addHook("onRequest", echoRequestId);

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: { title: "Reduplication API", description: "Distributed Morphology reduplication derivations", version: "1.0.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes);
  await fastify.register(derivationRoutes);

  // ─── Error handlers ──────────────────────────────────────────────────────────

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof DerivationError) {
      request.log.info({ code: error.code, stage: error.stage, subject: error.subject }, error.message);
      void reply.code(422).send(fail([{
        code: error.code,
        stage: error.stage,
        subject: error.subject,
        message: error.message,
      }], request.id));
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    void reply.code(statusCode).send(fail([{
      code: error.code ?? "INTERNAL_ERROR",
      message: statusCode >= 500 ? "An internal server error occurred." : error.message,
    }], request.id));
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send(fail([{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }], request.id));
  });

  return fastify;
}
