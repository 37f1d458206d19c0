import type { FastifyInstance } from "fastify";
import { getConfig } from "../config/index.js";

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  /** GET /health: liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready: readiness, with the limits in force */
  fastify.get("/health/ready", async (_request, reply) => {
    const config = getConfig();
    return reply.send({
      status: "ok",
      env: config.env,
      rateLimit: `${config.rateLimitMax} req / ${config.rateLimitWindowMs / 1000}s`,
      maxParadigmCells: config.maxParadigmCells,
    });
  });
}
