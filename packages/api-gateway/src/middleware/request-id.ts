import type { FastifyRequest, FastifyReply } from "fastify";

/**
 * Echoes the request's correlation ID back in the X-Request-ID header.
 * Fastify takes the ID from the incoming header or generates one.
 */
export async function echoRequestId(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  void reply.header("x-request-id", request.id);
}
