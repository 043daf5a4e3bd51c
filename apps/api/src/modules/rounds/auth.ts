import type { FastifyReply, FastifyRequest } from "fastify";

export function createBearerAuth(expectedToken: string | undefined) {
  return async function requireBearerToken(request: FastifyRequest, reply: FastifyReply) {
    if (!expectedToken) {
      return reply
        .code(500)
        .send({ error: "server_misconfigured", message: "PAGESMITH_API_TOKEN is not configured." });
    }

    const header = request.headers.authorization;
    const actualToken = header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : undefined;

    if (!actualToken || actualToken !== expectedToken) {
      return reply.code(401).send({ error: "unauthorized", message: "Bearer token required." });
    }
  };
}
