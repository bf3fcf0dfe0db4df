import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { isAuthorized } from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const registerDebugRoutes = (fastify: FastifyInstance, deps: PipelineRouteDeps) => {
  fastify.get("/debug/decisions", async (request: FastifyRequest, reply: FastifyReply) => {
    if (!deps.debugEndpoints) {
      return reply.status(404).send({ ok: false, error_code: "NOT_FOUND", message: "Debug endpoints are disabled" });
    }
    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return reply.status(401).send({ ok: false, error_code: "UNAUTHORIZED", message: "Unauthorized" });
    }
    return reply.send({ ok: true, decisions: deps.ring.list() });
  });
};
