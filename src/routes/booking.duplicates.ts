import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { analyzeDuplicatesBodySchema } from "../lib/ticket/validate";
import {
  buildValidationPayload,
  finalizeRequest,
  isAuthorized,
  logRequestStart,
  unauthorizedPayload,
} from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const buildDuplicatesHandler =
  (fastify: FastifyInstance, deps: PipelineRouteDeps) =>
  async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const context = { request_id: randomUUID(), endpoint: "/booking/duplicates", started_at: Date.now() };
    logRequestStart(fastify, context);

    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return finalizeRequest(fastify, reply, context, unauthorizedPayload, {
        ok: false,
        error_code: "UNAUTHORIZED",
        status: 401,
      });
    }

    const validation = analyzeDuplicatesBodySchema.safeParse(request.body);
    if (!validation.success) {
      const payload = buildValidationPayload(validation.error);
      return finalizeRequest(fastify, reply, context, payload, { ok: false, error_code: payload.error_code });
    }

    const result = deps.pipeline.analyzeDuplicates(validation.data.bookings);
    return finalizeRequest(fastify, reply, context, { ok: true, result }, { ok: true });
  };
