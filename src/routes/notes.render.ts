import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { renderNoteBodySchema } from "../lib/ticket/validate";
import {
  buildValidationPayload,
  finalizeRequest,
  isAuthorized,
  logRequestStart,
  unauthorizedPayload,
} from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const buildRenderNoteHandler =
  (fastify: FastifyInstance, deps: PipelineRouteDeps) =>
  async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const context = { request_id: randomUUID(), endpoint: "/notes/render", started_at: Date.now() };
    logRequestStart(fastify, context);

    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return finalizeRequest(fastify, reply, context, unauthorizedPayload, {
        ok: false,
        error_code: "UNAUTHORIZED",
        status: 401,
      });
    }

    const validation = renderNoteBodySchema.safeParse(request.body);
    if (!validation.success) {
      const payload = buildValidationPayload(validation.error);
      return finalizeRequest(fastify, reply, context, payload, { ok: false, error_code: payload.error_code });
    }

    const note = deps.pipeline.renderNote(validation.data);
    return finalizeRequest(fastify, reply, context, { ok: true, note }, { ok: true });
  };
