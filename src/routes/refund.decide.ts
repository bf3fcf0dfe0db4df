import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { decideRefundBodySchema } from "../lib/ticket/validate";
import {
  buildValidationPayload,
  finalizeRequest,
  isAuthorized,
  logRequestStart,
  toErrorResponse,
  unauthorizedPayload,
} from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const buildDecideHandler =
  (fastify: FastifyInstance, deps: PipelineRouteDeps) =>
  async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const context = { request_id: randomUUID(), endpoint: "/refund/decide", started_at: Date.now() };
    logRequestStart(fastify, context);

    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return finalizeRequest(fastify, reply, context, unauthorizedPayload, {
        ok: false,
        error_code: "UNAUTHORIZED",
        status: 401,
      });
    }

    const validation = decideRefundBodySchema.safeParse(request.body);
    if (!validation.success) {
      const payload = buildValidationPayload(validation.error);
      return finalizeRequest(fastify, reply, context, payload, { ok: false, error_code: payload.error_code });
    }

    const { ticket, notes, evidence } = validation.data;
    const scoped = { ...context, ticket_id: ticket.ticket_id };
    try {
      const decision = await deps.pipeline.decideRefund(ticket, notes, evidence);
      deps.ring.push({
        request_id: scoped.request_id,
        endpoint: scoped.endpoint,
        ticket_id: ticket.ticket_id,
        decision: decision.decision,
        method_used: decision.method_used,
        policy_applied: decision.policy_applied,
        customer_email: evidence.customer_info?.email ?? evidence.verified_booking?.customer_email ?? null,
        tags: [],
        duration_ms: Date.now() - scoped.started_at,
      });
      return finalizeRequest(fastify, reply, scoped, { ok: true, decision }, { ok: true });
    } catch (err) {
      fastify.log.error({ err, ticket_id: ticket.ticket_id }, "Refund decision failed");
      const { payload, outcome } = toErrorResponse(err);
      return finalizeRequest(fastify, reply, scoped, payload, outcome);
    }
  };
