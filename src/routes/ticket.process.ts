import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { processTicketBodySchema } from "../lib/ticket/validate";
import {
  buildValidationPayload,
  finalizeRequest,
  isAuthorized,
  logRequestStart,
  toErrorResponse,
  unauthorizedPayload,
} from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const buildProcessTicketHandler =
  (fastify: FastifyInstance, deps: PipelineRouteDeps) =>
  async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const context = { request_id: randomUUID(), endpoint: "/ticket/process", started_at: Date.now() };
    logRequestStart(fastify, context);

    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return finalizeRequest(fastify, reply, context, unauthorizedPayload, {
        ok: false,
        error_code: "UNAUTHORIZED",
        status: 401,
      });
    }

    const validation = processTicketBodySchema.safeParse(request.body);
    if (!validation.success) {
      const payload = buildValidationPayload(validation.error);
      return finalizeRequest(fastify, reply, context, payload, { ok: false, error_code: payload.error_code });
    }

    const { ticket, notes, timeout_ms } = validation.data;
    const scoped = { ...context, ticket_id: ticket.ticket_id };
    try {
      const result = await deps.pipeline.processTicket(ticket, notes, { timeoutMs: timeout_ms });
      deps.ring.push({
        request_id: scoped.request_id,
        endpoint: scoped.endpoint,
        ticket_id: ticket.ticket_id,
        decision: result.decision.decision,
        method_used: result.decision.method_used,
        policy_applied: result.decision.policy_applied,
        customer_email: result.customer_info?.email ?? null,
        tags: result.tags,
        duration_ms: Date.now() - scoped.started_at,
      });
      return finalizeRequest(fastify, reply, scoped, { ok: true, ...result }, { ok: true });
    } catch (err) {
      fastify.log.error({ err, ticket_id: ticket.ticket_id }, "Ticket processing failed");
      const { payload, outcome } = toErrorResponse(err);
      return finalizeRequest(fastify, reply, scoped, payload, outcome);
    }
  };
