import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { verifyBookingBodySchema } from "../lib/ticket/validate";
import {
  buildValidationPayload,
  finalizeRequest,
  isAuthorized,
  logRequestStart,
  toErrorResponse,
  unauthorizedPayload,
} from "../lib/ticket/runtime";
import type { PipelineRouteDeps } from "./deps";

export const buildVerifyBookingHandler =
  (fastify: FastifyInstance, deps: PipelineRouteDeps) =>
  async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const context = { request_id: randomUUID(), endpoint: "/booking/verify", started_at: Date.now() };
    logRequestStart(fastify, context);

    if (!isAuthorized(request.headers, deps.bearerToken)) {
      return finalizeRequest(fastify, reply, context, unauthorizedPayload, {
        ok: false,
        error_code: "UNAUTHORIZED",
        status: 401,
      });
    }

    const validation = verifyBookingBodySchema.safeParse(request.body);
    if (!validation.success) {
      const payload = buildValidationPayload(validation.error);
      return finalizeRequest(fastify, reply, context, payload, { ok: false, error_code: payload.error_code });
    }

    try {
      const verification = await deps.pipeline.verifyBooking(
        Object.freeze(validation.data.customer_info),
        validation.data.search_window
      );
      return finalizeRequest(fastify, reply, context, { ok: true, verification }, { ok: true });
    } catch (err) {
      fastify.log.error({ err }, "Booking verification failed");
      const { payload, outcome } = toErrorResponse(err);
      return finalizeRequest(fastify, reply, context, payload, outcome);
    }
  };
