import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ZodError } from "zod";
import { AuthenticationError, errorMessage } from "../errors";
import { formatZodError } from "./validate";

export type RequestContext = {
  request_id: string;
  endpoint: string;
  ticket_id?: string;
  started_at: number;
};

export const extractBearerToken = (headers: FastifyRequest["headers"]) => {
  const authHeader = headers.authorization;
  const authValue = Array.isArray(authHeader) ? authHeader[0] : authHeader || "";
  if (authValue) {
    if (authValue.toLowerCase().startsWith("bearer ")) {
      return authValue.slice(7);
    }
    return authValue;
  }

  const altHeader = headers["x-api-key"];
  const altValue = Array.isArray(altHeader) ? altHeader[0] : altHeader || "";
  return altValue;
};

/** An unset server token rejects every caller. */
export const isAuthorized = (headers: FastifyRequest["headers"], expectedToken: string | undefined) =>
  Boolean(expectedToken) && extractBearerToken(headers) === expectedToken;

export const logRequestStart = (fastify: FastifyInstance, context: RequestContext) => {
  fastify.log.info(
    {
      request_id: context.request_id,
      endpoint: context.endpoint,
      ticket_id: context.ticket_id,
    },
    "Pipeline request start"
  );
};

export const buildValidationPayload = (error: ZodError) => {
  const { message, missing_fields } = formatZodError(error);
  return {
    ok: false as const,
    error_code: "VALIDATION_ERROR" as const,
    message,
    missing_fields,
  };
};

export const unauthorizedPayload = { ok: false, error_code: "UNAUTHORIZED", message: "Unauthorized" } as const;

export const finalizeRequest = (
  fastify: FastifyInstance,
  reply: FastifyReply,
  context: RequestContext,
  payload: Record<string, unknown>,
  outcome: { ok: boolean; error_code?: string; status?: number }
) => {
  const duration_ms = Date.now() - context.started_at;
  fastify.log.info(
    {
      request_id: context.request_id,
      endpoint: context.endpoint,
      ticket_id: context.ticket_id,
      ok: outcome.ok,
      error_code: outcome.error_code,
      duration_ms,
    },
    "Pipeline request end"
  );
  if (outcome.error_code === "UNAUTHORIZED") {
    fastify.log.warn({ request_id: context.request_id, endpoint: context.endpoint }, "Pipeline authorization failed");
  }

  return reply
    .status(outcome.status ?? 200)
    .header("Content-Type", "application/json; charset=utf-8")
    .send(payload);
};

/** Provider authentication failures surface as 502; anything else is an internal error. */
export const toErrorResponse = (err: unknown) => {
  if (err instanceof AuthenticationError) {
    return {
      payload: { ok: false, error_code: "PROVIDER_AUTH_FAILED", message: err.message },
      outcome: { ok: false, error_code: "PROVIDER_AUTH_FAILED", status: 502 },
    };
  }
  return {
    payload: { ok: false, error_code: "INTERNAL_ERROR", message: errorMessage(err) },
    outcome: { ok: false, error_code: "INTERNAL_ERROR", status: 500 },
  };
};
