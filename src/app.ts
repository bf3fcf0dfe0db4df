import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { buildDuplicatesHandler } from "./routes/booking.duplicates";
import { buildVerifyBookingHandler } from "./routes/booking.verify";
import { registerDebugRoutes } from "./routes/debug.decisions";
import type { PipelineRouteDeps } from "./routes/deps";
import { buildRenderNoteHandler } from "./routes/notes.render";
import { buildDecideHandler } from "./routes/refund.decide";
import { buildProcessTicketHandler } from "./routes/ticket.process";

export type BuildInfo = { git_sha?: string; build_time?: string };

export type AppDeps = PipelineRouteDeps & { build?: BuildInfo };

/**
 * Builds the HTTP surface without listening, so tests can `inject` against it.
 * `setup` runs after plugins load and receives the instance, so services can log through `fastify.log`.
 */
export const buildApp = async (
  setup: (fastify: FastifyInstance) => AppDeps | Promise<AppDeps>,
  options: FastifyServerOptions = { logger: true }
) => {
  const fastify = Fastify(options);

  await fastify.register(cors, {
    origin: true,
  });

  const deps = await setup(fastify);

  fastify.setErrorHandler((error, request, reply) => {
    fastify.log.error({ err: error, url: request.url }, "Uncaught route error");
    return reply.status(error.statusCode ?? 500).send({
      ok: false,
      error_code: "UNCAUGHT_ERROR",
      message: error.message || "Unexpected error",
    });
  });

  fastify.setNotFoundHandler((request, reply) =>
    reply.status(404).send({
      ok: false,
      error_code: "NOT_FOUND",
      message: `Route ${request.method}:${request.url} not found`,
    })
  );

  fastify.get("/health", async () => ({
    ok: true,
    git_sha: deps.build?.git_sha ?? "unknown",
    build_time: deps.build?.build_time ?? "unknown",
  }));

  fastify.post("/refund/decide", buildDecideHandler(fastify, deps));
  fastify.post("/booking/verify", buildVerifyBookingHandler(fastify, deps));
  fastify.post("/booking/duplicates", buildDuplicatesHandler(fastify, deps));
  fastify.post("/notes/render", buildRenderNoteHandler(fastify, deps));
  fastify.post("/ticket/process", buildProcessTicketHandler(fastify, deps));
  registerDebugRoutes(fastify, deps);

  return fastify;
};
