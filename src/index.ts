import env from "@fastify/env";
import dotenv from "dotenv";
import { buildApp } from "./app";
import { loadRefundFeatureConfig, validateRefundFeatureConfig } from "./config/refundFeature";
import { createDecisionRing } from "./lib/debug/decisionRing";
import { requireProductionEnv } from "./lib/env/requireEnv";
import { createRefundServices } from "./services/refundServices";

declare module "fastify" {
  interface FastifyInstance {
    config: {
      PORT: string;
      NODE_ENV: string;
      PIPELINE_BEARER_TOKEN?: string;
      GIT_SHA?: string;
      BUILD_TIME?: string;
    };
  }
}

const envSchema = {
  type: "object",
  required: [],
  properties: {
    PORT: { type: "string", default: "3000" },
    NODE_ENV: { type: "string", default: "development" },
    PIPELINE_BEARER_TOKEN: { type: "string" },
    DEBUG_ENDPOINTS: { type: "string" },
    GIT_SHA: { type: "string" },
    BUILD_TIME: { type: "string" },
    PARKWHIZ_CLIENT_ID: { type: "string" },
    PARKWHIZ_CLIENT_SECRET: { type: "string" },
    PARKWHIZ_SCOPE: { type: "string", default: "partner" },
    PARKWHIZ_ENV: { type: "string", default: "sandbox" },
    PARKWHIZ_SANDBOX_URL: { type: "string" },
    PARKWHIZ_PRODUCTION_URL: { type: "string" },
    PARKWHIZ_TIMEOUT_MS: { type: "string", default: "30000" },
    PARKWHIZ_MAX_RETRIES: { type: "string", default: "3" },
    PARKWHIZ_RETRY_BASE_MS: { type: "string", default: "500" },
    PARKWHIZ_SEARCH_PADDING_DAYS: { type: "string", default: "1" },
    PARKWHIZ_TOKEN_REFRESH_MARGIN_SECONDS: { type: "string", default: "300" },
    GEMINI_API_KEY: { type: "string" },
    GEMINI_MODEL: { type: "string", default: "gemini-1.5-flash" },
    LLM_TIMEOUT_MS: { type: "string", default: "10000" },
    POLICY_DIR: { type: "string" },
    POLICY_CACHE_TTL_SECONDS: { type: "string", default: "300" },
    PIPELINE_TIMEOUT_MS: { type: "string", default: "30000" },
    ZAPIER_FAILURE_TAGS: { type: "string" },
  },
};

const start = async () => {
  // Load .env and .env.local (local overrides)
  const beforeKeys = new Set(Object.keys(process.env));
  dotenv.config({ path: ".env" });
  dotenv.config({ path: ".env.local", override: true });
  const injectedCount = Object.keys(process.env).filter((key) => !beforeKeys.has(key)).length;

  const fastify = await buildApp(async (app) => {
    await app.register(env, {
      schema: envSchema,
      dotenv: false,
    });

    const environment = app.config.NODE_ENV;
    const productionEnv = requireProductionEnv();
    if (environment === "production" && !productionEnv.ok) {
      app.log.error({ missingEnv: productionEnv.response.missing_keys }, "Missing required env vars");
      throw new Error(productionEnv.response.message);
    }

    app.log.info({ env_files: [".env", ".env.local"], injected_keys: injectedCount, environment }, "Env loaded");
    app.log.info(
      { git_sha: app.config.GIT_SHA ?? "unknown", build_time: app.config.BUILD_TIME ?? "unknown", environment },
      "Server version"
    );

    const { config, issues } = validateRefundFeatureConfig(loadRefundFeatureConfig(process.env));
    if (issues.length > 0) {
      app.log.warn({ issues }, "Refund pipeline configuration issues detected");
    } else {
      app.log.info(
        {
          parkwhiz_environment: config.parkwhiz.environment,
          llm_model: config.llm.geminiModel,
          pipeline_timeout_ms: config.pipelineTimeoutMs,
        },
        "Refund pipeline configuration loaded"
      );
    }

    const { pipeline } = createRefundServices(config, app.log);
    return {
      pipeline,
      ring: createDecisionRing(),
      bearerToken: app.config.PIPELINE_BEARER_TOKEN,
      debugEndpoints: config.debugEndpoints,
      build: { git_sha: app.config.GIT_SHA, build_time: app.config.BUILD_TIME },
    };
  });

  try {
    const port = Number(fastify.config.PORT ?? 3000);
    const host = "0.0.0.0";
    await fastify.listen({ port, host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
