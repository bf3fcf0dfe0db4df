import type { RefundFeatureConfig } from "../config/refundFeature";
import { createGeminiModel } from "../lib/llm/gemini";
import { createParkWhizTokenProvider } from "../lib/parkwhiz-oauth";
import { createParkWhizClient } from "../parkwhiz";
import type { Logger } from "../types/refund";
import { createBookingVerifier, type BookingVerifier } from "./bookingVerifier";
import { createDecisionMaker } from "./decision/decisionMaker";
import { createFilePolicyStore, createPolicyCache } from "./decision/policy";
import { createRefundPipeline } from "./pipeline";

/**
 * Wires the long-lived collaborators once at start-up: the provider token cache,
 * the policy cache and the model adapter are shared by every ticket.
 */
export const createRefundServices = (config: RefundFeatureConfig, logger: Logger) => {
  const { parkwhiz, llm } = config;

  const model = llm.geminiApiKey ? createGeminiModel({ apiKey: llm.geminiApiKey, model: llm.geminiModel }) : null;

  const policies = createPolicyCache({
    store: createFilePolicyStore(config.policyDir),
    ttlSeconds: config.policyCacheTtlSeconds,
    logger,
  });

  let verifier: BookingVerifier | null = null;
  if (parkwhiz.clientId && parkwhiz.clientSecret) {
    const tokens = createParkWhizTokenProvider({
      baseUrl: parkwhiz.baseUrl,
      clientId: parkwhiz.clientId,
      clientSecret: parkwhiz.clientSecret,
      scope: parkwhiz.scope,
      timeoutMs: parkwhiz.timeoutMs,
      refreshMarginSeconds: parkwhiz.tokenRefreshMarginSeconds,
    });
    const client = createParkWhizClient({
      baseUrl: parkwhiz.baseUrl,
      timeoutMs: parkwhiz.timeoutMs,
      getAccessToken: tokens.getAccessToken,
      invalidateToken: tokens.invalidate,
    });
    verifier = createBookingVerifier({
      client,
      maxAttempts: parkwhiz.maxRetries,
      retryBaseMs: parkwhiz.retryBaseMs,
      searchPaddingDays: parkwhiz.searchPaddingDays,
      logger,
    });
  }

  const decisionMaker = createDecisionMaker({ policies, model, llmTimeoutMs: llm.timeoutMs, logger });

  const pipeline = createRefundPipeline({
    decisionMaker,
    verifier,
    model,
    llmTimeoutMs: llm.timeoutMs,
    pipelineTimeoutMs: config.pipelineTimeoutMs,
    zapierFailureTags: config.zapierFailureTags,
    logger,
  });

  return { pipeline, policies, model, verifier };
};
