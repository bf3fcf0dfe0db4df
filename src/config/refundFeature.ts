type Env = Record<string, string | undefined>;

const toBool = (value: string | undefined, fallback: boolean) => {
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
};

const toNumber = (value: string | undefined, fallback: number) => {
  if (typeof value !== "string" || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const splitKeywords = (value: string | undefined, fallback: string[]) => {
  if (!value) {
    return fallback;
  }
  const values = value
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);
  return values.length > 0 ? values : fallback;
};

export type ParkWhizEnvironment = "sandbox" | "production";

export type RefundFeatureConfig = {
  parkwhiz: {
    clientId?: string;
    clientSecret?: string;
    scope: string;
    environment: ParkWhizEnvironment;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseMs: number;
    searchPaddingDays: number;
    tokenRefreshMarginSeconds: number;
  };
  llm: {
    geminiApiKey?: string;
    geminiModel: string;
    timeoutMs: number;
  };
  policyDir?: string;
  policyCacheTtlSeconds: number;
  pipelineTimeoutMs: number;
  zapierFailureTags: string[];
  debugEndpoints: boolean;
};

export const loadRefundFeatureConfig = (env: Env): RefundFeatureConfig => {
  const environment: ParkWhizEnvironment = env.PARKWHIZ_ENV === "production" ? "production" : "sandbox";
  const sandboxUrl = env.PARKWHIZ_SANDBOX_URL || "https://api-sandbox.parkwhiz.com/v4";
  const productionUrl = env.PARKWHIZ_PRODUCTION_URL || "https://api.parkwhiz.com/v4";

  return {
    parkwhiz: {
      clientId: env.PARKWHIZ_CLIENT_ID || undefined,
      clientSecret: env.PARKWHIZ_CLIENT_SECRET || undefined,
      scope: env.PARKWHIZ_SCOPE || "partner",
      environment,
      baseUrl: (environment === "production" ? productionUrl : sandboxUrl).replace(/\/+$/, ""),
      timeoutMs: toNumber(env.PARKWHIZ_TIMEOUT_MS, 30_000),
      maxRetries: toNumber(env.PARKWHIZ_MAX_RETRIES, 3),
      retryBaseMs: toNumber(env.PARKWHIZ_RETRY_BASE_MS, 500),
      searchPaddingDays: toNumber(env.PARKWHIZ_SEARCH_PADDING_DAYS, 1),
      tokenRefreshMarginSeconds: toNumber(env.PARKWHIZ_TOKEN_REFRESH_MARGIN_SECONDS, 300),
    },
    llm: {
      geminiApiKey: env.GEMINI_API_KEY || undefined,
      geminiModel: env.GEMINI_MODEL || "gemini-1.5-flash",
      timeoutMs: toNumber(env.LLM_TIMEOUT_MS, 10_000),
    },
    policyDir: env.POLICY_DIR || undefined,
    policyCacheTtlSeconds: toNumber(env.POLICY_CACHE_TTL_SECONDS, 300),
    pipelineTimeoutMs: toNumber(env.PIPELINE_TIMEOUT_MS, 30_000),
    zapierFailureTags: splitKeywords(env.ZAPIER_FAILURE_TAGS, ["zapier_failed", "booking_not_found"]),
    debugEndpoints: toBool(env.DEBUG_ENDPOINTS, (env.NODE_ENV || "development") !== "production"),
  };
};

let cachedConfig: RefundFeatureConfig | null = null;

export const getRefundFeatureConfig = (): RefundFeatureConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = loadRefundFeatureConfig(process.env);
  return cachedConfig;
};

export const validateRefundFeatureConfig = (config: RefundFeatureConfig = getRefundFeatureConfig()) => {
  const issues: string[] = [];
  if (!config.parkwhiz.clientId || !config.parkwhiz.clientSecret) {
    issues.push("PARKWHIZ_CLIENT_ID and PARKWHIZ_CLIENT_SECRET are required for booking verification");
  }
  if (!config.llm.geminiApiKey) {
    issues.push("GEMINI_API_KEY is not set; uncertain tickets will go to human review");
  }
  if (config.parkwhiz.maxRetries < 1) {
    issues.push("PARKWHIZ_MAX_RETRIES must be at least 1");
  }
  if (config.llm.timeoutMs >= config.pipelineTimeoutMs) {
    issues.push("LLM_TIMEOUT_MS must be lower than PIPELINE_TIMEOUT_MS");
  }
  return { config, issues };
};
