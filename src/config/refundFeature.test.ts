import { describe, expect, it } from "vitest";
import { loadRefundFeatureConfig, validateRefundFeatureConfig } from "./refundFeature";

describe("loadRefundFeatureConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadRefundFeatureConfig({});
    expect(config.parkwhiz.environment).toBe("sandbox");
    expect(config.parkwhiz.baseUrl).toBe("https://api-sandbox.parkwhiz.com/v4");
    expect(config.parkwhiz.scope).toBe("partner");
    expect(config.parkwhiz.maxRetries).toBe(3);
    expect(config.llm.timeoutMs).toBe(10_000);
    expect(config.policyCacheTtlSeconds).toBe(300);
    expect(config.zapierFailureTags).toEqual(["zapier_failed", "booking_not_found"]);
    expect(config.debugEndpoints).toBe(true);
  });

  it("selects the production url and parses overrides", () => {
    const config = loadRefundFeatureConfig({
      NODE_ENV: "production",
      PARKWHIZ_ENV: "production",
      PARKWHIZ_PRODUCTION_URL: "https://pw.example.test/v4/",
      PARKWHIZ_MAX_RETRIES: "5",
      LLM_TIMEOUT_MS: "not-a-number",
      ZAPIER_FAILURE_TAGS: " Zap_Fail , ,lookup_failed",
    });
    expect(config.parkwhiz.baseUrl).toBe("https://pw.example.test/v4");
    expect(config.parkwhiz.maxRetries).toBe(5);
    expect(config.llm.timeoutMs).toBe(10_000);
    expect(config.zapierFailureTags).toEqual(["zap_fail", "lookup_failed"]);
    expect(config.debugEndpoints).toBe(false);
  });
});

describe("validateRefundFeatureConfig", () => {
  it("reports missing credentials and inconsistent timeouts", () => {
    const config = loadRefundFeatureConfig({ LLM_TIMEOUT_MS: "40000", PIPELINE_TIMEOUT_MS: "30000" });
    const { issues } = validateRefundFeatureConfig(config);
    expect(issues).toEqual([
      "PARKWHIZ_CLIENT_ID and PARKWHIZ_CLIENT_SECRET are required for booking verification",
      "GEMINI_API_KEY is not set; uncertain tickets will go to human review",
      "LLM_TIMEOUT_MS must be lower than PIPELINE_TIMEOUT_MS",
    ]);
  });
});
