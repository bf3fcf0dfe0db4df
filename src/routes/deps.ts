import type { DecisionRing } from "../lib/debug/decisionRing";
import type { RefundPipeline } from "../services/pipeline";

export type PipelineRouteDeps = {
  pipeline: RefundPipeline;
  ring: DecisionRing;
  bearerToken?: string;
  debugEndpoints: boolean;
};
