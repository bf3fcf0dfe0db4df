export type OpsEventName =
  | "DECISION_MADE"
  | "VERIFICATION_FAILED"
  | "DUPLICATES_DETECTED"
  | "LLM_FALLBACK_FAILED"
  | "PROVIDER_AUTH_FAILED"
  | "PIPELINE_TIMEOUT";

const ERROR_EVENTS: OpsEventName[] = ["PROVIDER_AUTH_FAILED"];

export const logOpsEvent = (
  logger: { info: (meta: unknown, message?: string) => void; error: (meta: unknown, message?: string) => void },
  event: OpsEventName,
  payload: Record<string, unknown>
) => {
  const meta = {
    event,
    ...payload,
  };
  if (ERROR_EVENTS.includes(event)) {
    logger.error(meta, "Operational event");
    return;
  }
  logger.info(meta, "Operational event");
};
