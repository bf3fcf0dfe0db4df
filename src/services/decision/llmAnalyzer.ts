import { z } from "zod";
import { completeSafely, parseJsonObject, type LanguageModel } from "../../lib/llm/gemini";
import type { BookingInfo, Confidence, Decision, Logger, TicketData } from "../../types/refund";
import type { RuleOutcome } from "./rules";

const MAX_DESCRIPTION_CHARS = 1000;

export const llmVerdictSchema = z.object({
  decision: z.enum(["Approved", "Denied", "Needs Human Review"]),
  reasoning: z.string().trim().min(1),
  policy_applied: z.string().trim().min(1),
  confidence: z.enum(["high", "medium", "low"]).catch("medium"),
  key_factors: z.array(z.string()).catch([]),
});

export type LlmVerdict = {
  decision: Decision;
  reasoning: string;
  policy_applied: string;
  confidence: Confidence;
  key_factors: string[];
};

export type LlmAnalysisResult =
  | { ok: true; verdict: LlmVerdict }
  | { ok: false; error_code: "TIMEOUT" | "REQUEST_FAILED" | "INVALID_RESPONSE"; message: string };

const formatBookingInfo = (info: BookingInfo) => {
  const lines = [
    info.booking_id && `- Booking ID: ${info.booking_id}`,
    info.amount !== null && `- Amount: $${info.amount.toFixed(2)}`,
    info.event_date && `- Event Date: ${info.event_date}`,
    info.reservation_date && `- Reservation Date: ${info.reservation_date}`,
    info.cancellation_date && `- Cancellation Date: ${info.cancellation_date}`,
    info.booking_type && `- Booking Type: ${info.booking_type}`,
    info.location && `- Location: ${info.location}`,
    info.customer_email && `- Customer Email: ${info.customer_email}`,
  ].filter((line): line is string => typeof line === "string" && line !== "");
  return lines.length > 0 ? lines.join("\n") : "Minimal booking information available";
};

const formatTicket = (ticket: TicketData) => {
  const description =
    ticket.description.length > MAX_DESCRIPTION_CHARS
      ? `${ticket.description.slice(0, MAX_DESCRIPTION_CHARS)}... (truncated)`
      : ticket.description;
  return [
    `- Ticket ID: ${ticket.ticket_id}`,
    `- Subject: ${ticket.subject}`,
    ticket.status ? `- Status: ${ticket.status}` : null,
    `- Description: ${description}`,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
};

export const buildAnalysisPrompt = (input: {
  ticket: TicketData;
  booking_info: BookingInfo;
  policy_text: string;
  rule_outcome?: RuleOutcome | null;
}) => {
  const ruleContext = input.rule_outcome
    ? [
        "# RULE-BASED ANALYSIS",
        "",
        `- Decision: ${input.rule_outcome.decision}`,
        `- Reasoning: ${input.rule_outcome.reasoning}`,
        `- Policy Rule: ${input.rule_outcome.policy_rule}`,
        "",
        "The rules could not settle this case, so your analysis is needed.",
        "",
      ].join("\n")
    : "";

  return `You are a refund policy expert reviewing a parking refund request. Decide fairly and follow the policy.

# REFUND POLICY

${input.policy_text}

# TICKET

${formatTicket(input.ticket)}

# BOOKING

${formatBookingInfo(input.booking_info)}

${ruleContext}
# TASK

Decide with one of:
- Approved: the policy clearly supports a refund
- Denied: the policy clearly rules a refund out
- Needs Human Review: the case is ambiguous, information is missing, or it needs judgment

Confidence is "high" for clear-cut cases, "medium" when some ambiguity remains, "low" otherwise.
Weigh the timing relative to the event, the booking type and any special circumstances.

Respond with a JSON object with exactly these fields:
{"decision": string, "reasoning": string, "policy_applied": string, "confidence": string, "key_factors": string[]}`;
};

/** One model call; every failure mode comes back as `{ ok: false }`. */
export const analyzeWithLlm = async (input: {
  model: LanguageModel;
  ticket: TicketData;
  booking_info: BookingInfo;
  policy_text: string;
  rule_outcome?: RuleOutcome | null;
  timeoutMs: number;
  logger?: Logger;
}): Promise<LlmAnalysisResult> => {
  const outcome = await completeSafely(input.model, buildAnalysisPrompt(input), { timeoutMs: input.timeoutMs });
  if (!outcome.ok) {
    input.logger?.warn({ error_code: outcome.error_code, message: outcome.message }, "LLM analysis failed");
    return outcome;
  }

  const json = parseJsonObject(outcome.text);
  if (!json) {
    return { ok: false, error_code: "INVALID_RESPONSE", message: "LLM response was not a JSON object" };
  }
  const parsed = llmVerdictSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    return { ok: false, error_code: "INVALID_RESPONSE", message: `LLM verdict invalid: ${fields}` };
  }

  input.logger?.info(
    { decision: parsed.data.decision, confidence: parsed.data.confidence },
    "LLM analysis completed"
  );
  return { ok: true, verdict: parsed.data };
};
