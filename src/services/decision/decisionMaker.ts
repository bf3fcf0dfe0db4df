import { todayIso } from "../../lib/dates";
import { errorMessage } from "../../lib/errors";
import type { LanguageModel } from "../../lib/llm/gemini";
import { logOpsEvent } from "../../lib/opsEvents";
import type {
  BookingInfo,
  DecisionEvidence,
  DecisionMethod,
  DecisionResult,
  Logger,
  TicketData,
  VerifiedBooking,
} from "../../types/refund";
import { extractBookingInfo } from "../bookingExtractor";
import { emptyBookingInfo, fillMissing } from "../bookingPatterns";
import { mapCancellationReason } from "./cancellationReason";
import { analyzeWithLlm } from "./llmAnalyzer";
import type { PolicyCache } from "./policy";
import { applyRules, type RuleOutcome } from "./rules";

export type DecisionMakerDeps = {
  policies: PolicyCache;
  model?: LanguageModel | null;
  llmTimeoutMs: number;
  logger?: Logger;
  now?: () => number;
};

type Verdict = Pick<DecisionResult, "decision" | "reasoning" | "policy_applied" | "confidence" | "key_factors">;

const fromVerifiedBooking = (verified: VerifiedBooking): BookingInfo => ({
  ...emptyBookingInfo(),
  booking_id: verified.booking_id,
  event_date: verified.arrival_date,
  location: verified.location,
  amount: verified.amount_paid,
  customer_email: verified.customer_email,
});

const escalation = (policy_applied: string, reasoning: string, key_factors: string[]): Verdict => ({
  decision: "Needs Human Review",
  confidence: "low",
  policy_applied,
  reasoning,
  key_factors,
});

const fromRule = (outcome: RuleOutcome): Verdict => ({
  decision: outcome.decision === "Uncertain" ? "Needs Human Review" : outcome.decision,
  confidence: outcome.confidence,
  policy_applied: outcome.policy_rule,
  reasoning: outcome.reasoning,
  key_factors: outcome.key_factors,
});

export const createDecisionMaker = (deps: DecisionMakerDeps) => {
  const now = deps.now ?? Date.now;

  const resolveBookingInfo = async (ticket: TicketData, notes: string | null | undefined, evidence: DecisionEvidence) => {
    const verified = evidence.verified_booking ?? null;
    const extraction = await extractBookingInfo({
      notes: notes && notes.trim() !== "" ? notes : ticket.description,
      // a verified booking already carries the critical facts
      model: verified ? null : deps.model,
      timeoutMs: deps.llmTimeoutMs,
      logger: deps.logger,
    });
    return verified ? fillMissing(fromVerifiedBooking(verified), extraction.booking_info) : extraction.booking_info;
  };

  const consultModel = async (
    ticket: TicketData,
    booking_info: BookingInfo,
    outcome: RuleOutcome
  ): Promise<Verdict> => {
    if (!deps.model) {
      return escalation(
        outcome.policy_rule,
        `${outcome.reasoning} Automated analysis is not configured, so a specialist needs to review this case.`,
        [...outcome.key_factors, "Language model not configured"]
      );
    }

    let policy_text: string;
    try {
      policy_text = await deps.policies.getCondensedPolicy();
    } catch (err) {
      deps.logger?.error({ err: errorMessage(err) }, "Condensed policy unavailable");
      return escalation(
        "Escalation - Technical Failure",
        `Unable to load the refund policy for analysis (${errorMessage(err)}). Human review required.`,
        ["Policy document unavailable"]
      );
    }

    const analysis = await analyzeWithLlm({
      model: deps.model,
      ticket,
      booking_info,
      policy_text,
      rule_outcome: outcome,
      timeoutMs: deps.llmTimeoutMs,
      logger: deps.logger,
    });
    if (!analysis.ok) {
      if (deps.logger) {
        logOpsEvent(deps.logger, "LLM_FALLBACK_FAILED", {
          ticket_id: ticket.ticket_id,
          error_code: analysis.error_code,
          message: analysis.message,
        });
      }
      return escalation(
        "Escalation - Technical Failure",
        `Unable to complete automated analysis (${analysis.message}). A specialist needs to review this case.`,
        ["LLM analysis failed", outcome.policy_rule]
      );
    }
    return analysis.verdict;
  };

  const makeDecision = async (
    ticket: TicketData,
    notes?: string | null,
    evidence: DecisionEvidence = {}
  ): Promise<DecisionResult> => {
    const startedAt = now();
    const finish = (verdict: Verdict, method_used: DecisionMethod, booking_info_found: boolean): DecisionResult => {
      const result: DecisionResult = {
        ...verdict,
        cancellation_reason:
          verdict.decision === "Approved" ? mapCancellationReason(verdict.reasoning, verdict.policy_applied) : null,
        booking_info_found,
        method_used,
        processing_time_ms: Math.max(0, Math.round(now() - startedAt)),
      };
      if (deps.logger) {
        logOpsEvent(deps.logger, "DECISION_MADE", {
          ticket_id: ticket.ticket_id,
          decision: result.decision,
          confidence: result.confidence,
          method_used,
          processing_time_ms: result.processing_time_ms,
        });
      }
      return result;
    };

    const booking_info = await resolveBookingInfo(ticket, notes, evidence);
    if (!booking_info.booking_id && !booking_info.event_date) {
      return finish(
        escalation(
          "Data Validation - Incomplete Information",
          "Unable to find booking information in the ticket. The booking ID and event date are both missing, so a specialist needs to gather them.",
          ["No booking ID", "No event date"]
        ),
        "extraction_failed",
        false
      );
    }

    let outcome: RuleOutcome;
    try {
      const rules = await deps.policies.getRules();
      outcome = applyRules({
        booking_info,
        ticket,
        rules,
        duplicate_result: evidence.duplicate_result,
        verified_booking: evidence.verified_booking,
        today: todayIso(new Date(now())),
      });
    } catch (err) {
      deps.logger?.error({ err: errorMessage(err), ticket_id: ticket.ticket_id }, "Refund rules unavailable");
      return finish(
        escalation(
          "Technical Error - Rules Unavailable",
          `Refund rules could not be applied (${errorMessage(err)}). Human review required.`,
          ["Rule evaluation failed"]
        ),
        "rules",
        true
      );
    }

    if (outcome.decision !== "Uncertain") {
      deps.logger?.info({ ticket_id: ticket.ticket_id, policy_rule: outcome.policy_rule }, "Rule matched");
      return finish(fromRule(outcome), "rules", true);
    }

    deps.logger?.info({ ticket_id: ticket.ticket_id, policy_rule: outcome.policy_rule }, "Rules uncertain, consulting LLM");
    const verdict = await consultModel(ticket, booking_info, outcome);
    return finish(verdict, outcome.has_evidence ? "hybrid" : "llm", true);
  };

  return { makeDecision };
};

export type DecisionMaker = ReturnType<typeof createDecisionMaker>;
