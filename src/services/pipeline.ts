import { AuthenticationError, ExtractionError, errorMessage } from "../lib/errors";
import type { LanguageModel } from "../lib/llm/gemini";
import { logOpsEvent } from "../lib/opsEvents";
import type {
  BookingVerificationResult,
  CustomerInfo,
  DecisionEvidence,
  DecisionMethod,
  DecisionResult,
  DuplicateDetectionResult,
  Logger,
  SearchWindow,
  TicketData,
} from "../types/refund";
import { toVerifiedBooking, type BookingVerifier } from "./bookingVerifier";
import { extractCustomerInfo, requireCustomerFacts } from "./customerInfo";
import type { DecisionMaker } from "./decision/decisionMaker";
import { analyzeDuplicateBookings } from "./duplicates";
import { renderNote, type NoteEvidence } from "./verificationNote";
import { detectZapierFailure, type ZapierFailureResult } from "./zapierFailure";

export type RefundPipelineDeps = {
  decisionMaker: DecisionMaker;
  verifier?: BookingVerifier | null;
  model?: LanguageModel | null;
  llmTimeoutMs: number;
  pipelineTimeoutMs: number;
  zapierFailureTags?: string[];
  logger?: Logger;
  now?: () => number;
};

export type ProcessTicketResult = {
  decision: DecisionResult;
  note: string;
  tags: string[];
  zapier_failure: ZapierFailureResult;
  customer_info?: CustomerInfo;
  verification?: BookingVerificationResult;
  duplicates?: DuplicateDetectionResult;
};

type VerificationStage = {
  customer_info: CustomerInfo;
  preset_decision?: DecisionResult;
  evidence: DecisionEvidence;
  note: NoteEvidence;
  verification?: BookingVerificationResult;
  duplicates?: DuplicateDetectionResult;
};

const DECISION_TAGS: Record<DecisionResult["decision"], string> = {
  Approved: "refund_approved",
  Denied: "refund_denied",
  "Needs Human Review": "needs_human_review",
};

export const buildDecisionTags = (
  decision: DecisionResult,
  zapier: ZapierFailureResult,
  duplicates?: DuplicateDetectionResult
) => {
  const tags = [DECISION_TAGS[decision.decision]];
  if (zapier.is_failure) {
    tags.push("zapier_failure");
  }
  if (duplicates?.has_duplicates) {
    tags.push("duplicate_booking");
  }
  return tags;
};

const humanReview = (
  policy_applied: string,
  reasoning: string,
  method_used: DecisionMethod,
  key_factors: string[],
  processing_time_ms: number
): DecisionResult => ({
  decision: "Needs Human Review",
  reasoning,
  policy_applied,
  confidence: "low",
  cancellation_reason: null,
  booking_info_found: false,
  method_used,
  processing_time_ms,
  key_factors,
});

/** A verified booking the guard rejects still informs the decision, but nothing is automated on it. */
const applyVerificationGuard = (decision: DecisionResult, verification: BookingVerificationResult): DecisionResult => {
  if (verification.outcome !== "verified" || !verification.should_escalate || decision.decision === "Needs Human Review") {
    return decision;
  }
  return {
    ...decision,
    decision: "Needs Human Review",
    confidence: "low",
    cancellation_reason: null,
    reasoning: `${verification.escalation_reason ?? "Booking verification needs review"}. The automated outcome was ${decision.decision}: ${decision.reasoning}`,
    key_factors: [...decision.key_factors, "Verification requires manual review"],
  };
};

const verificationFailureText = (verification: BookingVerificationResult) => {
  switch (verification.outcome) {
    case "verification_failed":
      return verification.failure_reason;
    case "no_booking_found":
      return "No booking found for the customer email in the search window";
    default:
      return null;
  }
};

class PipelineTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`Ticket processing exceeded ${timeoutMs}ms`);
    this.name = "PipelineTimeout";
  }
}

const withDeadline = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PipelineTimeout(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
};

export const createRefundPipeline = (deps: RefundPipelineDeps) => {
  const now = deps.now ?? Date.now;

  const decideRefund = (ticket: TicketData, notes?: string | null, evidence?: DecisionEvidence) =>
    deps.decisionMaker.makeDecision(ticket, notes, evidence);

  const verifyBooking = async (customer: CustomerInfo, searchWindow?: SearchWindow | null) => {
    if (!deps.verifier) {
      throw new Error("Booking verification is not configured");
    }
    try {
      return await deps.verifier.verify(customer, searchWindow);
    } catch (err) {
      if (err instanceof AuthenticationError && deps.logger) {
        logOpsEvent(deps.logger, "PROVIDER_AUTH_FAILED", { status: err.status ?? null, message: err.message });
      }
      throw err;
    }
  };

  const analyzeDuplicates = (bookings: unknown[]) => {
    const result = analyzeDuplicateBookings(bookings, deps.logger);
    if (result.has_duplicates && deps.logger) {
      logOpsEvent(deps.logger, "DUPLICATES_DETECTED", {
        duplicate_count: result.duplicate_count,
        action: result.action,
        duplicate_booking_ids: result.duplicate_booking_ids,
      });
    }
    return result;
  };

  const runVerificationStage = async (
    ticket: TicketData,
    notes: string | null | undefined,
    startedAt: number
  ): Promise<VerificationStage> => {
    const text = [ticket.subject, notes && notes.trim() !== "" ? notes : ticket.description].join("\n");
    const customer_info = await extractCustomerInfo({
      text,
      ticket_timestamp: ticket.created_at ?? null,
      model: deps.model,
      timeoutMs: deps.llmTimeoutMs,
      logger: deps.logger,
    });

    try {
      requireCustomerFacts(customer_info);
    } catch (err) {
      if (!(err instanceof ExtractionError)) {
        throw err;
      }
      const preset_decision = humanReview(
        "Data Validation - Customer Information Missing",
        `${err.message}. A specialist needs to locate the booking manually.`,
        "extraction_failed",
        ["No customer email", "No booking dates"],
        Math.max(0, Math.round(now() - startedAt))
      );
      return { customer_info, preset_decision, evidence: {}, note: { verification_failure: err.message } };
    }

    if (!deps.verifier) {
      deps.logger?.warn({ ticket_id: ticket.ticket_id }, "Booking verification skipped, provider not configured");
      return {
        customer_info,
        evidence: { customer_info },
        note: { verification_failure: "Booking verification is not configured" },
      };
    }

    const verification = await verifyBooking(customer_info);
    const evidence: DecisionEvidence = { customer_info };
    const note: NoteEvidence = {};
    let duplicates: DuplicateDetectionResult | undefined;

    if (verification.outcome === "verified") {
      evidence.verified_booking = verification.verified_booking;
      note.verified_booking = verification.verified_booking;
    } else if (verification.outcome === "multiple_bookings") {
      duplicates = analyzeDuplicates(verification.candidates.map((booking) => booking.raw));
      evidence.duplicate_result = duplicates;
      note.candidates = verification.candidates.map((booking) => toVerifiedBooking(booking, customer_info));
      note.duplicates = duplicates;
    } else {
      const failure = verificationFailureText(verification);
      note.verification_failure = failure;
      if (deps.logger) {
        logOpsEvent(deps.logger, "VERIFICATION_FAILED", {
          ticket_id: ticket.ticket_id,
          outcome: verification.outcome,
          reason: failure,
          api_calls_made: verification.api_calls_made,
        });
      }
    }

    return { customer_info, verification, duplicates, evidence, note };
  };

  const runTicket = async (
    ticket: TicketData,
    notes: string | null | undefined,
    zapier_failure: ZapierFailureResult
  ): Promise<ProcessTicketResult> => {
    const startedAt = now();
    if (!zapier_failure.is_failure) {
      const decision = await decideRefund(ticket, notes);
      return {
        decision,
        note: renderNote({ decision }),
        tags: buildDecisionTags(decision, zapier_failure),
        zapier_failure,
      };
    }

    deps.logger?.info({ ticket_id: ticket.ticket_id, reason: zapier_failure.reason }, "Provisioning failure detected");
    const stage = await runVerificationStage(ticket, notes, startedAt);
    let decision = stage.preset_decision ?? (await decideRefund(ticket, notes, stage.evidence));
    if (stage.verification) {
      decision = applyVerificationGuard(decision, stage.verification);
    }

    return {
      decision,
      note: renderNote({ ...stage.note, decision, customer_info: stage.customer_info }),
      tags: buildDecisionTags(decision, zapier_failure, stage.duplicates),
      zapier_failure,
      customer_info: stage.customer_info,
      verification: stage.verification,
      duplicates: stage.duplicates,
    };
  };

  /**
   * Gate, extraction, verification, duplicates, decision and note for one ticket.
   * A run past `timeoutMs` is abandoned and the ticket goes to human review.
   */
  const processTicket = async (
    ticket: TicketData,
    notes?: string | null,
    options: { timeoutMs?: number } = {}
  ): Promise<ProcessTicketResult> => {
    const timeoutMs = options.timeoutMs ?? deps.pipelineTimeoutMs;
    const startedAt = now();
    const zapier_failure = detectZapierFailure(ticket, deps.zapierFailureTags);

    try {
      return await withDeadline(runTicket(ticket, notes, zapier_failure), timeoutMs);
    } catch (err) {
      if (!(err instanceof PipelineTimeout)) {
        throw err;
      }
      if (deps.logger) {
        logOpsEvent(deps.logger, "PIPELINE_TIMEOUT", { ticket_id: ticket.ticket_id, timeout_ms: timeoutMs });
      }
      const decision = humanReview(
        "Escalation - Processing Timeout",
        `Automated processing did not finish within ${timeoutMs}ms (${errorMessage(err)}). A specialist needs to review this case.`,
        "timeout",
        ["Processing timeout"],
        Math.max(0, Math.round(now() - startedAt))
      );
      return {
        decision,
        note: renderNote({ decision }),
        tags: buildDecisionTags(decision, zapier_failure),
        zapier_failure,
      };
    }
  };

  return { decideRefund, verifyBooking, analyzeDuplicates, renderNote, processTicket };
};

export type RefundPipeline = ReturnType<typeof createRefundPipeline>;
