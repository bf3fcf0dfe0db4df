import { daysBetween, todayIso, toIsoDate } from "../../lib/dates";
import type {
  BookingInfo,
  Confidence,
  Decision,
  DuplicateDetectionResult,
  TicketData,
  VerifiedBooking,
} from "../../types/refund";
import type { RefundRules } from "./policy";

export type RuleOutcome =
  | {
      decision: Decision;
      reasoning: string;
      policy_rule: string;
      confidence: Confidence;
      key_factors: string[];
    }
  | {
      decision: "Uncertain";
      reasoning: string;
      policy_rule: string;
      confidence: "low";
      key_factors: string[];
      // false when no rule had enough data to say anything
      has_evidence: boolean;
    };

export type RuleInput = {
  booking_info: BookingInfo;
  ticket: TicketData;
  rules: RefundRules;
  duplicate_result?: DuplicateDetectionResult | null;
  verified_booking?: VerifiedBooking | null;
  today?: string;
};

type FacilityException = {
  keywords: keyof RefundRules["keywords"];
  policy_rule: string;
  reasoning: string;
};

const FACILITY_EXCEPTIONS: FacilityException[] = [
  {
    keywords: "oversold",
    policy_rule: "Oversold Location",
    reasoning: "Location was oversold. The customer was unable to park despite a valid booking.",
  },
  {
    keywords: "paid_again",
    policy_rule: "Paid Again",
    reasoning: "Customer had to pay again on site despite holding a valid booking.",
  },
  {
    keywords: "closed",
    policy_rule: "Closed Location",
    reasoning: "Location was closed or unusable for reasons outside the customer's control.",
  },
  {
    keywords: "accessibility",
    policy_rule: "Accessibility Issue",
    reasoning: "Customer could not reach the location because of road closures or other access restrictions.",
  },
];

export const mentionsAny = (text: string, keywords: string[]) => {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
};

const decided = (
  decision: Decision,
  confidence: Confidence,
  policy_rule: string,
  reasoning: string,
  key_factors: string[]
): RuleOutcome => ({ decision, confidence, policy_rule, reasoning, key_factors });

const uncertain = (policy_rule: string, reasoning: string, key_factors: string[], has_evidence = true): RuleOutcome => ({
  decision: "Uncertain",
  confidence: "low",
  policy_rule,
  reasoning,
  key_factors,
  has_evidence,
});

const duplicateRule = (input: RuleInput, claimsDuplicate: boolean): RuleOutcome | null => {
  const duplicates = input.duplicate_result;
  if (duplicates?.action === "refund_duplicate") {
    return decided(
      "Approved",
      "high",
      "Duplicate Booking",
      `${duplicates.explanation} Booking ${duplicates.unused_booking_id ?? "unknown"} is the duplicate to refund.`,
      ["Overlapping bookings at the same location", `Unused booking: ${duplicates.unused_booking_id ?? "unknown"}`]
    );
  }
  if (duplicates?.action === "escalate") {
    return decided("Needs Human Review", "high", "Duplicate Booking - Requires Manual Review", duplicates.explanation, [
      "Duplicate bookings could not be resolved automatically",
    ]);
  }
  if (duplicates && claimsDuplicate) {
    return decided(
      "Denied",
      "high",
      "Duplicate Booking Claim - Not Found",
      `Customer reports a duplicate booking, but the booking history shows none. ${duplicates.explanation}`,
      ["Duplicate claimed", "No overlapping bookings found"]
    );
  }
  if (claimsDuplicate) {
    return decided(
      "Needs Human Review",
      "high",
      "Duplicate Booking Claim - Requires Manual Review",
      "Customer reports a duplicate booking or being charged twice. A specialist needs to review the account to locate both bookings.",
      ["Duplicate claimed", "No booking history checked"]
    );
  }
  return null;
};

/**
 * Deterministic refund rules, first match wins. Returns "Uncertain" when the case
 * needs language-model analysis.
 */
export const applyRules = (input: RuleInput): RuleOutcome => {
  const { booking_info, ticket, rules } = input;
  const { pre_arrival_days, short_notice_days } = rules.thresholds;
  const description = ticket.description;
  const claimsDuplicate = mentionsAny(`${ticket.subject} ${description}`, rules.keywords.duplicate);

  const duplicate = duplicateRule(input, claimsDuplicate);
  if (duplicate) {
    return duplicate;
  }

  const eventDate = toIsoDate(booking_info.event_date);
  if (!eventDate) {
    return uncertain(
      "Data Validation",
      booking_info.event_date
        ? "Unable to calculate days before the event: the event date is not a valid date."
        : "Missing event date. Days before the event cannot be calculated.",
      ["Event date unavailable"],
      false
    );
  }

  const requestDate =
    toIsoDate(booking_info.cancellation_date) ?? toIsoDate(ticket.created_at ?? null) ?? input.today ?? todayIso();
  const days = daysBetween(requestDate, eventDate);
  if (days === null) {
    return uncertain("Data Validation", "Unable to calculate days before the event.", ["Event date unavailable"], false);
  }

  const bookingType = booking_info.booking_type ?? "unknown";
  const timing = `${days} days before event`;

  if (days >= pre_arrival_days) {
    return decided(
      "Approved",
      "high",
      `Pre-Arrival (${pre_arrival_days}+ days before event)`,
      `Cancellation requested ${days} days before the event start. Pre-arrival cancellations are approved.`,
      [timing]
    );
  }

  if (days < 0) {
    const daysAfter = Math.abs(days);
    for (const exception of FACILITY_EXCEPTIONS) {
      if (mentionsAny(description, rules.keywords[exception.keywords])) {
        return decided("Approved", "high", exception.policy_rule, exception.reasoning, [
          `${daysAfter} days after event`,
          exception.policy_rule,
        ]);
      }
    }
    if (input.verified_booking?.pass_used) {
      return decided(
        "Denied",
        "high",
        "Post-Event Cancellation",
        `Cancellation requested ${daysAfter} days after the event start and the pass was used.`,
        [`${daysAfter} days after event`, "Pass was used"]
      );
    }
    if (mentionsAny(description, rules.keywords.special_circumstances)) {
      return uncertain(
        "Post-Event Special Circumstances",
        `Cancellation requested ${daysAfter} days after the event start, but the customer describes special circumstances.`,
        [`${daysAfter} days after event`, "Special circumstances described"]
      );
    }
    return decided(
      "Denied",
      "high",
      "Post-Event Cancellation",
      `Cancellation requested ${daysAfter} days after the event start. Post-event refunds are not permitted.`,
      [`${daysAfter} days after event`]
    );
  }

  if (days < short_notice_days && bookingType === "on-demand") {
    return decided(
      "Denied",
      "high",
      `On-Demand Cancellation Policy (<${short_notice_days} days)`,
      `On-demand booking with only ${days} days notice. On-demand bookings need ${short_notice_days}+ days notice.`,
      [timing, "On-demand booking"]
    );
  }

  if (days >= short_notice_days && bookingType === "confirmed") {
    return decided(
      "Approved",
      "medium",
      `Confirmed Booking (${short_notice_days}-${pre_arrival_days} days notice)`,
      `Confirmed booking with ${days} days notice meets the cancellation window for confirmed bookings.`,
      [timing, "Confirmed booking"]
    );
  }

  for (const exception of FACILITY_EXCEPTIONS.slice(0, 2)) {
    if (mentionsAny(description, rules.keywords[exception.keywords])) {
      return decided("Approved", "high", exception.policy_rule, exception.reasoning, [timing, exception.policy_rule]);
    }
  }

  if (days >= short_notice_days) {
    return uncertain(
      `Ambiguous Booking Type (${short_notice_days}-${pre_arrival_days} days)`,
      `Cancellation with ${days} days notice, but the booking type is ${bookingType}.`,
      [timing, `Booking type: ${bookingType}`]
    );
  }

  return uncertain(
    `Short Notice Cancellation (<${short_notice_days} days)`,
    `Short notice cancellation (${days} days) with booking type ${bookingType}.`,
    [timing, `Booking type: ${bookingType}`]
  );
};
