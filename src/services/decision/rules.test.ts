import { describe, expect, it } from "vitest";
import rulesJson from "../../policies/refund_rules.json";
import type { BookingInfo, DuplicateDetectionResult, TicketData, VerifiedBooking } from "../../types/refund";
import { emptyBookingInfo } from "../bookingPatterns";
import { refundRulesSchema } from "./policy";
import { applyRules, mentionsAny } from "./rules";

const rules = refundRulesSchema.parse(rulesJson);
const TODAY = "2025-11-01";

const ticket = (description: string, overrides: Partial<TicketData> = {}): TicketData => ({
  ticket_id: "T-100",
  subject: "Refund request",
  description,
  ...overrides,
});

const booking = (overrides: Partial<BookingInfo> = {}): BookingInfo => ({
  ...emptyBookingInfo(),
  booking_id: "509266779",
  ...overrides,
});

const run = (
  description: string,
  info: Partial<BookingInfo>,
  extra: { duplicate_result?: DuplicateDetectionResult; verified_booking?: VerifiedBooking; ticket?: Partial<TicketData> } = {}
) =>
  applyRules({
    booking_info: booking(info),
    ticket: ticket(description, extra.ticket),
    rules,
    duplicate_result: extra.duplicate_result,
    verified_booking: extra.verified_booking,
    today: TODAY,
  });

const duplicates = (overrides: Partial<DuplicateDetectionResult>): DuplicateDetectionResult => ({
  has_duplicates: true,
  duplicate_count: 2,
  action: "refund_duplicate",
  used_booking_id: "A",
  unused_booking_id: "B",
  explanation: "Found 2 duplicate bookings.",
  all_booking_ids: ["A", "B"],
  duplicate_booking_ids: ["A", "B"],
  ...overrides,
});

const usedPass: VerifiedBooking = {
  booking_id: "509266779",
  customer_email: "driver@example.com",
  arrival_date: "2025-10-30",
  exit_date: "2025-10-30",
  location: "Arena Lot",
  pass_used: true,
  pass_usage_status: "used",
  amount_paid: 20,
  match_confidence: "exact",
};

describe("mentionsAny", () => {
  it("matches case-insensitively", () => {
    expect(mentionsAny("The GARAGE WAS FULL", ["garage was full"])).toBe(true);
    expect(mentionsAny("I want a full refund", rules.keywords.oversold)).toBe(false);
  });
});

describe("applyRules", () => {
  it("approves pre-arrival cancellations", () => {
    expect(run("Plans changed, please cancel", { event_date: "2025-11-10" })).toEqual({
      decision: "Approved",
      confidence: "high",
      policy_rule: "Pre-Arrival (7+ days before event)",
      reasoning: "Cancellation requested 9 days before the event start. Pre-arrival cancellations are approved.",
      key_factors: ["9 days before event"],
    });
  });

  it("counts days from the cancellation date when one is known", () => {
    const outcome = run("Please cancel", { event_date: "2025-11-10", cancellation_date: "2025-10-01" });
    expect(outcome.reasoning).toContain("40 days before");
  });

  it("counts days from the ticket creation date before falling back to today", () => {
    const outcome = run("Please cancel", { event_date: "2025-11-10" }, { ticket: { created_at: "2025-11-08T15:00:00Z" } });
    expect(outcome).toMatchObject({ decision: "Uncertain", policy_rule: "Short Notice Cancellation (<3 days)" });
    expect(outcome.key_factors).toEqual(["2 days before event", "Booking type: unknown"]);
  });

  it("denies post-event requests without an exception", () => {
    expect(run("I never ended up going", { event_date: "2025-10-30" })).toMatchObject({
      decision: "Denied",
      confidence: "high",
      policy_rule: "Post-Event Cancellation",
    });
  });

  it("approves post-event requests with a facility exception", () => {
    expect(run("When I got there the garage was full", { event_date: "2025-10-30" })).toMatchObject({
      decision: "Approved",
      policy_rule: "Oversold Location",
    });
    expect(run("The gate down the whole night", { event_date: "2025-10-30" }).policy_rule).toBe("Closed Location");
    expect(run("A police blockade stopped us", { event_date: "2025-10-30" }).policy_rule).toBe("Accessibility Issue");
    expect(run("Attendant said I had to pay cash", { event_date: "2025-10-30" }).policy_rule).toBe("Paid Again");
  });

  it("sends special circumstances after the event to analysis", () => {
    expect(run("I was in the hospital that evening", { event_date: "2025-10-30" })).toMatchObject({
      decision: "Uncertain",
      policy_rule: "Post-Event Special Circumstances",
      has_evidence: true,
    });
  });

  it("denies when the verified pass was used and no exception applies", () => {
    const outcome = run("I was in the hospital that evening", { event_date: "2025-10-30" }, { verified_booking: usedPass });
    expect(outcome).toMatchObject({ decision: "Denied", policy_rule: "Post-Event Cancellation" });
    expect(outcome.key_factors).toContain("Pass was used");
  });

  it("denies short-notice on-demand bookings", () => {
    expect(run("Cancel please", { event_date: "2025-11-02", booking_type: "on-demand" })).toMatchObject({
      decision: "Denied",
      policy_rule: "On-Demand Cancellation Policy (<3 days)",
    });
  });

  it("approves confirmed bookings with three to seven days notice at medium confidence", () => {
    expect(run("Cancel please", { event_date: "2025-11-06", booking_type: "confirmed" })).toMatchObject({
      decision: "Approved",
      confidence: "medium",
      policy_rule: "Confirmed Booking (3-7 days notice)",
    });
  });

  it("approves oversold or paid-again claims before the event", () => {
    expect(run("They told me I had to pay again next week", { event_date: "2025-11-06" })).toMatchObject({
      decision: "Approved",
      policy_rule: "Paid Again",
    });
  });

  it("is uncertain for an unclear booking type with three to seven days notice", () => {
    expect(run("Cancel please", { event_date: "2025-11-06" })).toMatchObject({
      decision: "Uncertain",
      policy_rule: "Ambiguous Booking Type (3-7 days)",
      has_evidence: true,
    });
  });

  it("is uncertain for short notice on a non on-demand booking", () => {
    expect(run("Cancel please", { event_date: "2025-11-02", booking_type: "confirmed" })).toMatchObject({
      decision: "Uncertain",
      policy_rule: "Short Notice Cancellation (<3 days)",
    });
  });

  it("is uncertain without evidence when the event date is missing or invalid", () => {
    expect(run("Cancel please", {})).toMatchObject({ decision: "Uncertain", has_evidence: false });
    expect(run("Cancel please", { event_date: "sometime soon" })).toMatchObject({
      decision: "Uncertain",
      policy_rule: "Data Validation",
      has_evidence: false,
    });
  });

  it("approves a resolved duplicate regardless of timing", () => {
    expect(run("Charged twice", { event_date: "2025-10-01" }, { duplicate_result: duplicates({}) })).toMatchObject({
      decision: "Approved",
      policy_rule: "Duplicate Booking",
    });
  });

  it("escalates unresolved duplicates", () => {
    expect(
      run("Charged twice", { event_date: "2025-11-20" }, { duplicate_result: duplicates({ action: "escalate" }) })
    ).toMatchObject({ decision: "Needs Human Review", policy_rule: "Duplicate Booking - Requires Manual Review" });
  });

  it("denies a duplicate claim the booking history does not support", () => {
    const none = duplicates({ has_duplicates: false, action: "deny", used_booking_id: null, unused_booking_id: null });
    expect(run("I was charged twice", { event_date: "2025-11-20" }, { duplicate_result: none })).toMatchObject({
      decision: "Denied",
      policy_rule: "Duplicate Booking Claim - Not Found",
    });
  });

  it("escalates a duplicate claim without booking history", () => {
    expect(run("I was billed twice", { event_date: "2025-11-20" })).toMatchObject({
      decision: "Needs Human Review",
      policy_rule: "Duplicate Booking Claim - Requires Manual Review",
    });
  });
});
