import { describe, expect, it } from "vitest";
import type { CustomerInfo, DecisionResult, VerifiedBooking } from "../types/refund";
import {
  generateDecisionNote,
  generateDuplicateNote,
  generateVerificationFailedNote,
  generateVerifiedNote,
  highlightDiscrepancies,
  renderNote,
} from "./verificationNote";

const verified: VerifiedBooking = {
  booking_id: "7001",
  customer_email: "driver@example.com",
  arrival_date: "2025-11-20",
  exit_date: "2025-11-20",
  location: "Arena Lot",
  pass_used: false,
  pass_usage_status: "not_used",
  amount_paid: 18,
  match_confidence: "exact",
};

const customer: CustomerInfo = {
  email: "driver@example.com",
  name: "Sam Driver",
  arrival_date: "2025-11-20",
  exit_date: null,
  location: "arena lot",
};

const decision: DecisionResult = {
  decision: "Approved",
  reasoning: "Cancelled 19 days before the event.",
  policy_applied: "Pre-Arrival (7+ days before event)",
  confidence: "high",
  cancellation_reason: "Pre-arrival",
  booking_info_found: true,
  method_used: "rules",
  processing_time_ms: 4,
  key_factors: ["19 days before event"],
};

describe("highlightDiscrepancies", () => {
  it("ignores fields the customer did not report and location case", () => {
    expect(highlightDiscrepancies(verified, customer)).toEqual([]);
  });

  it("lists each mismatched field", () => {
    expect(
      highlightDiscrepancies(verified, { ...customer, arrival_date: "2025-11-19", location: "Harbor Garage" })
    ).toEqual([
      "Arrival date mismatch: customer said 2025-11-19, booking shows 2025-11-20",
      "Location mismatch: customer said 'Harbor Garage', booking shows 'Arena Lot'",
    ]);
  });
});

describe("generateVerifiedNote", () => {
  it("shows the booking facts and no discrepancy box when everything matches", () => {
    const html = generateVerifiedNote(verified, customer);
    expect(html).toContain("Booking Verification Results");
    expect(html).toContain(">7001</span>");
    expect(html).toContain("NOT USED ✗</span> (not_used)");
    expect(html).toContain("<strong>Amount Paid:</strong> $18.00</p>");
    expect(html).toContain(">EXACT</span>");
    expect(html).not.toContain("Discrepancies Found");
  });

  it("escapes discrepancy text", () => {
    const html = generateVerifiedNote(verified, { ...customer, location: "Harbor <Garage>" });
    expect(html).toContain("Discrepancies Found");
    expect(html).toContain(
      "<li style='margin: 3px 0;'>Location mismatch: customer said &#039;Harbor &lt;Garage&gt;&#039;, booking shows &#039;Arena Lot&#039;</li>"
    );
  });
});

describe("generateVerificationFailedNote", () => {
  it("lists only the customer fields that were provided", () => {
    const html = generateVerificationFailedNote(customer, "No booking found");
    expect(html).toContain("<strong>Reason:</strong> No booking found</p>");
    expect(html).toContain("<strong>Name:</strong> Sam Driver</p>");
    expect(html).not.toContain("<strong>Exit Date:</strong>");
  });
});

describe("generateDecisionNote", () => {
  it("includes the cancellation reason and key factors", () => {
    const html = generateDecisionNote(decision);
    expect(html).toContain("Refund Decision: Approved</h3>");
    expect(html).toContain("<strong>Cancellation Reason:</strong> Pre-arrival</p>");
    expect(html).toContain("<li style='margin: 3px 0;'>19 days before event</li>");
  });
});

describe("generateDuplicateNote", () => {
  it("names the kept and refunded bookings", () => {
    const html = generateDuplicateNote({
      has_duplicates: true,
      duplicate_count: 2,
      action: "refund_duplicate",
      used_booking_id: "7001",
      unused_booking_id: "7002",
      explanation: "Found 2 duplicate bookings.",
      all_booking_ids: ["7001", "7002"],
      duplicate_booking_ids: ["7001", "7002"],
    });
    expect(html).toContain("<strong>Duplicates Found:</strong> Yes</p>");
    expect(html).toContain("<strong>Kept Booking:</strong> 7001</p>");
    expect(html).toContain("<strong>Refund Booking:</strong> 7002</p>");
  });
});

describe("renderNote", () => {
  it("joins the sections the evidence supports", () => {
    const html = renderNote({ decision, customer_info: customer, verified_booking: verified });
    const sections = html.split("\n");
    expect(sections).toHaveLength(2);
    expect(sections[0]).toContain("Refund Decision: Approved");
    expect(sections[1]).toContain("Booking Verification Results");
  });

  it("renders the failure section when nothing was verified", () => {
    const html = renderNote({ customer_info: customer, verification_failure: "Provider timeout after 3 attempts" });
    expect(html).toContain("Booking Verification Failed");
    expect(html).toContain("Provider timeout after 3 attempts");
  });

  it("returns an empty string without evidence", () => {
    expect(renderNote({})).toBe("");
  });
});
