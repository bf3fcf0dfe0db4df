import { escapeHtml } from "../lib/html";
import type {
  CustomerInfo,
  DecisionResult,
  DuplicateDetectionResult,
  MatchConfidence,
  VerifiedBooking,
} from "../types/refund";

const WRAPPER = "<div style='font-family: Arial, sans-serif; line-height: 1.6;'>";
const ROW = "<p style='margin: 5px 0;'>";

const box = (border: string, background: string) =>
  `<div style='background-color: ${background}; padding: 15px; border-left: 4px solid ${border}; margin-bottom: 15px;'>`;

const row = (label: string, valueHtml: string) => `${ROW}<strong>${escapeHtml(label)}:</strong> ${valueHtml}</p>`;

const CONFIDENCE_COLORS: Record<MatchConfidence, string> = {
  exact: "#48bb78",
  partial: "#ed8936",
  weak: "#f56565",
};

const formatAmount = (amount: number | null) => (amount === null ? "unknown" : `$${amount.toFixed(2)}`);

const sameLocation = (a: string, b: string) => {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  return left.includes(right) || right.includes(left);
};

/** Fields the customer reported that disagree with the booking; unreported fields are not compared. */
export const highlightDiscrepancies = (verified: VerifiedBooking, customer: CustomerInfo): string[] => {
  const discrepancies: string[] = [];
  if (customer.arrival_date && verified.arrival_date && customer.arrival_date !== verified.arrival_date) {
    discrepancies.push(
      `Arrival date mismatch: customer said ${customer.arrival_date}, booking shows ${verified.arrival_date}`
    );
  }
  if (customer.exit_date && verified.exit_date && customer.exit_date !== verified.exit_date) {
    discrepancies.push(`Exit date mismatch: customer said ${customer.exit_date}, booking shows ${verified.exit_date}`);
  }
  if (customer.location && verified.location && !sameLocation(customer.location, verified.location)) {
    discrepancies.push(`Location mismatch: customer said '${customer.location}', booking shows '${verified.location}'`);
  }
  return discrepancies;
};

const bookingRows = (verified: VerifiedBooking) => {
  const usageColor = verified.pass_used ? "#48bb78" : "#f56565";
  const usageText = verified.pass_used ? "USED ✓" : "NOT USED ✗";
  const parts = [
    row(
      "Booking ID",
      `<span style='font-family: monospace; background-color: #edf2f7; padding: 2px 6px; border-radius: 3px;'>${escapeHtml(verified.booking_id)}</span>`
    ),
    row(
      "Pass Usage",
      `<span style='color: ${usageColor}; font-weight: bold;'>${usageText}</span> (${escapeHtml(verified.pass_usage_status)})`
    ),
    row("Customer Email", escapeHtml(verified.customer_email ?? "unknown")),
    row("Arrival Date", escapeHtml(verified.arrival_date ?? "unknown")),
    row("Exit Date", escapeHtml(verified.exit_date ?? "unknown")),
  ];
  if (verified.location) {
    parts.push(row("Location", escapeHtml(verified.location)));
  }
  parts.push(row("Amount Paid", escapeHtml(formatAmount(verified.amount_paid))));
  parts.push(
    row(
      "Match Confidence",
      `<span style='color: ${CONFIDENCE_COLORS[verified.match_confidence]}; font-weight: bold;'>${escapeHtml(verified.match_confidence.toUpperCase())}</span>`
    )
  );
  return parts;
};

export const generateVerifiedNote = (verified: VerifiedBooking, customer: CustomerInfo) => {
  const discrepancies = highlightDiscrepancies(verified, customer);
  const parts = [
    WRAPPER,
    "<h3 style='color: #2c5282; margin-bottom: 10px;'>✅ Booking Verification Results</h3>",
    box("#48bb78", "#f7fafc"),
    ...bookingRows(verified),
    "</div>",
  ];
  if (discrepancies.length > 0) {
    parts.push(
      box("#f56565", "#fff5f5"),
      "<h4 style='color: #c53030; margin-top: 0; margin-bottom: 10px;'>⚠️ Discrepancies Found</h4>",
      "<ul style='margin: 5px 0; padding-left: 20px;'>",
      ...discrepancies.map((item) => `<li style='margin: 3px 0;'>${escapeHtml(item)}</li>`),
      "</ul>",
      "</div>"
    );
  }
  parts.push("</div>");
  return parts.join("");
};

const customerRows = (customer: CustomerInfo) => {
  const fields: Array<[string, string | null]> = [
    ["Email", customer.email],
    ["Name", customer.name],
    ["Arrival Date", customer.arrival_date],
    ["Exit Date", customer.exit_date],
    ["Location", customer.location],
  ];
  return fields.filter(([, value]) => Boolean(value)).map(([label, value]) => row(label, escapeHtml(value)));
};

export const generateVerificationFailedNote = (customer: CustomerInfo, reason: string) =>
  [
    WRAPPER,
    "<h3 style='color: #c53030; margin-bottom: 10px;'>❌ Booking Verification Failed</h3>",
    box("#f56565", "#fff5f5"),
    row("Reason", escapeHtml(reason)),
    "</div>",
    box("#718096", "#f7fafc"),
    "<h4 style='color: #2d3748; margin-top: 0; margin-bottom: 10px;'>Customer Information Attempted</h4>",
    ...customerRows(customer),
    "</div>",
    "<div style='background-color: #fffaf0; padding: 15px; border-left: 4px solid #ed8936;'>",
    "<h4 style='color: #7c2d12; margin-top: 0; margin-bottom: 10px;'>📋 Next Steps</h4>",
    `${ROW}This ticket requires manual review. Please:</p>`,
    "<ol style='margin: 5px 0; padding-left: 20px;'>",
    "<li>Look the customer up directly in the ParkWhiz admin</li>",
    "<li>Check for alternate email addresses or booking methods</li>",
    "<li>Contact the customer if information is unclear or missing</li>",
    "</ol>",
    "</div>",
    "</div>",
  ].join("");

export const generateMultipleBookingsNote = (bookings: VerifiedBooking[], customer: CustomerInfo) => {
  const parts = [
    WRAPPER,
    `<h3 style='color: #2c5282; margin-bottom: 10px;'>🔍 Multiple Bookings Found (${bookings.length})</h3>`,
    `${ROW}Found ${bookings.length} bookings for ${escapeHtml(customer.email ?? "this customer")}. Review each booking below:</p>`,
  ];
  bookings.forEach((booking, index) => {
    parts.push(
      box("#4299e1", "#f7fafc"),
      `<h4 style='color: #2d3748; margin-top: 0; margin-bottom: 10px;'>Booking #${index + 1}</h4>`,
      ...bookingRows(booking),
      "</div>"
    );
  });
  parts.push("</div>");
  return parts.join("");
};

export const generateDuplicateNote = (duplicates: DuplicateDetectionResult) => {
  const parts = [
    WRAPPER,
    "<h3 style='color: #2c5282; margin-bottom: 10px;'>🔁 Duplicate Booking Check</h3>",
    box(duplicates.has_duplicates ? "#ed8936" : "#48bb78", "#f7fafc"),
    row("Duplicates Found", duplicates.has_duplicates ? "Yes" : "No"),
    row("Action", escapeHtml(duplicates.action)),
  ];
  if (duplicates.used_booking_id) {
    parts.push(row("Kept Booking", escapeHtml(duplicates.used_booking_id)));
  }
  if (duplicates.unused_booking_id) {
    parts.push(row("Refund Booking", escapeHtml(duplicates.unused_booking_id)));
  }
  parts.push(row("Explanation", escapeHtml(duplicates.explanation)), "</div>", "</div>");
  return parts.join("");
};

const DECISION_COLORS: Record<DecisionResult["decision"], string> = {
  Approved: "#48bb78",
  Denied: "#f56565",
  "Needs Human Review": "#ed8936",
};

export const generateDecisionNote = (decision: DecisionResult) => {
  const parts = [
    WRAPPER,
    `<h3 style='color: ${DECISION_COLORS[decision.decision]}; margin-bottom: 10px;'>Refund Decision: ${escapeHtml(decision.decision)}</h3>`,
    box(DECISION_COLORS[decision.decision], "#f7fafc"),
    row("Policy Applied", escapeHtml(decision.policy_applied)),
    row("Confidence", escapeHtml(decision.confidence)),
    row("Method", escapeHtml(decision.method_used)),
    row("Reasoning", escapeHtml(decision.reasoning)),
  ];
  if (decision.cancellation_reason) {
    parts.push(row("Cancellation Reason", escapeHtml(decision.cancellation_reason)));
  }
  if (decision.key_factors.length > 0) {
    parts.push(
      "<ul style='margin: 5px 0; padding-left: 20px;'>",
      ...decision.key_factors.map((factor) => `<li style='margin: 3px 0;'>${escapeHtml(factor)}</li>`),
      "</ul>"
    );
  }
  parts.push("</div>", "</div>");
  return parts.join("");
};

export type NoteEvidence = {
  decision?: DecisionResult | null;
  customer_info?: CustomerInfo | null;
  verified_booking?: VerifiedBooking | null;
  candidates?: VerifiedBooking[] | null;
  duplicates?: DuplicateDetectionResult | null;
  verification_failure?: string | null;
};

const EMPTY_CUSTOMER: CustomerInfo = { email: null, name: null, arrival_date: null, exit_date: null, location: null };

/** Concatenates whichever sections the evidence supports: decision, verification outcome, duplicate check. */
export const renderNote = (evidence: NoteEvidence) => {
  const customer = evidence.customer_info ?? EMPTY_CUSTOMER;
  const sections: string[] = [];
  if (evidence.decision) {
    sections.push(generateDecisionNote(evidence.decision));
  }
  if (evidence.verified_booking) {
    sections.push(generateVerifiedNote(evidence.verified_booking, customer));
  } else if (evidence.candidates && evidence.candidates.length > 1) {
    sections.push(generateMultipleBookingsNote(evidence.candidates, customer));
  } else if (evidence.verification_failure) {
    sections.push(generateVerificationFailedNote(customer, evidence.verification_failure));
  }
  if (evidence.duplicates) {
    sections.push(generateDuplicateNote(evidence.duplicates));
  }
  return sections.join("\n");
};
