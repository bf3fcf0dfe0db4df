import type { TicketData } from "../types/refund";

export const ZAPIER_FAILURE_MESSAGE = "Booking information not found for provided Booking Number";

const INVALID_BOOKING_ID_PATTERNS = [/^0+$/, /^N\/?A$/i, /^none$/i, /^null$/i, /^undefined$/i, /^\s*$/];

export type ZapierFailureResult = {
  is_failure: boolean;
  zapier_message_failure: boolean;
  failure_tag: string | null;
  invalid_booking_id: boolean;
  reason: string;
};

export const isInvalidBookingId = (bookingId: string | null | undefined) => {
  if (bookingId === null || bookingId === undefined) {
    return true;
  }
  const value = bookingId.trim();
  return INVALID_BOOKING_ID_PATTERNS.some((pattern) => pattern.test(value));
};

/** The booking-number custom field, if the ticket form carries one (keys vary between forms). */
export const findBookingNumberField = (customFields: TicketData["custom_fields"]) => {
  if (!customFields) {
    return undefined;
  }
  for (const [key, value] of Object.entries(customFields)) {
    const normalized = key.toLowerCase();
    if (normalized.includes("booking") && (normalized.includes("number") || normalized.includes("id"))) {
      return { key, value: value ?? null };
    }
  }
  return undefined;
};

export const detectZapierFailure = (
  ticket: Pick<TicketData, "subject" | "description" | "tags" | "custom_fields">,
  failureTags: string[] = ["zapier_failed", "booking_not_found"]
): ZapierFailureResult => {
  const text = `${ticket.subject ?? ""}\n${ticket.description ?? ""}`.toLowerCase();
  const zapier_message_failure = text.includes(ZAPIER_FAILURE_MESSAGE.toLowerCase());

  const tags = (ticket.tags ?? []).map((tag) => tag.trim().toLowerCase());
  const failure_tag = tags.find((tag) => failureTags.includes(tag)) ?? null;

  const bookingField = findBookingNumberField(ticket.custom_fields);
  const invalid_booking_id = bookingField ? isInvalidBookingId(bookingField.value) : false;

  const reasons: string[] = [];
  if (zapier_message_failure) {
    reasons.push("Zapier failure message detected");
  }
  if (failure_tag) {
    reasons.push(`Failure tag present: ${failure_tag}`);
  }
  if (invalid_booking_id && bookingField) {
    reasons.push(`Invalid booking ID: '${bookingField.value ?? ""}'`);
  }

  return {
    is_failure: reasons.length > 0,
    zapier_message_failure,
    failure_tag,
    invalid_booking_id,
    reason: reasons.length > 0 ? reasons.join("; ") : "No failure detected",
  };
};

export const isZapierFailure = (
  ticket: Pick<TicketData, "subject" | "description" | "tags" | "custom_fields">,
  failureTags?: string[]
) => detectZapierFailure(ticket, failureTags).is_failure;
