import { z } from "zod";
import { toIsoDate } from "../lib/dates";
import { completeSafely, parseJsonObject, type LanguageModel } from "../lib/llm/gemini";
import type { BookingExtraction, BookingInfo, Logger } from "../types/refund";
import {
  EMAIL_PATTERN,
  emptyBookingInfo,
  extractBookingPatterns,
  fillMissing,
  inferBookingType,
  llmConfidence,
} from "./bookingPatterns";

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value).trim() || null));

const llmBookingSchema = z.object({
  found: z.boolean().catch(false),
  booking_id: optionalText,
  amount: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value) => {
      const amount = typeof value === "string" ? Number(value.replace(/[$,\s]/g, "")) : value;
      return typeof amount === "number" && Number.isFinite(amount) ? amount : null;
    }),
  reservation_date: optionalText,
  event_date: optionalText,
  cancellation_date: optionalText,
  location: optionalText,
  booking_type: optionalText,
  customer_email: optionalText,
  multiple_bookings: z.boolean().optional(),
});

const buildExtractionPrompt = (notes: string) => `Extract booking information from the support ticket notes below.

Fields:
- booking_id: booking or confirmation number (for example "509266779" or "PW-12345")
- amount: amount paid, as a number
- reservation_date: when the booking was made
- event_date: when the parking starts (the most important field; "Parking Pass Start Time" is the event date)
- cancellation_date: when the customer asked to cancel, if mentioned
- location: parking facility name or address
- booking_type: "confirmed" for advance bookings, "on-demand" for same-day, "third-party" when bought through another platform
- customer_email

Rules:
- Dates are YYYY-MM-DD with a four-digit year. Ignore times of day.
- If several bookings are mentioned, extract the one being disputed and set "multiple_bookings" to true.
- Set "found" to true when you find at least a booking ID or an event date.
- Omit fields you cannot find.

Ticket notes:
${notes}

Respond with a JSON object.`;

const toBookingInfo = (data: z.infer<typeof llmBookingSchema>): BookingInfo => {
  const bookingType = data.booking_type ? inferBookingType(data.booking_type) : null;
  const email = data.customer_email && EMAIL_PATTERN.test(data.customer_email) ? data.customer_email.toLowerCase() : null;
  return {
    booking_id: data.booking_id,
    event_date: toIsoDate(data.event_date),
    reservation_date: toIsoDate(data.reservation_date),
    cancellation_date: toIsoDate(data.cancellation_date),
    booking_type: bookingType,
    amount: data.amount,
    location: data.location,
    customer_email: email,
  };
};

const NOT_FOUND: BookingExtraction = { found: false, booking_info: emptyBookingInfo(), confidence: "low", source: "none" };

/**
 * Regex extraction first; the model is asked only when the patterns find nothing
 * or only a low-confidence result. Model values win, pattern values fill the gaps.
 */
export const extractBookingInfo = async (input: {
  notes: string;
  model?: LanguageModel | null;
  timeoutMs?: number;
  logger?: Logger;
}): Promise<BookingExtraction> => {
  if (!input.notes || input.notes.trim() === "") {
    return NOT_FOUND;
  }

  const fromPatterns = extractBookingPatterns(input.notes);
  if (fromPatterns.found && fromPatterns.confidence !== "low") {
    input.logger?.info({ confidence: fromPatterns.confidence }, "Booking info extracted by patterns");
    return fromPatterns;
  }
  if (!input.model) {
    return fromPatterns;
  }

  const outcome = await completeSafely(input.model, buildExtractionPrompt(input.notes), { timeoutMs: input.timeoutMs ?? 10_000 });
  if (!outcome.ok) {
    input.logger?.warn({ error_code: outcome.error_code, message: outcome.message }, "Booking info LLM extraction failed");
    return fromPatterns;
  }

  const parsed = llmBookingSchema.safeParse(parseJsonObject(outcome.text));
  if (!parsed.success) {
    input.logger?.warn({ issues: parsed.error.issues.length }, "Booking info LLM response invalid");
    return fromPatterns;
  }
  if (parsed.data.multiple_bookings) {
    input.logger?.warn({}, "Ticket references more than one booking");
  }

  const booking_info = fillMissing(toBookingInfo(parsed.data), fromPatterns.booking_info);
  const found = parsed.data.found || booking_info.booking_id !== null || booking_info.event_date !== null;
  const confidence = found ? llmConfidence(booking_info) : "low";
  input.logger?.info({ found, confidence }, "Booking info extracted by LLM");
  return { found, booking_info, confidence, source: "llm" };
};
