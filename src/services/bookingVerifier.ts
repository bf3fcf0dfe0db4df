import { addDays, toIsoDate } from "../lib/dates";
import { AuthenticationError, errorMessage, TimeoutError } from "../lib/errors";
import { withRetry } from "../lib/retry";
import type { ParkWhizClient } from "../parkwhiz";
import type {
  Booking,
  BookingVerificationResult,
  CustomerInfo,
  Logger,
  MatchConfidence,
  SearchWindow,
  VerifiedBooking,
} from "../types/refund";
import { readPassUsage, toBooking } from "./bookingRecord";
import { canAutomateDecision } from "./decision/decisionGuard";
import { highlightDiscrepancies } from "./verificationNote";

export type BookingVerifierDeps = {
  client: Pick<ParkWhizClient, "getCustomerBookings">;
  maxAttempts: number;
  retryBaseMs: number;
  searchPaddingDays: number;
  logger?: Logger;
  wait?: (ms: number) => Promise<void>;
  now?: () => number;
};

export const MISSING_CUSTOMER_INFO = "Missing required customer information (email, arrival date, or exit date)";

export const INVALID_SEARCH_WINDOW = "Search window dates are invalid";

/** Both bounds must be real calendar dates, start not after end. */
export const normalizeSearchWindow = (window: SearchWindow): SearchWindow | null => {
  const start_date = toIsoDate(window.start_date);
  const end_date = toIsoDate(window.end_date);
  if (!start_date || !end_date || start_date > end_date) {
    return null;
  }
  return { start_date, end_date };
};

export const buildSearchWindow = (customer: CustomerInfo, paddingDays: number): SearchWindow | null => {
  const start = toIsoDate(customer.arrival_date ?? customer.exit_date);
  const end = toIsoDate(customer.exit_date ?? customer.arrival_date);
  if (!start || !end) {
    return null;
  }
  return normalizeSearchWindow({ start_date: addDays(start, -paddingDays), end_date: addDays(end, paddingDays) });
};

const emailsAgree = (customer: CustomerInfo, booking: Booking) =>
  !customer.email || !booking.customer_email || customer.email.toLowerCase() === booking.customer_email.toLowerCase();

const locationsAgree = (reported: string | null, actual: string | null) => {
  if (!reported || !actual) {
    return true;
  }
  const left = reported.trim().toLowerCase();
  const right = actual.trim().toLowerCase();
  return left.includes(right) || right.includes(left);
};

/** exact: email, dates and location agree. partial: email agrees, something else does not. weak: email differs. */
export const scoreMatch = (customer: CustomerInfo, booking: Booking): MatchConfidence => {
  if (!emailsAgree(customer, booking)) {
    return "weak";
  }
  const arrival = toIsoDate(booking.start_time);
  const exit = toIsoDate(booking.end_time);
  const datesAgree =
    (!customer.arrival_date || customer.arrival_date === arrival) && (!customer.exit_date || customer.exit_date === exit);
  return datesAgree && locationsAgree(customer.location, booking.location.name ?? null) ? "exact" : "partial";
};

export const toVerifiedBooking = (booking: Booking, customer: CustomerInfo): VerifiedBooking => {
  const pass_usage_status = readPassUsage(booking);
  return {
    booking_id: booking.id,
    customer_email: booking.customer_email ?? customer.email,
    arrival_date: toIsoDate(booking.start_time),
    exit_date: toIsoDate(booking.end_time),
    location: booking.location.name ?? null,
    pass_used: pass_usage_status === "used",
    pass_usage_status,
    amount_paid: booking.amount_paid ?? null,
    match_confidence: scoreMatch(customer, booking),
  };
};

export const createBookingVerifier = (deps: BookingVerifierDeps) => {
  const now = deps.now ?? Date.now;

  const verify = async (customer: CustomerInfo, searchWindow?: SearchWindow | null): Promise<BookingVerificationResult> => {
    const startedAt = now();
    let api_calls_made = 0;
    const base = () => ({
      customer_info: customer,
      api_calls_made,
      processing_time_ms: Math.max(0, Math.round(now() - startedAt)),
    });

    const window = searchWindow
      ? normalizeSearchWindow(searchWindow)
      : buildSearchWindow(customer, deps.searchPaddingDays);
    const email = customer.email;
    if (!email || !window) {
      const failure_reason = searchWindow && email ? INVALID_SEARCH_WINDOW : MISSING_CUSTOMER_INFO;
      return { ...base(), outcome: "verification_failed", failure_reason };
    }

    let raw: unknown[];
    try {
      raw = await withRetry(
        async () => {
          api_calls_made += 1;
          return deps.client.getCustomerBookings({ email, ...window });
        },
        {
          maxAttempts: deps.maxAttempts,
          baseDelayMs: deps.retryBaseMs,
          shouldRetry: (err) => err instanceof TimeoutError,
          wait: deps.wait,
          onRetry: ({ attempt, delay_ms }) =>
            deps.logger?.warn({ attempt, delay_ms }, "ParkWhiz booking lookup timed out, retrying"),
        }
      );
    } catch (err) {
      if (err instanceof AuthenticationError) {
        deps.logger?.error({ status: err.status }, "ParkWhiz authentication failed");
        throw err;
      }
      const failure_reason =
        err instanceof TimeoutError
          ? `Provider timeout after ${api_calls_made} attempts`
          : `Provider error: ${errorMessage(err)}`;
      deps.logger?.warn({ api_calls_made, failure_reason }, "ParkWhiz booking lookup failed");
      return { ...base(), outcome: "verification_failed", failure_reason };
    }

    const bookings = raw.map((entry) => toBooking(entry)).filter((entry): entry is Booking => entry !== null);
    deps.logger?.info({ api_calls_made, returned: raw.length, valid: bookings.length }, "ParkWhiz bookings fetched");

    if (bookings.length === 0) {
      return { ...base(), outcome: "no_booking_found" };
    }
    if (bookings.length > 1) {
      return { ...base(), outcome: "multiple_bookings", candidates: bookings };
    }

    const verified_booking = toVerifiedBooking(bookings[0], customer);
    const guard = canAutomateDecision(verified_booking);
    return {
      ...base(),
      outcome: "verified",
      verified_booking,
      discrepancies: highlightDiscrepancies(verified_booking, customer),
      should_escalate: !guard.allowed,
      escalation_reason: guard.allowed ? null : guard.reason,
    };
  };

  return { verify };
};

export type BookingVerifier = ReturnType<typeof createBookingVerifier>;
