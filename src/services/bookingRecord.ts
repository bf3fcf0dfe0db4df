import { isRecord } from "../lib/http";
import type { Booking, PassUsageStatus } from "../types/refund";

const USED_STATUSES = ["completed", "checked_out", "checked_in"];
const NOT_USED_STATUSES = ["confirmed", "pending", "reserved", "active", "upcoming"];

const asId = (value: unknown): string | null => {
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
};

const asText = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

/** First numeric value out of a number, numeric string or currency map like `{ USD: 15 }`. */
export const readAmount = (value: unknown): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  if (isRecord(value)) {
    for (const entry of Object.values(value)) {
      const amount = readAmount(entry);
      if (amount !== undefined) {
        return amount;
      }
    }
  }
  return undefined;
};

const readEmail = (raw: Record<string, unknown>) => {
  const direct = asText(raw.customer_email) ?? asText(raw.email);
  if (direct) {
    return direct;
  }
  const customer = raw.customer;
  return isRecord(customer) ? asText(customer.email) : undefined;
};

/**
 * Narrows a provider record to a Booking. Returns null for anything that is not an object,
 * lacks id/start_time/end_time, or has no location object with an id.
 */
export const toBooking = (value: unknown): Booking | null => {
  if (!isRecord(value)) {
    return null;
  }
  const id = asId(value.id);
  const start_time = asText(value.start_time);
  const end_time = asText(value.end_time);
  if (!id || !start_time || !end_time || !isRecord(value.location)) {
    return null;
  }
  const locationId = asId(value.location.id);
  if (!locationId) {
    return null;
  }

  return {
    id,
    start_time,
    end_time,
    location: { id: locationId, name: asText(value.location.name) },
    status: asText(value.status)?.toLowerCase(),
    customer_email: readEmail(value),
    amount_paid: readAmount(value.amount_paid) ?? readAmount(value.price_paid) ?? readAmount(value.amount),
    raw: value,
  };
};

export const isUsedStatus = (status: string | undefined) => Boolean(status && USED_STATUSES.includes(status));

const fromFlag = (value: unknown): PassUsageStatus | null => {
  if (typeof value === "boolean") {
    return value ? "used" : "not_used";
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["used", "scanned", "checked_in", "true", "yes"].includes(normalized)) {
      return "used";
    }
    if (["not_used", "unused", "not_scanned", "false", "no"].includes(normalized)) {
      return "not_used";
    }
  }
  return null;
};

/** Explicit usage fields win over the booking status. */
export const readPassUsage = (booking: Booking): PassUsageStatus => {
  for (const field of ["pass_used", "pass_usage", "usage_status", "scanned", "checked_in"]) {
    const status = fromFlag(booking.raw[field]);
    if (status) {
      return status;
    }
  }
  if (isUsedStatus(booking.status)) {
    return "used";
  }
  if (booking.status && NOT_USED_STATUSES.includes(booking.status)) {
    return "not_used";
  }
  return "unknown";
};
