import { z } from "zod";
import reasonData from "../../policies/cancellation_reasons.json";

export const CANCELLATION_REASONS = [
  "Other",
  "Tolerance",
  "Multi-day",
  "Pending re-book",
  "Pre-arrival",
  "Oversold",
  "No attendant",
  "Amenity missing",
  "Poor experience",
  "Inaccurate hours of operation",
  "Attendant refused customer",
  "Duplicate booking",
  "Confirmed re-book",
  "Paid again",
  "Accessibility",
  "PW cancellation",
] as const;

export type CancellationReason = (typeof CANCELLATION_REASONS)[number];

const reasonSchema = z.enum(CANCELLATION_REASONS);

const mappingSchema = z.object({
  default_reason: reasonSchema,
  reasons: z.array(z.object({ reason: reasonSchema, keywords: z.array(z.string().min(1)) })),
});

const mapping = mappingSchema.parse(reasonData);

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const KEYWORD_MATCHERS = mapping.reasons.map(({ reason, keywords }) => ({
  reason,
  patterns: keywords.map((keyword) => new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9])`)),
}));

export const isCancellationReason = (value: string): value is CancellationReason =>
  reasonSchema.safeParse(value).success;

/** First reason (in list order) with a keyword in the reasoning or policy name; the default otherwise. */
export const mapCancellationReason = (reasoning: string, policyApplied: string): CancellationReason => {
  const text = `${reasoning} ${policyApplied}`.toLowerCase();
  const match = KEYWORD_MATCHERS.find(({ patterns }) => patterns.some((pattern) => pattern.test(text)));
  return match ? match.reason : mapping.default_reason;
};
