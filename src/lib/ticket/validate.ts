import { z } from "zod";
import { toIsoDate } from "../dates";

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Invalid date format")
  .refine((value) => toIsoDate(value) !== null, "Invalid calendar date");
const nullableText = z.string().nullable().default(null);

export const ticketSchema = z.object({
  ticket_id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  subject: z.string().default(""),
  description: z.string().default(""),
  status: z.string().optional(),
  tags: z.array(z.string()).optional(),
  custom_fields: z.record(z.string().nullable().optional()).optional(),
  created_at: z.string().optional(),
});

export const customerInfoSchema = z.object({
  email: z.string().email().nullable().default(null),
  name: nullableText,
  arrival_date: isoDateSchema.nullable().default(null),
  exit_date: isoDateSchema.nullable().default(null),
  location: nullableText,
});

export const verifiedBookingSchema = z.object({
  booking_id: z.string().min(1),
  customer_email: nullableText,
  arrival_date: isoDateSchema.nullable().default(null),
  exit_date: isoDateSchema.nullable().default(null),
  location: nullableText,
  pass_used: z.boolean(),
  pass_usage_status: z.enum(["used", "not_used", "unknown"]),
  amount_paid: z.number().nullable().default(null),
  match_confidence: z.enum(["exact", "partial", "weak"]),
});

export const duplicateResultSchema = z
  .object({
    has_duplicates: z.boolean(),
    duplicate_count: z.number().int().min(0),
    action: z.enum(["deny", "refund_duplicate", "escalate"]),
    used_booking_id: nullableText,
    unused_booking_id: nullableText,
    explanation: z.string(),
    all_booking_ids: z.array(z.string()).default([]),
    duplicate_booking_ids: z.array(z.string()).default([]),
  })
  .refine((value) => !(value.has_duplicates && value.action === "deny"), {
    message: "A result with duplicates cannot have action deny",
    path: ["action"],
  });

export const decisionResultSchema = z.object({
  decision: z.enum(["Approved", "Denied", "Needs Human Review"]),
  reasoning: z.string().min(1),
  policy_applied: z.string().min(1),
  confidence: z.enum(["high", "medium", "low"]),
  cancellation_reason: nullableText,
  booking_info_found: z.boolean(),
  method_used: z.enum(["rules", "llm", "hybrid", "extraction_failed", "timeout"]),
  processing_time_ms: z.number().int().min(0),
  key_factors: z.array(z.string()).default([]),
});

const notesSchema = z.string().nullable().optional();

export const decideRefundBodySchema = z.object({
  ticket: ticketSchema,
  notes: notesSchema,
  evidence: z
    .object({
      verified_booking: verifiedBookingSchema.nullable().optional(),
      duplicate_result: duplicateResultSchema.nullable().optional(),
      customer_info: customerInfoSchema.nullable().optional(),
    })
    .default({}),
});

export const verifyBookingBodySchema = z.object({
  customer_info: customerInfoSchema,
  search_window: z
    .object({ start_date: isoDateSchema, end_date: isoDateSchema })
    .refine((value) => value.start_date <= value.end_date, {
      message: "start_date must not be after end_date",
      path: ["end_date"],
    })
    .nullable()
    .optional(),
});

export const analyzeDuplicatesBodySchema = z.object({
  bookings: z.array(z.unknown()),
});

export const renderNoteBodySchema = z.object({
  decision: decisionResultSchema.nullable().optional(),
  customer_info: customerInfoSchema.nullable().optional(),
  verified_booking: verifiedBookingSchema.nullable().optional(),
  candidates: z.array(verifiedBookingSchema).nullable().optional(),
  duplicates: duplicateResultSchema.nullable().optional(),
  verification_failure: z.string().nullable().optional(),
});

export const processTicketBodySchema = z.object({
  ticket: ticketSchema,
  notes: notesSchema,
  timeout_ms: z.number().int().positive().max(300_000).optional(),
});

export const formatZodError = (error: z.ZodError) => {
  const missing_fields: string[] = [];
  const messageParts: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join(".");
    if (issue.code === "invalid_type" && issue.received === "undefined") {
      if (path) {
        missing_fields.push(path);
      }
    } else {
      messageParts.push(path ? `${path}: ${issue.message}` : issue.message);
    }
  }

  return {
    message: messageParts.join("; ") || "Validation failed",
    missing_fields,
  };
};
