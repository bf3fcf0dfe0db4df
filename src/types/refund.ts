export type Logger = {
  info: (meta: unknown, message?: string) => void;
  warn: (meta: unknown, message?: string) => void;
  error: (meta: unknown, message?: string) => void;
};

export type CustomerInfo = Readonly<{
  email: string | null;
  name: string | null;
  arrival_date: string | null;
  exit_date: string | null;
  location: string | null;
}>;

export type BookingLocation = {
  id: string;
  name?: string;
};

/** A provider booking record once it has passed shape validation. */
export type Booking = {
  id: string;
  start_time: string;
  end_time: string;
  location: BookingLocation;
  status?: string;
  customer_email?: string;
  amount_paid?: number;
  raw: Record<string, unknown>;
};

export type PassUsageStatus = "used" | "not_used" | "unknown";
export type MatchConfidence = "exact" | "partial" | "weak";

export type VerifiedBooking = {
  booking_id: string;
  customer_email: string | null;
  arrival_date: string | null;
  exit_date: string | null;
  location: string | null;
  pass_used: boolean;
  pass_usage_status: PassUsageStatus;
  amount_paid: number | null;
  match_confidence: MatchConfidence;
};

export type DuplicateAction = "deny" | "refund_duplicate" | "escalate";

export type DuplicateDetectionResult = {
  has_duplicates: boolean;
  duplicate_count: number;
  action: DuplicateAction;
  used_booking_id: string | null;
  unused_booking_id: string | null;
  explanation: string;
  all_booking_ids: string[];
  duplicate_booking_ids: string[];
};

export type Decision = "Approved" | "Denied" | "Needs Human Review";
export type Confidence = "high" | "medium" | "low";
export type DecisionMethod = "rules" | "llm" | "hybrid" | "extraction_failed" | "timeout";

export type DecisionResult = {
  decision: Decision;
  reasoning: string;
  policy_applied: string;
  confidence: Confidence;
  cancellation_reason: string | null;
  booking_info_found: boolean;
  method_used: DecisionMethod;
  processing_time_ms: number;
  key_factors: string[];
};

export type BookingType = "confirmed" | "on-demand" | "third-party";

export type BookingInfo = {
  booking_id: string | null;
  event_date: string | null;
  reservation_date: string | null;
  cancellation_date: string | null;
  booking_type: BookingType | null;
  amount: number | null;
  location: string | null;
  customer_email: string | null;
};

export type ExtractionConfidence = "high" | "medium" | "low";

export type BookingExtraction = {
  found: boolean;
  booking_info: BookingInfo;
  confidence: ExtractionConfidence;
  source: "pattern" | "llm" | "none";
};

export type TicketData = {
  ticket_id: string;
  subject: string;
  description: string;
  status?: string;
  tags?: string[];
  custom_fields?: Record<string, string | null | undefined>;
  created_at?: string;
};

export type SearchWindow = {
  start_date: string;
  end_date: string;
};

type VerificationBase = {
  customer_info: CustomerInfo;
  api_calls_made: number;
  processing_time_ms: number;
};

export type BookingVerificationResult =
  | (VerificationBase & {
      outcome: "verified";
      verified_booking: VerifiedBooking;
      discrepancies: string[];
      should_escalate: boolean;
      escalation_reason: string | null;
    })
  | (VerificationBase & { outcome: "multiple_bookings"; candidates: Booking[] })
  | (VerificationBase & { outcome: "no_booking_found" })
  | (VerificationBase & { outcome: "verification_failed"; failure_reason: string });

export type DecisionEvidence = {
  verified_booking?: VerifiedBooking | null;
  duplicate_result?: DuplicateDetectionResult | null;
  customer_info?: CustomerInfo | null;
};
