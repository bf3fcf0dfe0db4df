import type { VerifiedBooking } from "../../types/refund";

export type AutomationGuardResult = { allowed: true } | { allowed: false; reason: string };

/** An automated refund decision needs a verified booking with known usage and a better-than-weak match. */
export const canAutomateDecision = (verified: VerifiedBooking | null | undefined): AutomationGuardResult => {
  if (!verified) {
    return { allowed: false, reason: "No verified booking" };
  }
  if (verified.pass_usage_status === "unknown") {
    return { allowed: false, reason: "Pass usage status could not be determined" };
  }
  if (verified.match_confidence === "weak") {
    return { allowed: false, reason: "Booking match confidence is weak" };
  }
  return { allowed: true };
};
