import { describe, expect, it } from "vitest";
import { detectZapierFailure, isInvalidBookingId, isZapierFailure } from "./zapierFailure";

const ticket = (overrides: Partial<Parameters<typeof detectZapierFailure>[0]> = {}) => ({
  subject: "Refund request",
  description: "Please refund my parking.",
  tags: [],
  custom_fields: {},
  ...overrides,
});

describe("isInvalidBookingId", () => {
  it("flags placeholder ids", () => {
    for (const value of ["0000", "0", "N/A", "na", "None", "NULL", "undefined", "   ", null]) {
      expect(isInvalidBookingId(value)).toBe(true);
    }
  });

  it("accepts real ids", () => {
    expect(isInvalidBookingId("509266779")).toBe(false);
    expect(isInvalidBookingId("PW-1001")).toBe(false);
  });
});

describe("detectZapierFailure", () => {
  it("detects the lookup failure message regardless of case", () => {
    const result = detectZapierFailure(
      ticket({ description: "BOOKING INFORMATION NOT FOUND FOR PROVIDED BOOKING NUMBER\nCustomer: a@b.co" })
    );
    expect(result).toEqual({
      is_failure: true,
      zapier_message_failure: true,
      failure_tag: null,
      invalid_booking_id: false,
      reason: "Zapier failure message detected",
    });
  });

  it("combines tag and custom-field evidence", () => {
    const result = detectZapierFailure(
      ticket({ tags: ["Zapier_Failed"], custom_fields: { cf_booking_number: "0000" } })
    );
    expect(result.reason).toBe("Failure tag present: zapier_failed; Invalid booking ID: '0000'");
    expect(result.is_failure).toBe(true);
  });

  it("reports no failure for a normal ticket", () => {
    const result = detectZapierFailure(ticket({ custom_fields: { booking_id: "509266779" } }));
    expect(result.is_failure).toBe(false);
    expect(result.reason).toBe("No failure detected");
  });

  it("never throws on missing fields", () => {
    expect(isZapierFailure({ subject: "", description: "" })).toBe(false);
  });
});
