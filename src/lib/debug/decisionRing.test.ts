import { describe, expect, it } from "vitest";
import { createDecisionRing, maskEmail } from "./decisionRing";

const entry = (ticket_id: string) => ({
  request_id: `req-${ticket_id}`,
  endpoint: "/ticket/process",
  ticket_id,
  decision: "Approved" as const,
  method_used: "rules" as const,
  policy_applied: "Pre-Arrival (7+ days before event)",
  customer_email: "driver@example.com",
  tags: ["refund_approved"],
  duration_ms: 12,
});

describe("maskEmail", () => {
  it("keeps the first character and the domain", () => {
    expect(maskEmail("driver@example.com")).toBe("d***@example.com");
    expect(maskEmail("not-an-email")).toBe("***");
    expect(maskEmail(null)).toBeNull();
  });
});

describe("createDecisionRing", () => {
  it("lists newest first with masked emails", () => {
    const ring = createDecisionRing({ now: () => new Date("2025-11-01T00:00:00Z") });
    ring.push(entry("T-1"));
    ring.push(entry("T-2"));

    const items = ring.list();
    expect(items.map((item) => item.ticket_id)).toEqual(["T-2", "T-1"]);
    expect(items[0]).toMatchObject({ customer_email: "d***@example.com", at: "2025-11-01T00:00:00.000Z" });
  });

  it("drops the oldest entries beyond the limit", () => {
    const ring = createDecisionRing({ maxEntries: 2 });
    ring.push(entry("T-1"));
    ring.push(entry("T-2"));
    ring.push(entry("T-3"));
    expect(ring.list().map((item) => item.ticket_id)).toEqual(["T-3", "T-2"]);
  });
});
