import type { DecisionResult } from "../../types/refund";

export type DecisionRingEntry = {
  request_id: string;
  endpoint: string;
  ticket_id: string;
  decision: DecisionResult["decision"];
  method_used: DecisionResult["method_used"];
  policy_applied: string;
  customer_email?: string | null;
  tags: string[];
  duration_ms: number;
  at: string;
};

const MAX_ENTRIES = 50;

export const maskEmail = (value: string | null | undefined) => {
  if (typeof value !== "string" || value.trim() === "") {
    return value ?? null;
  }
  const [local, domain] = value.split("@");
  if (!domain) {
    return "***";
  }
  return `${local.slice(0, 1)}***@${domain}`;
};

export const createDecisionRing = (options: { maxEntries?: number; now?: () => Date } = {}) => {
  const maxEntries = options.maxEntries ?? MAX_ENTRIES;
  const now = options.now ?? (() => new Date());
  const buffer: DecisionRingEntry[] = [];

  const push = (entry: Omit<DecisionRingEntry, "at">) => {
    buffer.push({
      ...entry,
      customer_email: maskEmail(entry.customer_email),
      at: now().toISOString(),
    });
    if (buffer.length > maxEntries) {
      buffer.splice(0, buffer.length - maxEntries);
    }
  };

  const list = () => [...buffer].reverse();

  return { push, list };
};

export type DecisionRing = ReturnType<typeof createDecisionRing>;
