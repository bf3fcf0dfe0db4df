import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createTtlCache } from "../../lib/cache/ttlCache";
import type { Logger } from "../../types/refund";

export const REFUND_RULES_KEY = "refund_rules";
export const CONDENSED_POLICY_KEY = "refund_policy_condensed";

export const DEFAULT_POLICY_DIR = fileURLToPath(new URL("../../policies/", import.meta.url));

export interface PolicyStore {
  load(key: string): Promise<string>;
}

const keywordList = z.array(z.string().min(1)).default([]);

export const refundRulesSchema = z.object({
  version: z.string().optional(),
  thresholds: z.object({
    pre_arrival_days: z.number().int().positive(),
    short_notice_days: z.number().int().nonnegative(),
  }),
  keywords: z.object({
    oversold: keywordList,
    duplicate: keywordList,
    paid_again: keywordList,
    closed: keywordList,
    accessibility: keywordList,
    special_circumstances: keywordList,
  }),
});

export type RefundRules = z.infer<typeof refundRulesSchema>;

const isMissingFile = (err: unknown) =>
  err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR");

/** Reads `<dir>/<key>.json`, then `<dir>/<key>.md`. */
export const createFilePolicyStore = (dir: string = DEFAULT_POLICY_DIR): PolicyStore => ({
  async load(key) {
    if (!/^[a-z0-9_-]+$/i.test(key)) {
      throw new Error(`Invalid policy key: ${key}`);
    }
    for (const extension of [".json", ".md"]) {
      try {
        return await readFile(path.join(dir, `${key}${extension}`), "utf8");
      } catch (err) {
        if (!isMissingFile(err)) {
          throw err;
        }
      }
    }
    throw new Error(`Policy document not found: ${key}`);
  },
});

export const createPolicyCache = (options: {
  store: PolicyStore;
  ttlSeconds: number;
  logger?: Logger;
  now?: () => number;
}) => {
  const documents = createTtlCache<string>({ ttlMs: options.ttlSeconds * 1000, now: options.now });

  const getText = (key: string) =>
    documents.getOrLoad(key, async () => {
      const text = await options.store.load(key);
      options.logger?.info({ key, length: text.length }, "Policy document loaded");
      return text;
    });

  const getRules = async (): Promise<RefundRules> => {
    const text = await getText(REFUND_RULES_KEY);
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new Error(`${REFUND_RULES_KEY} is not valid JSON`);
    }
    const parsed = refundRulesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`${REFUND_RULES_KEY} is invalid: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`);
    }
    return parsed.data;
  };

  const getCondensedPolicy = () => getText(CONDENSED_POLICY_KEY);

  return { getText, getRules, getCondensedPolicy, clear: documents.clear };
};

export type PolicyCache = ReturnType<typeof createPolicyCache>;
