import { z } from "zod";
import { addDays, formatIsoDate, monthFromName, toIsoDate } from "../lib/dates";
import { ExtractionError } from "../lib/errors";
import { completeSafely, parseJsonObject, type LanguageModel } from "../lib/llm/gemini";
import type { CustomerInfo, Logger } from "../types/refund";
import { EMAIL_PATTERN, MONTH_NAMES, extractLocation, findDates, type DateMention } from "./bookingPatterns";

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const RELATIVE_PATTERN = new RegExp(
  `\\b(today|tonight|tomorrow|yesterday|next week|(?:next|this)\\s+(?:${WEEKDAYS.join("|")}))\\b`,
  "gi"
);

const RANGE_PATTERN = new RegExp(
  `\\b(${MONTH_NAMES})\\.?\\s+(\\d{1,2})\\s*(?:-|–|to|through)\\s*(\\d{1,2}),?\\s+(\\d{4})\\b`,
  "i"
);

const ARRIVAL_WORDS = /\b(?:arriv\w*|check[- ]?in|entry|enter(?:ed|ing)?|start\w*|from)\b/;
const EXIT_WORDS = /\b(?:exit\w*|depart\w*|leav(?:e|ing)|check[- ]?out|end(?:s|ed|ing)?|until)\b/;

const NAME_PATTERN = /(?:[Nn]ame\s*:|[Mm]y name is)\s*([A-Z][a-zA-Z'-]+(?:[ \t]+[A-Z][a-zA-Z'-]+){0,2})/;

export const emptyCustomerInfo = (): CustomerInfo =>
  Object.freeze({ email: null, name: null, arrival_date: null, exit_date: null, location: null });

const resolveRelative = (phrase: string, anchor: string): string => {
  const lower = phrase.toLowerCase().replace(/\s+/g, " ");
  if (lower === "today" || lower === "tonight") {
    return anchor;
  }
  if (lower === "tomorrow") {
    return addDays(anchor, 1);
  }
  if (lower === "yesterday") {
    return addDays(anchor, -1);
  }
  if (lower === "next week") {
    return addDays(anchor, 7);
  }
  const [qualifier, dayName] = lower.split(" ");
  const target = WEEKDAYS.indexOf(dayName);
  const current = new Date(`${anchor}T00:00:00Z`).getUTCDay();
  let offset = (target - current + 7) % 7;
  if (qualifier === "next" && offset === 0) {
    offset = 7;
  }
  return addDays(anchor, offset);
};

/** Absolute and relative date mentions in order; relative ones need an anchor date to resolve. */
const findDateMentions = (text: string, anchor: string | null): DateMention[] => {
  const mentions = findDates(text);
  if (anchor) {
    for (const match of text.matchAll(RELATIVE_PATTERN)) {
      mentions.push({ index: match.index ?? 0, iso: resolveRelative(match[1], anchor) });
    }
  }
  return mentions.sort((a, b) => a.index - b.index);
};

const extractDateRange = (text: string, anchor: string | null) => {
  const range = text.match(RANGE_PATTERN);
  if (range) {
    const month = monthFromName(range[1]);
    const year = Number(range[4]);
    if (month) {
      const startDay = Number(range[2]);
      const endDay = Number(range[3]);
      const arrival = formatIsoDate(year, month, startDay);
      // "Nov 30-2" ends in the following month
      const exit =
        endDay < startDay
          ? formatIsoDate(month === 12 ? year + 1 : year, month === 12 ? 1 : month + 1, endDay)
          : formatIsoDate(year, month, endDay);
      if (arrival && exit) {
        return { arrival_date: arrival, exit_date: exit };
      }
    }
  }

  let arrival_date: string | null = null;
  let exit_date: string | null = null;
  for (const line of text.split(/\n|(?<=[.!?])\s+(?=[A-Z])/)) {
    const dates = findDateMentions(line, anchor);
    if (dates.length === 0) {
      continue;
    }
    const lower = line.toLowerCase();
    const mentionsArrival = ARRIVAL_WORDS.test(lower);
    const mentionsExit = EXIT_WORDS.test(lower);
    if (mentionsArrival && mentionsExit && dates.length >= 2) {
      arrival_date = arrival_date ?? dates[0].iso;
      exit_date = exit_date ?? dates[1].iso;
    } else if (mentionsArrival && !mentionsExit) {
      arrival_date = arrival_date ?? dates[0].iso;
    } else if (mentionsExit && !mentionsArrival) {
      exit_date = exit_date ?? dates[0].iso;
    }
  }
  if (arrival_date || exit_date) {
    return { arrival_date, exit_date };
  }

  const all = findDateMentions(text, anchor);
  const unique = all.map((mention) => mention.iso).filter((iso, index, list) => list.indexOf(iso) === index);
  if (unique.length >= 2) {
    return { arrival_date: unique[0], exit_date: unique[1] };
  }
  if (unique.length === 1) {
    // A single date is a same-day booking.
    return { arrival_date: unique[0], exit_date: unique[0] };
  }
  return { arrival_date: null, exit_date: null };
};

/** Structured-pattern stage only; never calls a model. */
export const extractCustomerInfoFromPatterns = (text: string, ticketTimestamp?: string | null): CustomerInfo => {
  if (!text || text.trim() === "") {
    return emptyCustomerInfo();
  }
  const anchor = toIsoDate(ticketTimestamp ?? null);
  const { arrival_date, exit_date } = extractDateRange(text, anchor);
  return Object.freeze({
    email: text.match(EMAIL_PATTERN)?.[0].toLowerCase() ?? null,
    name: text.match(NAME_PATTERN)?.[1] ?? null,
    arrival_date,
    exit_date,
    location: extractLocation(text),
  });
};

const llmCustomerSchema = z.object({
  email: z.string().nullish(),
  name: z.string().nullish(),
  arrival_date: z.string().nullish(),
  exit_date: z.string().nullish(),
  location: z.string().nullish(),
});

const buildExtractionPrompt = (text: string, anchor: string | null) =>
  [
    "Extract customer information from the following parking support ticket.",
    "Return a JSON object with the keys email, name, arrival_date, exit_date, location.",
    "- email: the customer's email address",
    "- arrival_date / exit_date: parking start and end dates as YYYY-MM-DD with a 4-digit year",
    "- location: the parking facility name or address",
    anchor
      ? `Resolve relative dates (today, tomorrow, next Friday) against the ticket date ${anchor}.`
      : "If a date is only given relative to today, leave it null.",
    "Use null for anything not stated. Do not guess.",
    "",
    "Ticket:",
    text,
  ].join("\n");

const isEmail = (value: string) => new RegExp(`^${EMAIL_PATTERN.source}$`).test(value.trim());

export const isCustomerInfoComplete = (info: CustomerInfo) =>
  Boolean(info.email && info.arrival_date && info.exit_date);

/**
 * Pattern extraction first; a single model call fills whatever is still missing.
 * Model values only land in empty fields and only when they validate.
 */
export const extractCustomerInfo = async (input: {
  text: string;
  ticket_timestamp?: string | null;
  model?: LanguageModel | null;
  timeoutMs?: number;
  logger?: Logger;
}): Promise<CustomerInfo> => {
  const fromPatterns = extractCustomerInfoFromPatterns(input.text, input.ticket_timestamp);
  if (!input.text || input.text.trim() === "" || isCustomerInfoComplete(fromPatterns) || !input.model) {
    return fromPatterns;
  }

  const anchor = toIsoDate(input.ticket_timestamp ?? null);
  const outcome = await completeSafely(input.model, buildExtractionPrompt(input.text, anchor), {
    timeoutMs: input.timeoutMs ?? 10_000,
  });
  if (!outcome.ok) {
    input.logger?.warn({ error_code: outcome.error_code, message: outcome.message }, "Customer info LLM extraction failed");
    return fromPatterns;
  }

  const parsed = llmCustomerSchema.safeParse(parseJsonObject(outcome.text));
  if (!parsed.success) {
    input.logger?.warn({ issues: parsed.error.issues.length }, "Customer info LLM response invalid");
    return fromPatterns;
  }

  const fromModel = parsed.data;
  const email = fromModel.email && isEmail(fromModel.email) ? fromModel.email.trim().toLowerCase() : null;
  const merged: CustomerInfo = Object.freeze({
    email: fromPatterns.email ?? email,
    name: fromPatterns.name ?? (fromModel.name?.trim() || null),
    arrival_date: fromPatterns.arrival_date ?? toIsoDate(fromModel.arrival_date),
    exit_date: fromPatterns.exit_date ?? toIsoDate(fromModel.exit_date),
    location: fromPatterns.location ?? (fromModel.location?.trim() || null),
  });

  input.logger?.info(
    {
      email_present: Boolean(merged.email),
      dates_present: Boolean(merged.arrival_date && merged.exit_date),
      complete: isCustomerInfoComplete(merged),
    },
    "Customer info extracted"
  );
  return merged;
};

/** Throws when nothing usable for a booking search was found. */
export const requireCustomerFacts = (info: CustomerInfo): CustomerInfo => {
  if (!info.email && !info.arrival_date && !info.exit_date) {
    throw new ExtractionError("No email address or date could be extracted from the ticket");
  }
  return info;
};
