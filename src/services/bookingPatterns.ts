import { toIsoDate } from "../lib/dates";
import { stripHtml } from "../lib/html";
import type { BookingExtraction, BookingInfo, BookingType, ExtractionConfidence } from "../types/refund";

const BOOKING_ID_PATTERNS = [
  /PW-\d+/i,
  /Booking\s*(?:ID|#|Number)?\s*:?\s*(\d+)/i,
  /Order\s*(?:ID|#|Number)?\s*:?\s*(\d+)/i,
  /Confirmation\s*(?:ID|#|Number)?\s*:?\s*(\d+)/i,
  /(?:^|\s)(\d{9,12})(?=\s|$)/,
];

export const MONTH_NAMES =
  "(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)";

const DATE_PATTERN = new RegExp(
  [
    "(?<!\\d)(\\d{4})[-/](\\d{2})[-/](\\d{2})(?!\\d)",
    "(?<![\\d/-])(\\d{1,2})[-/](\\d{1,2})[-/](\\d{4})(?!\\d)",
    `\\b(${MONTH_NAMES}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4})\\b`,
  ].join("|"),
  "gi"
);

const LOCATION_PATTERNS = [
  /(?:\bat|location|facility|garage|lot):\s*([^\n,]+)/i,
  /parking\s+(?:at|in|near)\s+([^\n,.]+)/i,
  /(?:address|venue):\s*([^\n,]+)/i,
];

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const AMOUNT_PATTERN = /\$\s*(\d+(?:\.\d{2})?)/;

const BOOKING_TYPE_KEYWORDS: Array<[BookingType, string[]]> = [
  ["confirmed", ["confirmed", "advance", "pre-booked", "reservation"]],
  ["on-demand", ["on-demand", "same-day", "instant", "immediate"]],
  ["third-party", ["third-party", "expedia", "priceline", "booking.com", "hotels.com"]],
];

export const emptyBookingInfo = (): BookingInfo => ({
  booking_id: null,
  event_date: null,
  reservation_date: null,
  cancellation_date: null,
  booking_type: null,
  amount: null,
  location: null,
  customer_email: null,
});

/** Keeps every value already present in `base` and takes the rest from `extra`. */
export const fillMissing = (base: BookingInfo, extra: Partial<BookingInfo>): BookingInfo => ({
  booking_id: base.booking_id ?? extra.booking_id ?? null,
  event_date: base.event_date ?? extra.event_date ?? null,
  reservation_date: base.reservation_date ?? extra.reservation_date ?? null,
  cancellation_date: base.cancellation_date ?? extra.cancellation_date ?? null,
  booking_type: base.booking_type ?? extra.booking_type ?? null,
  amount: base.amount ?? extra.amount ?? null,
  location: base.location ?? extra.location ?? null,
  customer_email: base.customer_email ?? extra.customer_email ?? null,
});

export type DateMention = { index: number; iso: string };

/** Absolute dates with their offsets; impossible calendar dates are skipped. */
export const findDates = (text: string): DateMention[] => {
  const mentions: DateMention[] = [];
  for (const match of text.matchAll(DATE_PATTERN)) {
    let iso: string | null = null;
    if (match[1] && match[2] && match[3]) {
      iso = toIsoDate(`${match[1]}-${match[2]}-${match[3]}`);
    } else if (match[4] && match[5] && match[6]) {
      iso = toIsoDate(`${match[4]}/${match[5]}/${match[6]}`);
    } else if (match[7]) {
      iso = toIsoDate(match[7].replace(/\s+/g, " "));
    }
    if (iso) {
      mentions.push({ index: match.index ?? 0, iso });
    }
  }
  return mentions;
};

/** Every date in the text, in order of appearance, normalized and de-duplicated. */
export const extractDates = (text: string): string[] => {
  const dates: string[] = [];
  for (const { iso } of findDates(text)) {
    if (!dates.includes(iso)) {
      dates.push(iso);
    }
  }
  return dates;
};

export const extractBookingId = (text: string): string | null => {
  for (const pattern of BOOKING_ID_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[1] ?? match[0];
    }
  }
  return null;
};

export const extractLocation = (text: string): string | null => {
  for (const pattern of LOCATION_PATTERNS) {
    const match = text.match(pattern);
    if (match?.[1]) {
      const location = match[1].split(/\s+/).filter(Boolean).join(" ");
      if (location) {
        return location.slice(0, 200);
      }
    }
  }
  return null;
};

export const inferBookingType = (text: string): BookingType | null => {
  const lower = text.toLowerCase();
  for (const [type, keywords] of BOOKING_TYPE_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return type;
    }
  }
  return null;
};

const CRITICAL_FIELDS = ["booking_id", "event_date"] as const;
const OPTIONAL_FIELDS = ["amount", "reservation_date", "location", "booking_type", "customer_email"] as const;

const countFields = (info: BookingInfo) => ({
  critical: CRITICAL_FIELDS.filter((field) => info[field] !== null).length,
  optional: OPTIONAL_FIELDS.filter((field) => info[field] !== null).length,
});

/** Regex extraction is conservative: high needs both critical fields and four optional ones. */
export const patternConfidence = (info: BookingInfo): ExtractionConfidence => {
  const { critical, optional } = countFields(info);
  if (critical === 2 && optional >= 4) {
    return "high";
  }
  if (critical === 2 && optional >= 2) {
    return "medium";
  }
  return "low";
};

export const llmConfidence = (info: BookingInfo): ExtractionConfidence => {
  const { critical, optional } = countFields(info);
  if (critical === 2 && optional >= 3) {
    return "high";
  }
  if (critical === 2 || (critical === 1 && optional >= 3)) {
    return "medium";
  }
  return "low";
};

const hasAnyField = (info: BookingInfo) => Object.values(info).some((value) => value !== null);

export const extractFromText = (text: string): BookingExtraction => {
  const info = emptyBookingInfo();
  if (!text || text.trim() === "") {
    return { found: false, booking_info: info, confidence: "low", source: "pattern" };
  }

  info.booking_id = extractBookingId(text);

  const dates = extractDates(text);
  if (dates.length >= 2) {
    info.reservation_date = dates[0];
    info.event_date = dates[1];
  } else if (dates.length === 1) {
    info.event_date = dates[0];
  }

  info.location = extractLocation(text);
  info.customer_email = text.match(EMAIL_PATTERN)?.[0] ?? null;
  const amount = text.match(AMOUNT_PATTERN);
  info.amount = amount ? Number(amount[1]) : null;
  info.booking_type = inferBookingType(text);

  return { found: hasAnyField(info), booking_info: info, confidence: patternConfidence(info), source: "pattern" };
};

const cellText = (html: string) => stripHtml(html).replace(/\s+/g, " ").trim();

/** Reads label/value table rows first, falling back to text patterns when the tables yield little. */
export const extractFromHtml = (html: string): BookingExtraction => {
  const info = emptyBookingInfo();
  let tableFields = 0;

  for (const row of html.matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi)) {
    const cells = [...row[1].matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi)].map((cell) => cellText(cell[1]));
    if (cells.length < 2) {
      continue;
    }
    const label = cells[0].toLowerCase();
    const value = cells[1];
    if (label.includes("created") || label.includes("booked")) {
      info.reservation_date = extractDates(value)[0] ?? info.reservation_date;
    } else if (label.includes("booking") || label.includes("order") || label.includes("confirmation")) {
      info.booking_id = value;
    } else if (label.includes("amount") || label.includes("total") || label.includes("price")) {
      const amount = value.match(AMOUNT_PATTERN);
      if (amount) {
        info.amount = Number(amount[1]);
      }
    } else if (label.includes("event") || label.includes("parking date") || label.includes("start")) {
      info.event_date = extractDates(value)[0] ?? info.event_date;
    } else if (label.includes("reservation")) {
      info.reservation_date = extractDates(value)[0] ?? info.reservation_date;
    } else if (label.includes("location") || label.includes("facility") || label.includes("address")) {
      info.location = value;
    } else if (label.includes("email")) {
      info.customer_email = value;
    } else {
      continue;
    }
    tableFields += 1;
  }

  const merged = tableFields < 2 ? fillMissing(info, extractFromText(stripHtml(html)).booking_info) : info;

  return { found: hasAnyField(merged), booking_info: merged, confidence: patternConfidence(merged), source: "pattern" };
};

export const looksLikeHtml = (text: string) => /<\/?[a-z][^>]*>/i.test(text);

export const extractBookingPatterns = (notes: string): BookingExtraction =>
  looksLikeHtml(notes) ? extractFromHtml(notes) : extractFromText(notes);
