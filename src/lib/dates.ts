const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number) => String(value).padStart(2, "0");

export const formatIsoDate = (year: number, month: number, day: number): string | null => {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
};

export const monthFromName = (name: string): number | null => MONTHS[name.slice(0, 3).toLowerCase()] ?? null;

/**
 * Normalizes a single date token to YYYY-MM-DD.
 * Accepts ISO dates/timestamps, US MM/DD/YYYY and month-name forms ("Nov 15, 2025", "November 15 2025").
 */
export const toIsoDate = (value: string | null | undefined): string | null => {
  if (!value) {
    return null;
  }
  const text = value.trim();

  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) {
    return formatIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) {
    return formatIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const named = text.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/);
  if (named) {
    const month = monthFromName(named[1]);
    return month ? formatIsoDate(Number(named[3]), month, Number(named[2])) : null;
  }

  return null;
};

export const parseTimestamp = (value: unknown): number | null => {
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const addDays = (isoDate: string, days: number): string => {
  const base = Date.parse(`${isoDate}T00:00:00Z`);
  return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
};

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export const daysBetween = (from: string, to: string): number | null => {
  const start = Date.parse(`${from}T00:00:00Z`);
  const end = Date.parse(`${to}T00:00:00Z`);
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    return null;
  }
  return Math.round((end - start) / DAY_MS);
};

export const todayIso = (now: Date = new Date()) => now.toISOString().slice(0, 10);
