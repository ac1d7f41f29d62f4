import { format, isValid, parse, parseISO } from "date-fns";

/**
 * Layouts tried after ISO 8601, in order.
 */
export const HIRING_DATE_FORMATS = ["yyyy/MM/dd", "MM/dd/yyyy"] as const;

const TABLE_DATE_FORMAT = "yyyy-MM-dd";
// Trailing UTC offset after a time of day: "Z", "+02", "+0200", "-05:00"
const UTC_OFFSET = /(\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?)(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a hiring date.
 *
 * ISO 8601 first (date, date-time with `T` or space, optional seconds and
 * fractions), then the slash layouts. A UTC offset is dropped: the calendar
 * date as written is the hiring date, whatever the server's time zone.
 * Returns null for empty or unparseable input; never guesses.
 */
export function parseHiringDate(raw: string | null | undefined): Date | null {
  const value = raw?.trim() ?? "";
  if (!value) return null;

  const iso = parseISO(value.replace(UTC_OFFSET, "$1"));
  if (isValid(iso)) return iso;

  for (const layout of HIRING_DATE_FORMATS) {
    const parsed = parse(value, layout, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

export function formatHiringDate(date: Date | null): string | null {
  return date === null ? null : format(date, TABLE_DATE_FORMAT);
}
