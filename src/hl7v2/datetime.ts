/**
 * HL7v2 DTM/TS parsing and ISO-8601 rendering.
 *
 * Format: YYYY[MM[DD[HH[MM[SS[.S[S[S[S]]]]]]]]][+/-ZZZZ]
 *
 * Precision may stop after any group. Missing month/day default to 01, missing
 * time parts to 00. A value without an offset is taken as UTC.
 */

const HL7_TS_PATTERN = /^(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?(?:\.(\d+))?([+-]\d{4})?$/;

const MICROSECOND_DIGITS = 6;

/** A parsed timestamp: an instant plus the offset it was written in */
export interface HL7DateTime {
  /** Whole-millisecond UTC instant (sub-millisecond part in `microsecond`) */
  epochMs: number;
  /** Fraction of the second, 0-999999 */
  microsecond: number;
  /** Offset declared in the value, in minutes east of UTC (0 when absent) */
  offsetMinutes: number;
}

export interface HL7Date {
  year: number;
  month: number;
  day: number;
}

interface TimestampParts extends HL7Date {
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
  /** Offset digits as written, range-checked only where the instant is needed */
  offsetHour: number;
  offsetMinute: number;
  offsetMinutes: number;
}

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

function toInt(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : parseInt(value, 10);
}

function matchTimestamp(value: string): TimestampParts | undefined {
  const match = HL7_TS_PATTERN.exec(value);
  if (!match) return undefined;

  const [, yyyy, mm, dd, hh, mi, ss, fraction, tz] = match;

  const sign = tz?.startsWith("-") ? -1 : 1;
  const tzHours = tz ? parseInt(tz.slice(1, 3), 10) : 0;
  const tzMinutes = tz ? parseInt(tz.slice(3, 5), 10) : 0;

  return {
    year: toInt(yyyy, 0),
    month: toInt(mm, 1),
    day: toInt(dd, 1),
    hour: toInt(hh, 0),
    minute: toInt(mi, 0),
    second: toInt(ss, 0),
    microsecond: fraction ? parseInt(fraction.padEnd(MICROSECOND_DIGITS, "0").slice(0, MICROSECOND_DIGITS), 10) : 0,
    offsetHour: tzHours,
    offsetMinute: tzMinutes,
    offsetMinutes: sign * (tzHours * 60 + tzMinutes),
  };
}

/**
 * Builds a UTC Date for a calendar date. Date.UTC maps years 0-99 onto
 * 1900-1999, so the year is set separately.
 */
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function isValidDate({ year, month, day }: HL7Date): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  const date = utcDate(year, month, day);
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parses an HL7 timestamp into an instant.
 * Returns undefined for empty input, values outside the grammar, calendar
 * values that do not exist (20250230, hour 24, offset +2500), and instants
 * that fall outside years 1-9999 once shifted to UTC.
 */
export function parseHL7DateTime(value: string | undefined): HL7DateTime | undefined {
  if (!value) return undefined;

  const parts = matchTimestamp(value);
  if (!parts || !isValidDate(parts)) return undefined;
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) return undefined;
  if (parts.offsetHour > 23 || parts.offsetMinute > 59) return undefined;

  const local = utcDate(parts.year, parts.month, parts.day);
  local.setUTCHours(parts.hour, parts.minute, parts.second, 0);
  const epochMs = local.getTime() - parts.offsetMinutes * 60_000;

  // the offset may shift the instant out of the four-digit year range
  const utcYear = new Date(epochMs).getUTCFullYear();
  if (utcYear < MIN_YEAR || utcYear > MAX_YEAR) return undefined;

  return {
    epochMs,
    microsecond: parts.microsecond,
    offsetMinutes: parts.offsetMinutes,
  };
}

/**
 * Parses the date part of an HL7 timestamp (DOB style fields).
 * Time of day and offset are ignored.
 */
export function parseHL7Date(value: string | undefined): HL7Date | undefined {
  if (!value) return undefined;

  const parts = matchTimestamp(value);
  if (!parts) return undefined;

  const date: HL7Date = { year: parts.year, month: parts.month, day: parts.day };
  return isValidDate(date) ? date : undefined;
}

/**
 * Renders an instant in UTC: 2025-05-02T07:00:00Z.
 * The six-digit fraction is only written when it is non-zero.
 */
export function toIso8601Z(dt: HL7DateTime): string {
  const seconds = new Date(dt.epochMs).toISOString().slice(0, 19);
  const fraction = dt.microsecond > 0 ? `.${String(dt.microsecond).padStart(MICROSECOND_DIGITS, "0")}` : "";
  return `${seconds}${fraction}Z`;
}

/** YYYY-MM-DD */
export function formatIsoDate({ year, month, day }: HL7Date): string {
  return [
    String(year).padStart(4, "0"),
    String(month).padStart(2, "0"),
    String(day).padStart(2, "0"),
  ].join("-");
}
