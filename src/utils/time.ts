/**
 * Time parsing and formatting for task timestamps.
 *
 * All values are local wall-clock time. The canonical stored form is
 * `YYYY-MM-DD HH:MM:SS`; users may type any of the accepted input formats.
 */

interface InputFormat {
  /** Human-readable pattern, shown in prompts and errors */
  label: string;
  pattern: RegExp;
  build(match: RegExpMatchArray, now: Date): Date | null;
}

const CANONICAL_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

const FULL_DATETIME_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/;

/**
 * Accepted input formats, tried in order. First match wins.
 */
const INPUT_FORMATS: InputFormat[] = [
  {
    label: "YYYY-MM-DD HH:MM:SS",
    pattern: CANONICAL_PATTERN,
    build: (m) => makeDate(num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), num(m[6])),
  },
  {
    label: "YYYY-MM-DD HH:MM",
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2})$/,
    build: (m) => makeDate(num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), 0),
  },
  {
    label: "HH:MM",
    pattern: /^(\d{1,2}):(\d{1,2})$/,
    build: (m, now) => onDateOf(now, num(m[1]), num(m[2])),
  },
  {
    label: "YYYY-MM-DD",
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    build: (m) => makeDate(num(m[1]), num(m[2]), num(m[3]), 0, 0, 0),
  },
  {
    label: "hh:MM AM/PM",
    pattern: /^(\d{1,2}):(\d{1,2})\s+([AaPp][Mm])$/,
    build: (m, now) => {
      const hour = from12Hour(num(m[1]), m[3]);
      return hour === null ? null : onDateOf(now, hour, num(m[2]));
    },
  },
  {
    label: "hh AM/PM",
    pattern: /^(\d{1,2})\s+([AaPp][Mm])$/,
    build: (m, now) => {
      const hour = from12Hour(num(m[1]), m[2]);
      return hour === null ? null : onDateOf(now, hour, 0);
    },
  },
];

/** Labels of the accepted input formats, in matching order */
export const ACCEPTED_FORMATS: readonly string[] = INPUT_FORMATS.map((f) =>
  f.label
);

/**
 * Parse a user-supplied time string.
 * Formats without a date are anchored to the calendar date of `now`.
 * @returns the parsed instant, or null when no format matches
 */
export function parseFlexible(input: string, now: Date = new Date()): Date | null {
  const value = input.trim();
  for (const format of INPUT_FORMATS) {
    const match = value.match(format.pattern);
    if (!match) continue;
    const date = format.build(match, now);
    if (date) return date;
  }
  return null;
}

/**
 * True iff `input` is a full datetime (`YYYY-MM-DD HH:MM`, optional `:SS`)
 * strictly later than `now`. Flexible input must go through
 * `parseFlexible` first; see `parseFutureTime`.
 */
export function isFutureAndValid(input: string, now: Date = new Date()): boolean {
  const m = input.trim().match(FULL_DATETIME_PATTERN);
  if (!m) return false;
  const date = makeDate(
    num(m[1]),
    num(m[2]),
    num(m[3]),
    num(m[4]),
    num(m[5]),
    m[6] === undefined ? 0 : num(m[6]),
  );
  return date !== null && date.getTime() > now.getTime();
}

/**
 * Parse any accepted format and keep it only if it lands in the future.
 * This is the check the editor applies to every time the user types.
 */
export function parseFutureTime(input: string, now: Date = new Date()): Date | null {
  const parsed = parseFlexible(input, now);
  if (!parsed) return null;
  return isFutureAndValid(toCanonicalString(parsed), now) ? parsed : null;
}

/**
 * Strict parse of the stored `YYYY-MM-DD HH:MM:SS` form
 */
export function parseCanonical(value: string): Date | null {
  const m = value.match(CANONICAL_PATTERN);
  if (!m) return null;
  return makeDate(num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), num(m[6]));
}

/**
 * Format as `YYYY-MM-DD HH:MM:SS`
 */
export function toCanonicalString(ts: Date): string {
  return `${toInputString(ts)}:${pad2(ts.getSeconds())}`;
}

/**
 * Format as `YYYY-MM-DD HH:MM`, the full-datetime input form
 */
export function toInputString(ts: Date): string {
  return `${ts.getFullYear()}-${pad2(ts.getMonth() + 1)}-${pad2(ts.getDate())} ${
    pad2(ts.getHours())
  }:${pad2(ts.getMinutes())}`;
}

// === Helpers ===

function num(value: string | undefined): number {
  return value === undefined ? NaN : parseInt(value, 10);
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

function from12Hour(hour: number, meridiem: string | undefined): number | null {
  if (hour < 1 || hour > 12 || meridiem === undefined) return null;
  const pm = meridiem.toLowerCase() === "pm";
  return (hour % 12) + (pm ? 12 : 0);
}

function onDateOf(now: Date, hour: number, minute: number): Date | null {
  return makeDate(now.getFullYear(), now.getMonth() + 1, now.getDate(), hour, minute, 0);
}

/**
 * Build a local date, rejecting out-of-range fields instead of letting
 * the Date constructor roll them over (month 13, Feb 30, 24:00).
 */
function makeDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): Date | null {
  if (
    !Number.isInteger(year) || month < 1 || month > 12 || day < 1 ||
    hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 ||
    second > 59
  ) {
    return null;
  }
  const date = new Date(year, month - 1, day, hour, minute, second);
  if (date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}
