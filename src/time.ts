// Fixed-offset time helpers.
// Message timestamps are rendered at one configured UTC offset so records from
// senders in different zones compare directly. Zone-less date inputs from
// callers are read at the same offset.

const DAY_MS = 24 * 60 * 60 * 1000;

/** Parse "+08:00", "-0530" or "Z" into minutes east of UTC. */
export function parseOffset(value: string): number | undefined {
  const v = value.trim();
  if (v === "Z" || v === "z") return 0;
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(v);
  if (!m) return undefined;
  const hours = Number(m[2]);
  const minutes = Number(m[3]);
  if (hours > 14 || minutes > 59) return undefined;
  const total = hours * 60 + minutes;
  return m[1] === "-" ? -total : total;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/** ISO 8601 rendering of an instant at a fixed offset, e.g. 2024-05-01T18:30:00+08:00. */
export function formatWithOffset(date: Date, offsetMinutes: number): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60 * 1000);
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}` +
    `T${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}` +
    formatOffset(offsetMinutes)
  );
}

export interface ParsedDateInput {
  date: Date;
  /** True when the input named a whole day (no time part). */
  dateOnly: boolean;
}

const LOCAL_DATE_TIME =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DAY_FIRST_DATE_TIME =
  /^(\d{1,2})[-/](\d{1,2})[-/](\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function fromParts(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  offsetMinutes: number
): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const utc = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(utc);
  if (check.getUTCDate() !== day) return undefined;
  return new Date(utc - offsetMinutes * 60 * 1000);
}

/**
 * Parse a caller-supplied date. Accepts YYYY-MM-DD, YYYY/MM/DD, DD-MM-YYYY,
 * DD/MM/YYYY (each with an optional HH:MM[:SS]) read at the fixed offset, or
 * any ISO string that carries its own zone.
 */
export function parseDateInput(value: string, offsetMinutes: number): ParsedDateInput | undefined {
  const v = value.trim();
  if (!v) return undefined;
  const local = LOCAL_DATE_TIME.exec(v);
  const dayFirst = local ? null : DAY_FIRST_DATE_TIME.exec(v);
  const m = local ?? dayFirst;
  if (m) {
    const [year, month, day] = local
      ? [Number(m[1]), Number(m[2]), Number(m[3])]
      : [Number(m[3]), Number(m[2]), Number(m[1])];
    const date = fromParts(year, month, day, Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0), offsetMinutes);
    return date ? { date, dateOnly: m[4] == null } : undefined;
  }
  if (/(?:Z|[+-]\d{2}:?\d{2})$/i.test(v)) {
    const d = new Date(v);
    return Number.isNaN(d.getTime()) ? undefined : { date: d, dateOnly: false };
  }
  return undefined;
}

/** Half-open instant range: since <= t < before. */
export interface DateRange {
  since?: Date;
  before?: Date;
}

/**
 * Build a range from caller dates. A date-only end names the whole day, so the
 * exclusive bound moves to the start of the next day.
 */
export function buildDateRange(
  start: ParsedDateInput | undefined,
  end: ParsedDateInput | undefined
): DateRange {
  const range: DateRange = {};
  if (start) range.since = start.date;
  if (end) range.before = end.dateOnly ? new Date(end.date.getTime() + DAY_MS) : end.date;
  return range;
}

export function inDateRange(time: number, range: DateRange): boolean {
  if (range.since && time < range.since.getTime()) return false;
  if (range.before && time >= range.before.getTime()) return false;
  return true;
}

export function isEmptyRange(range: DateRange): boolean {
  return !range.since && !range.before;
}
