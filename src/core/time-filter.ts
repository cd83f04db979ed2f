/**
 * Timestamp parsing and the inclusive time window applied to rows.
 *
 * Timestamps are epoch microseconds so that sub-second samples keep
 * their order and bounds compare exactly.
 */

import { RemintError, TimeParseError, type SourceLocation } from "./errors.js";

export const MICROS_PER_SECOND = 1_000_000;

/** 2038-01-19T03:14:07Z, the last second of signed 32-bit Unix time */
export const MAX_LEGACY_UNIX_SECONDS = 2_147_483_647;

export interface TimeWindow {
  begin: number;
  end: number;
}

export const DEFAULT_TIME_WINDOW: Readonly<TimeWindow> = {
  begin: 0,
  end: MAX_LEGACY_UNIX_SECONDS * MICROS_PER_SECOND,
};

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})(?:(\d{2})(\d{2})(\d{2})?)?$/;
const EPOCH_SECONDS = /^(\d+)(?:\.(\d+))?$/;
const CALENDAR_DATE =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})\/?(?:(?:T|\s+)(\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*([A-Z]{1,4}|[+-]\d{2}:?\d{2})?$/i;
/** date(1) output: `Fri Mar 20 15:30:00 JST 2009` */
const DATE_COMMAND =
  /^(?:[A-Z]{3}[a-z]*,?\s+)?([A-Z]{3})[a-z]*\s+(\d{1,2})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s+(?:([A-Z]{1,4}|[+-]\d{2}:?\d{2})\s+)?(\d{4})$/i;
/** Only text naming a month or weekday goes to Date.parse */
const NAMED_DATE = /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec|mon|tue|wed|thu|fri|sat|sun)[a-z]*\b/i;

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

/** Zone abbreviations, in minutes east of UTC */
const ZONE_OFFSETS: Readonly<Record<string, number>> = {
  Z: 0,
  UT: 0,
  UTC: 0,
  GMT: 0,
  JST: 9 * 60,
  KST: 9 * 60,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  micros: number;
  /** Minutes east of UTC; undefined for local time */
  offsetMinutes?: number;
}

/**
 * Six-digit microsecond part of a fraction string.
 */
function fractionToMicros(fraction: string | undefined): number {
  if (!fraction) {
    return 0;
  }
  return Number(fraction.padEnd(6, "0").slice(0, 6));
}

/**
 * Zone offset in minutes east of UTC: undefined without a zone, null for
 * an unknown abbreviation.
 */
function parseOffset(zone: string | undefined): number | null | undefined {
  if (!zone) {
    return undefined;
  }
  if (!/^[+-]/.test(zone)) {
    return ZONE_OFFSETS[zone.toUpperCase()] ?? null;
  }
  const digits = zone.replace(":", "");
  const sign = digits.startsWith("-") ? -1 : 1;
  const hours = Number(digits.slice(1, 3));
  const minutes = Number(digits.slice(3, 5));
  return sign * (hours * 60 + minutes);
}

/**
 * Build epoch microseconds from calendar parts, rejecting dates that do
 * not exist (month 13, February 30, hour 25...).
 */
function partsToMicros(parts: DateParts): number | null {
  const { year, month, day, hour, minute, second } = parts;
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  let millis: number;
  if (parts.offsetMinutes === undefined) {
    const date = new Date(year, month - 1, day, hour, minute, second);
    if (
      date.getFullYear() !== year ||
      date.getMonth() !== month - 1 ||
      date.getDate() !== day
    ) {
      return null;
    }
    millis = date.getTime();
  } else {
    const utc = Date.UTC(year, month - 1, day, hour, minute, second);
    const date = new Date(utc);
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return null;
    }
    millis = utc - parts.offsetMinutes * 60_000;
  }

  return millis * 1000 + parts.micros;
}

function tryParse(text: string): number | null {
  // Digit strings that are not a valid compact date fall back to epoch seconds
  const compact = COMPACT_DATE.exec(text);
  const compactMicros = compact
    ? partsToMicros({
        year: Number(compact[1]),
        month: Number(compact[2]),
        day: Number(compact[3]),
        hour: Number(compact[4] ?? 0),
        minute: Number(compact[5] ?? 0),
        second: Number(compact[6] ?? 0),
        micros: 0,
      })
    : null;
  if (compactMicros !== null) {
    return compactMicros;
  }

  const epoch = EPOCH_SECONDS.exec(text);
  if (epoch) {
    return Number(epoch[1]) * MICROS_PER_SECOND + fractionToMicros(epoch[2]);
  }

  const calendar = CALENDAR_DATE.exec(text);
  if (calendar) {
    const offsetMinutes = parseOffset(calendar[8]);
    if (offsetMinutes === null) {
      return null;
    }
    return partsToMicros({
      year: Number(calendar[1]),
      month: Number(calendar[2]),
      day: Number(calendar[3]),
      hour: Number(calendar[4] ?? 0),
      minute: Number(calendar[5] ?? 0),
      second: Number(calendar[6] ?? 0),
      micros: fractionToMicros(calendar[7]),
      offsetMinutes,
    });
  }

  const command = DATE_COMMAND.exec(text);
  if (command) {
    const month = MONTHS.indexOf((command[1] ?? "").toUpperCase());
    const offsetMinutes = parseOffset(command[6]);
    if (month < 0 || offsetMinutes === null) {
      return null;
    }
    return partsToMicros({
      year: Number(command[7]),
      month: month + 1,
      day: Number(command[2]),
      hour: Number(command[3]),
      minute: Number(command[4]),
      second: Number(command[5] ?? 0),
      micros: 0,
      offsetMinutes,
    });
  }

  if (!NAMED_DATE.test(text)) {
    return null;
  }
  const millis = Date.parse(text);
  return Number.isNaN(millis) ? null : millis * 1000;
}

/**
 * Parse a timestamp into epoch microseconds.
 *
 * Accepts compact dates (YYYYMMDD[hhmm[ss]]), epoch seconds, calendar
 * dates with optional time and zone, date(1) output, and named-month
 * dates Date.parse reads. Dates without a zone are local time.
 */
export function parseTimestamp(text: string, location?: SourceLocation): number {
  const trimmed = text.trim();
  const micros = trimmed === "" ? null : tryParse(trimmed);
  if (micros === null) {
    throw new TimeParseError(text, location);
  }
  return micros;
}

/**
 * Build a time window from optional user-supplied bounds.
 */
export function createTimeWindow(bounds: { begin?: string; end?: string } = {}): TimeWindow {
  const window: TimeWindow = {
    begin: bounds.begin === undefined ? DEFAULT_TIME_WINDOW.begin : parseTimestamp(bounds.begin),
    end: bounds.end === undefined ? DEFAULT_TIME_WINDOW.end : parseTimestamp(bounds.end),
  };

  if (window.begin > window.end) {
    throw new RemintError(
      `Begin time ${bounds.begin ?? "(epoch)"} is after end time ${bounds.end ?? "(2038-01-19 03:14:07 UTC)"}`,
      2
    );
  }
  return window;
}

/**
 * Inclusive time window check for row timestamps.
 */
export class TimeFilter {
  constructor(readonly window: Readonly<TimeWindow> = DEFAULT_TIME_WINDOW) {}

  /**
   * Check whether a timestamp lies inside the window.
   * Unparseable timestamps throw TimeParseError.
   */
  accepts(text: string, location?: SourceLocation): boolean {
    const micros = parseTimestamp(text, location);
    return this.window.begin <= micros && micros <= this.window.end;
  }
}
