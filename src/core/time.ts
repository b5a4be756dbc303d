/**
 * Time helpers: ISO 8601 parsing/formatting and quick range templates
 * ("30min", "3hrs", "7days") used by the metric, endpoint and trace queries.
 */

import type { Duration, TimeRange, TimeWindow } from "../types.js";
import { InvalidArgumentError, ParseError } from "./errors.js";

export const MINUTE = 60;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;
export const WEEK = 7 * DAY;

/** Longest span accepted by metric and endpoint queries. */
export const MAX_QUERY_RANGE = 2 * WEEK;

/** Traces are only retained for this long. */
export const MAX_TRACE_AGE = 7 * DAY;

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|[+-]\d{2}:?\d{2})$/;

const RANGE_PATTERN = /^(\d+)(min|mins|hr|hrs|hour|hours|day|days)$/;

const UNIT_SECONDS: Record<string, number> = {
  min: MINUTE,
  mins: MINUTE,
  hr: HOUR,
  hrs: HOUR,
  hour: HOUR,
  hours: HOUR,
  day: DAY,
  days: DAY,
};

export const RANGE_EXAMPLES = ["30min", "60min", "3hrs", "6hrs", "12hrs", "1day", "3days", "7days"];

export function parseTime(text: string): Date {
  const trimmed = text.trim();
  const match = ISO_8601.exec(trimmed);
  if (!match) {
    throw new ParseError(`Invalid ISO 8601 time: "${text}" (expected e.g. 2025-01-15T12:00:00Z)`);
  }
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map((part) => parseInt(part, 10));
  // Date would roll Feb 30 over into March.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth || hour > 23 || minute > 59 || second > 59) {
    throw new ParseError(`Invalid ISO 8601 time: "${text}" (no such date or time)`);
  }
  // Date.parse only understands ±HH:MM offsets.
  const normalized = trimmed
    .replace(/z$/, "Z")
    .replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new ParseError(`Invalid ISO 8601 time: "${text}"`);
  }
  return date;
}

export function formatTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function makeDuration(from: string, to: string): Duration {
  return { start: parseTime(from), end: parseTime(to) };
}

/**
 * Convert a range template into seconds. Returns null for an empty range.
 */
export function parseRange(range: string | null | undefined): number | null {
  if (range === null || range === undefined) return null;
  const token = range.replace(/\s+/g, "").toLowerCase();
  if (token === "") return null;

  const match = RANGE_PATTERN.exec(token);
  if (!match) {
    throw new InvalidArgumentError(
      `Invalid range format: "${range}". Use formats like: ${RANGE_EXAMPLES.join(", ")}`
    );
  }
  return parseInt(match[1], 10) * UNIT_SECONDS[match[2]];
}

export function calculateRange(options: { range?: string | null; to?: string | null }): TimeRange {
  const to = options.to ?? null;
  const raw = options.range?.trim() ?? "";
  if (raw === "") return { from: null, to };

  // A bare number means days
  const range = /^\d+$/.test(raw) ? `${raw}days` : raw;
  const seconds = parseRange(range);
  if (seconds === null) return { from: null, to };

  const end = to ? parseTime(to) : new Date();
  const start = new Date(end.getTime() - seconds * 1000);
  return { from: formatTime(start), to: formatTime(end) };
}

/**
 * A range template wins over an explicit `from`; `to` stays the end point.
 */
export function resolveTimeWindow(window: TimeWindow): TimeRange {
  if (window.range && window.range.trim() !== "") {
    return calculateRange({ range: window.range, to: window.to });
  }
  return { from: window.from ?? null, to: window.to ?? null };
}

function describeSpan(seconds: number): string {
  if (seconds % WEEK === 0 && seconds > WEEK) {
    return `${seconds / WEEK} weeks`;
  }
  if (seconds % DAY === 0) {
    const days = seconds / DAY;
    return `${days} day${days === 1 ? "" : "s"}`;
  }
  return `${seconds} seconds`;
}

export function validateTimeRange(
  from: string,
  to: string,
  maxSeconds: number = MAX_QUERY_RANGE
): void {
  const start = parseTime(from);
  const end = parseTime(to);

  if (start.getTime() >= end.getTime()) {
    throw new InvalidArgumentError("from_time must be before to_time");
  }
  if ((end.getTime() - start.getTime()) / 1000 > maxSeconds) {
    throw new InvalidArgumentError(`Time range cannot exceed ${describeSpan(maxSeconds)}`);
  }
}

export function validateTraceAge(from: string, now: Date = new Date()): void {
  const start = parseTime(from);
  // Formatted times carry whole seconds only.
  const nowSeconds = Math.floor(now.getTime() / 1000) * 1000;
  if (start.getTime() < nowSeconds - MAX_TRACE_AGE * 1000) {
    throw new InvalidArgumentError(
      `from_time cannot be older than ${describeSpan(MAX_TRACE_AGE)}`
    );
  }
}
