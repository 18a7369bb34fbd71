/**
 * Resolution of the platform's earliest/latest expressions into a concrete
 * `[start, end)` range in epoch milliseconds.
 *
 * Accepted expressions:
 *
 * - `now`
 * - `now` with one or more offsets, e.g. `now-24h`, `now-1d+2h`
 *   (units `s`, `m`, `h`, `d`, `w`, `mon`, `y`; `M` is an alias of `mon`)
 * - epoch seconds, e.g. `1700000000` or `1700000000.5`
 * - ISO-8601 dates: `2024-01-15`, `2024-01-15T08`, `2024-01-15T08:30`,
 *   `2024-01-15T08:30:00`, optionally with a fraction and a `Z`/`±HH:MM` zone.
 *   Dates without a zone are UTC.
 *
 * @module
 */
import { InvalidTimeExpression, InvalidTimeRange } from './errors';

/** Start inclusive, end exclusive, both epoch milliseconds. */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

export type TimeUnit = 's' | 'm' | 'h' | 'd' | 'w' | 'mon' | 'y';

/** A month is 30 days and a year 12 such months. */
export const UNIT_SECONDS: Readonly<Record<TimeUnit, number>> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
  mon: 2592000,
  y: 31104000,
};

const RELATIVE_REGEX = /^now((?:[+-]\d+(?:mon|[smhdwyM]))*)$/;
const OFFSET_REGEX = /([+-])(\d+)(mon|[smhdwyM])/g;
const EPOCH_REGEX = /^\d+(?:\.\d+)?$/;
const ISO_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2})(?::(\d{2})(?::(\d{2})(\.\d{1,9})?)?)?)?(Z|[+-]\d{2}:\d{2})?$/;

/** Largest distance from the epoch a `Date` accepts, in milliseconds. */
const MAX_INSTANT_MS = 8.64e15;

const UNIT_ALIASES: Readonly<Record<string, TimeUnit>> = {
  s: 's',
  m: 'm',
  h: 'h',
  d: 'd',
  w: 'w',
  mon: 'mon',
  M: 'mon',
  y: 'y',
};

function parseIsoDate(expression: string, match: RegExpExecArray): number {
  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction, zone] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  const utc = Date.UTC(y, mo - 1, d, h, mi, s);
  const check = new Date(utc);
  // Date.UTC rolls over out-of-range fields (Feb 30 → Mar 2); reject those.
  if (
    check.getUTCFullYear() !== y ||
    check.getUTCMonth() !== mo - 1 ||
    check.getUTCDate() !== d ||
    check.getUTCHours() !== h ||
    check.getUTCMinutes() !== mi ||
    check.getUTCSeconds() !== s
  ) {
    throw new InvalidTimeExpression(expression);
  }

  const millis = fraction ? Math.floor(Number(`0${fraction}`) * 1000) : 0;
  let offsetMs = 0;
  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const [zoneHours, zoneMinutes] = zone.slice(1).split(':').map(Number);
    offsetMs = sign * (zoneHours * 3600 + zoneMinutes * 60) * 1000;
  }
  return utc + millis - offsetMs;
}

function evaluate(expression: string, now: number): number | undefined {
  const value = expression.trim();

  const relative = RELATIVE_REGEX.exec(value);
  if (relative) {
    let result = now;
    for (const [, sign, amount, unit] of relative[1].matchAll(OFFSET_REGEX)) {
      const seconds = Number(amount) * UNIT_SECONDS[UNIT_ALIASES[unit]];
      result += (sign === '-' ? -seconds : seconds) * 1000;
    }
    return result;
  }

  if (EPOCH_REGEX.test(value)) {
    return Math.round(Number(value) * 1000);
  }

  const iso = ISO_REGEX.exec(value);
  return iso ? parseIsoDate(expression, iso) : undefined;
}

/**
 * Parses one time expression, evaluated against `now` (epoch milliseconds).
 *
 * @throws {InvalidTimeExpression} If the expression matches no accepted form,
 *   or lands outside the instants a `Date` can represent.
 */
export function parseTimeExpression(expression: string, now: number): number {
  const result = evaluate(expression, now);
  if (result === undefined || !Number.isFinite(result) || Math.abs(result) > MAX_INSTANT_MS) {
    throw new InvalidTimeExpression(expression);
  }
  return result;
}

/** A default range, or a supplier evaluated only when a bound is missing. */
export type DefaultRange = TimeRange | (() => TimeRange);

/**
 * Resolves the earliest/latest pair into a time range.
 *
 * When both are absent the platform's default range is returned unchanged;
 * when only one is given, the missing bound comes from the default range.
 * A supplier is not called when both bounds are given.
 *
 * @throws {InvalidTimeExpression} If either expression is malformed.
 * @throws {InvalidTimeRange} If the resolved start is after the end. Bounds
 *   are never swapped.
 */
export function resolveTimeRange(
  earliest: string | undefined,
  latest: string | undefined,
  platformDefaultRange: DefaultRange,
  now: number = Date.now(),
): TimeRange {
  const fallback = (): TimeRange =>
    typeof platformDefaultRange === 'function' ? platformDefaultRange() : platformDefaultRange;

  if (earliest === undefined && latest === undefined) {
    return fallback();
  }

  const start = earliest === undefined ? fallback().start : parseTimeExpression(earliest, now);
  const end = latest === undefined ? fallback().end : parseTimeExpression(latest, now);

  if (start > end) {
    throw new InvalidTimeRange(start, end);
  }
  return { start, end };
}
