/**
 * Time zone helpers for quiet hours and fixed-hour schedules.
 *
 * Hours are wall-clock hours in an IANA time zone, computed with Intl so no
 * time zone database ships with the bot.
 */

import type { QuietHours } from '../types';

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock hour and minute of `date` in `timeZone`.
 */
export function clockInZone(date: Date, timeZone: string): { hour: number; minute: number } {
  let hour = 0;
  let minute = 0;
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type === 'hour') hour = Number.parseInt(part.value, 10) % 24;
    if (part.type === 'minute') minute = Number.parseInt(part.value, 10);
  }
  return { hour, minute };
}

export function hourInZone(date: Date, timeZone: string): number {
  return clockInZone(date, timeZone).hour;
}

/**
 * Quiet hours cover [start, end) in whole hours and wrap past midnight when
 * start > end, so 22..8 silences 22:00 through 07:59.
 */
export function isWithinQuietHours(quiet: QuietHours | null, hour: number): boolean {
  if (!quiet || quiet.start === quiet.end) return false;
  if (quiet.start < quiet.end) {
    return hour >= quiet.start && hour < quiet.end;
  }
  return hour >= quiet.start || hour < quiet.end;
}

export function isQuietAt(quiet: QuietHours | null, date: Date, timeZone: string): boolean {
  return isWithinQuietHours(quiet, hourInZone(date, timeZone));
}

function nextMatchingMinute(
  from: Date,
  timeZone: string,
  matches: (clock: { hour: number; minute: number }) => boolean,
): Date | null {
  let candidate = Math.floor(from.getTime() / MINUTE_MS) * MINUTE_MS + MINUTE_MS;
  const limit = candidate + 2 * DAY_MS;

  for (; candidate <= limit; candidate += MINUTE_MS) {
    if (matches(clockInZone(new Date(candidate), timeZone))) {
      return new Date(candidate);
    }
  }
  return null;
}

/**
 * Next instant strictly after `from` at which the wall clock in `timeZone`
 * reads `hour`:00. Walks forward minute by minute, which also covers zones
 * with half-hour offsets.
 */
export function nextDailyRun(from: Date, hour: number, timeZone: string): Date | null {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) return null;
  return nextMatchingMinute(from, timeZone, (clock) => clock.hour === hour && clock.minute === 0);
}

/** Next instant strictly after `from` at the top of a local hour */
export function nextHourlyRun(from: Date, timeZone: string): Date | null {
  return nextMatchingMinute(from, timeZone, (clock) => clock.minute === 0);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

const dateFormatters = new Map<string, Intl.DateTimeFormat>();

/** Short local date and time, e.g. "1 Jun 2024, 09:00" */
export function formatDateTime(date: Date, timeZone: string): string {
  let formatter = dateFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      day: 'numeric',
      month: 'short',
      year: 'numeric',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    dateFormatters.set(timeZone, formatter);
  }
  return formatter.format(date);
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}
