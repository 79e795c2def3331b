/**
 * Deadline countdown arithmetic.
 *
 * All comparisons are between calendar dates; the caller decides which zone
 * "today" is in.
 */

import { DateTime } from 'luxon';
import type { DeadlineConfig } from '../config/config-schema.js';

const MS_PER_DAY = 86_400_000;

/** Ordinal of 1970-01-01 with 0001-01-01 as day 1 */
const EPOCH_ORDINAL = 719_163;

/**
 * The calendar date of `dt` as UTC midnight, so differences are whole days.
 */
export function calendarDay(dt: DateTime): DateTime {
  return DateTime.utc(dt.year, dt.month, dt.day);
}

/**
 * Parse a YYYY-MM-DD date. Throws on an invalid date.
 */
export function parseDate(iso: string): DateTime {
  const dt = DateTime.fromISO(iso, { zone: 'utc' });
  if (!dt.isValid) {
    throw new Error(`Invalid date "${iso}": ${dt.invalidExplanation ?? dt.invalidReason ?? 'unknown'}`);
  }
  return calendarDay(dt);
}

/**
 * Whole days from `today` to the deadline; negative once it has passed.
 */
export function daysRemaining(deadline: DeadlineConfig, today: DateTime): number {
  const diff = parseDate(deadline.date).toMillis() - calendarDay(today).toMillis();
  return Math.round(diff / MS_PER_DAY);
}

/**
 * One countdown line, e.g. "Demo Day: 12 days remaining".
 */
export function describeDeadline(deadline: DeadlineConfig, today: DateTime): string {
  const days = daysRemaining(deadline, today);
  if (days > 0) return `${deadline.name}: ${String(days)} days remaining`;
  if (days === 0) return `${deadline.name}: Today is the day!`;
  return `${deadline.name}: Deadline passed!`;
}

/**
 * Proleptic Gregorian day number (0001-01-01 is 1).
 */
export function dayOrdinal(day: DateTime): number {
  return Math.round(calendarDay(day).toMillis() / MS_PER_DAY) + EPOCH_ORDINAL;
}

function ordinalSuffix(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return 'th';
  switch (n % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

/**
 * Long form for prompts, e.g. "March 10th, 2026".
 */
export function formatDeadlineDate(iso: string): string {
  const dt = parseDate(iso);
  return `${dt.setLocale('en-US').toFormat('LLLL')} ${String(dt.day)}${ordinalSuffix(dt.day)}, ${String(dt.year)}`;
}
