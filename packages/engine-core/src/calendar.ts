// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/calendar`
 * Purpose: UTC calendar arithmetic over unix-second timestamps.
 * Scope: Pure, deterministic date decomposition and day/month/year add, sub and diff. Does not perform I/O.
 * Invariants:
 * - diffDays(from, to) = floor((to - from) / 86400); throws CalendarRangeError when from > to
 * - Month and year arithmetic clamps the day to the target month's length (Jan 31 + 1 month = Feb 28/29), never rolls over
 * - Time of day is preserved by every add/sub
 * Side-effects: none
 * @public
 */

import { SECONDS_PER_DAY } from "@dualpool/ids";

import { CalendarRangeError } from "./errors";

export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function fromDate(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day) / 1000;
}

export function toDate(timestamp: number): CalendarDate {
  const d = new Date(timestamp * 1000);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

function secondsOfDay(timestamp: number): number {
  return ((timestamp % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
}

function shiftMonths(timestamp: number, months: number): number {
  const { year, month, day } = toDate(timestamp);
  const monthIndex = year * 12 + (month - 1) + months;
  const targetYear = Math.floor(monthIndex / 12);
  const targetMonth = (monthIndex % 12) + 1;
  const targetDay = Math.min(day, daysInMonth(targetYear, targetMonth));
  return (
    fromDate({ year: targetYear, month: targetMonth, day: targetDay }) +
    secondsOfDay(timestamp)
  );
}

export function addDays(timestamp: number, days: number): number {
  return timestamp + days * SECONDS_PER_DAY;
}

export function subDays(timestamp: number, days: number): number {
  return timestamp - days * SECONDS_PER_DAY;
}

export function addMonths(timestamp: number, months: number): number {
  return shiftMonths(timestamp, months);
}

export function subMonths(timestamp: number, months: number): number {
  return shiftMonths(timestamp, -months);
}

export function addYears(timestamp: number, years: number): number {
  return shiftMonths(timestamp, years * 12);
}

export function subYears(timestamp: number, years: number): number {
  return shiftMonths(timestamp, -years * 12);
}

export function diffDays(from: number, to: number): number {
  if (from > to) {
    throw new CalendarRangeError(from, to);
  }
  return Math.floor((to - from) / SECONDS_PER_DAY);
}

/** Calendar months between the two dates, ignoring day of month. */
export function diffMonths(from: number, to: number): number {
  if (from > to) {
    throw new CalendarRangeError(from, to);
  }
  const a = toDate(from);
  const b = toDate(to);
  return b.year * 12 + b.month - (a.year * 12 + a.month);
}

/** Calendar years between the two dates, ignoring month and day. */
export function diffYears(from: number, to: number): number {
  if (from > to) {
    throw new CalendarRangeError(from, to);
  }
  return toDate(to).year - toDate(from).year;
}
