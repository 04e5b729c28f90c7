/**
 * Floating holiday computations.
 * Each function returns null when the requested day does not exist.
 */

import { addDays, dateFromComponents, daysInMonth, getDateComponents } from "@core/calendar/dates"

import { type Weekday, Weekdays } from "./types"

/**
 * Find the nth weekday of a month (1-based n, 1-based month).
 *
 * Offsets from the first of the month to the first matching weekday, then
 * steps whole weeks. Returns null when the nth occurrence spills into the
 * next month (there is no 5th Monday in most months).
 *
 * @example
 * nthWeekdayOfMonth(2025, 11, Weekdays.thursday, 4) // Nov 27, 2025
 */
export function nthWeekdayOfMonth(
  year: number,
  month: number,
  weekday: Weekday,
  n: number,
): Date | null {
  if (!Number.isInteger(n) || n < 1) return null

  const startOfMonth = dateFromComponents(year, month, 1)
  if (!startOfMonth) return null

  const weekdayOffset = (weekday - getDateComponents(startOfMonth).weekday + 7) % 7
  const firstOccurrence = addDays(startOfMonth, weekdayOffset)
  if (!firstOccurrence) return null

  const nthOccurrence = addDays(firstOccurrence, (n - 1) * 7)
  if (!nthOccurrence || getDateComponents(nthOccurrence).month !== month) return null

  return nthOccurrence
}

/**
 * Find the last weekday of a month.
 *
 * @example
 * lastWeekdayOfMonth(2025, 5, Weekdays.monday) // May 26, 2025 (Memorial Day)
 */
export function lastWeekdayOfMonth(year: number, month: number, weekday: Weekday): Date | null {
  const endOfMonth = dateFromComponents(year, month, daysInMonth(year, month))
  if (!endOfMonth) return null

  const weekdayOffset = (getDateComponents(endOfMonth).weekday - weekday + 7) % 7
  return addDays(endOfMonth, -weekdayOffset)
}

/**
 * Western Easter Sunday (anonymous Gregorian computus).
 */
export function easterSunday(year: number): Date | null {
  if (!Number.isInteger(year)) return null

  const a = year % 19
  const b = Math.floor(year / 100)
  const c = year % 100
  const d = Math.floor(b / 4)
  const e = b % 4
  const f = Math.floor((b + 8) / 25)
  const g = Math.floor((b - f + 1) / 3)
  const h = (19 * a + b - d - g + 15) % 30
  const i = Math.floor(c / 4)
  const k = c % 4
  const l = (32 + 2 * e + 2 * i - h - k) % 7
  const m = Math.floor((a + 11 * h + 22 * l) / 451)
  const month = Math.floor((h + l - 7 * m + 114) / 31)
  const day = ((h + l - 7 * m + 114) % 31) + 1

  return dateFromComponents(year, month, day)
}

/**
 * Thanksgiving: fourth Thursday of November.
 */
export function thanksgivingDate(year: number): Date | null {
  return nthWeekdayOfMonth(year, 11, Weekdays.thursday, 4)
}
