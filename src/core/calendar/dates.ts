/**
 * Pure date manipulation functions.
 * These functions have no side effects and are fully testable.
 *
 * This is the host calendar the rest of the core consumes: Gregorian,
 * interpreted in the host's local timezone. Every operation that can
 * produce an invalid date returns null instead of throwing.
 */

/** Calendar components of a date. Month is 1-based, weekday 0 = Sunday. */
export interface DateComponents {
  year: number
  month: number
  day: number
  weekday: number
}

const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Check whether a Date holds a usable time value.
 */
export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime())
}

/**
 * Build a date at local midnight from year, 1-based month and day.
 * Returns null when the combination does not exist (Feb 30, month 13)
 * rather than letting Date roll it over into the next month.
 */
export function dateFromComponents(year: number, month: number, day: number): Date | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null
  }

  // setFullYear, unlike the constructor, does not map two-digit years to 19xx
  const date = new Date(2000, 0, 1)
  date.setFullYear(year, month - 1, day)

  if (!isValidDate(date)) return null
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null
  }
  return date
}

/**
 * Decompose a date into year, 1-based month, day and weekday.
 */
export function getDateComponents(date: Date): DateComponents {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    weekday: date.getDay(),
  }
}

/**
 * Add a number of days to a date.
 * Returns a new Date object, or null if either side is not a valid date.
 */
export function addDays(date: Date, days: number): Date | null {
  if (!isValidDate(date) || !Number.isInteger(days)) return null
  const result = new Date(date)
  result.setDate(result.getDate() + days)
  return isValidDate(result) ? result : null
}

/**
 * Add a number of weeks (7 calendar days each) to a date.
 */
export function addWeeks(date: Date, weeks: number): Date | null {
  if (!Number.isInteger(weeks)) return null
  return addDays(date, weeks * 7)
}

/**
 * Add a number of months to a date.
 * Keeps the day of month where the target month is long enough and clamps
 * to the target month's last day otherwise (Jan 31 + 1 month = Feb 28).
 */
export function addMonths(date: Date, months: number): Date | null {
  if (!isValidDate(date) || !Number.isInteger(months)) return null

  const totalMonths = date.getFullYear() * 12 + date.getMonth() + months
  const year = Math.floor(totalMonths / 12)
  const monthIndex = totalMonths - year * 12
  const day = Math.min(date.getDate(), daysInMonth(year, monthIndex + 1))

  const result = new Date(date)
  result.setFullYear(year, monthIndex, day)
  return isValidDate(result) ? result : null
}

/**
 * Add a number of years to a date (Feb 29 clamps to Feb 28).
 */
export function addYears(date: Date, years: number): Date | null {
  if (!Number.isInteger(years)) return null
  return addMonths(date, years * 12)
}

/**
 * Number of days in a 1-based month.
 */
export function daysInMonth(year: number, month: number): number {
  const date = new Date(year, month, 0)
  date.setFullYear(year, month, 0)
  return date.getDate()
}

/**
 * Check if two dates are the same day.
 */
export function isSameDay(d1: Date, d2: Date): boolean {
  return (
    d1.getFullYear() === d2.getFullYear() &&
    d1.getMonth() === d2.getMonth() &&
    d1.getDate() === d2.getDate()
  )
}

/**
 * Order two dates by calendar day, ignoring time of day.
 * Negative when a is the earlier day, 0 on the same day.
 */
export function compareDays(a: Date, b: Date): number {
  return differenceInCalendarDays(b, a)
}

/**
 * Whole calendar days from a to b (positive when b is later).
 * Counts days, not 24h spans, so DST transitions do not skew it.
 */
export function differenceInCalendarDays(a: Date, b: Date): number {
  const utcA = Date.UTC(a.getFullYear(), a.getMonth(), a.getDate())
  const utcB = Date.UTC(b.getFullYear(), b.getMonth(), b.getDate())
  return Math.round((utcB - utcA) / MS_PER_DAY)
}

/**
 * Format a date as YYYY-MM-DD string.
 */
export function formatDateKey(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0")
  const m = String(date.getMonth() + 1).padStart(2, "0")
  const d = String(date.getDate()).padStart(2, "0")
  return `${y}-${m}-${d}`
}

/**
 * Parse a YYYY-MM-DD string to a Date object at local midnight.
 * Returns null for a malformed key or a day that does not exist.
 */
export function parseDateKey(dateKey: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateKey)
  if (!match) return null
  return dateFromComponents(Number(match[1]), Number(match[2]), Number(match[3]))
}

/**
 * Get the start of day (midnight) for a date.
 * Returns a new Date object.
 */
export function startOfDay(date: Date): Date {
  const result = new Date(date)
  result.setHours(0, 0, 0, 0)
  return result
}

/**
 * Get the first day of the week containing a date.
 * @param firstWeekday - Weekday the week starts on (0 = Sunday)
 */
export function startOfWeek(date: Date, firstWeekday = 0): Date | null {
  const daysToSubtract = (date.getDay() - firstWeekday + 7) % 7
  return addDays(startOfDay(date), -daysToSubtract)
}

/**
 * Get an array of dates for a range.
 * Includes both start and end dates.
 */
export function getDateRange(start: Date, end: Date): Date[] {
  const dates: Date[] = []
  let current: Date | null = startOfDay(start)
  const endDay = startOfDay(end)

  while (current && current <= endDay) {
    dates.push(new Date(current))
    current = addDays(current, 1)
  }

  return dates
}
