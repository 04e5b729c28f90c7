/**
 * View mode table and visible-window calculations.
 * Pure functions: the window a mode shows, and the radius the
 * navigation stability rule tests against.
 */

import {
  addDays,
  dateFromComponents,
  daysInMonth,
  getDateComponents,
  startOfDay,
  startOfWeek,
} from "./dates"

// ============================================================================
// Types
// ============================================================================

/** View mode for the calendar display */
export type ViewMode =
  | "singleDay"
  | "twoDays"
  | "threeDays"
  | "fourDays"
  | "fiveDays"
  | "sixDays"
  | "sevenDays"
  | "eightDays"
  | "nineDays"
  | "twoWeeks"
  | "month"
  | "year"

/** Inclusive calendar-day range */
export interface DayRange {
  start: Date
  end: Date
}

// ============================================================================
// Constants
// ============================================================================

/** Days shown by each mode. Month and year use their nominal maximum. */
export const VIEW_MODE_DAY_COUNT: Record<ViewMode, number> = {
  singleDay: 1,
  twoDays: 2,
  threeDays: 3,
  fourDays: 4,
  fiveDays: 5,
  sixDays: 6,
  sevenDays: 7,
  eightDays: 8,
  nineDays: 9,
  twoWeeks: 14,
  month: 31,
  year: 365,
}

/** Every view mode, in keyboard-shortcut order */
export const VIEW_MODES: readonly ViewMode[] = [
  "singleDay",
  "twoDays",
  "threeDays",
  "fourDays",
  "fiveDays",
  "sixDays",
  "sevenDays",
  "eightDays",
  "nineDays",
  "twoWeeks",
  "month",
  "year",
]

export const DEFAULT_VIEW_MODE: ViewMode = "threeDays"

// ============================================================================
// Functions
// ============================================================================

/**
 * Type guard for values read from storage or config.
 */
export function isViewMode(value: unknown): value is ViewMode {
  return VIEW_MODES.some((viewMode) => viewMode === value)
}

/**
 * Half-window radius R, in days, used by the stability rule.
 *
 * @example
 * halfWindowRadius("threeDays") // 1
 * halfWindowRadius("twoWeeks") // 7
 */
export function halfWindowRadius(viewMode: ViewMode): number {
  return Math.floor(VIEW_MODE_DAY_COUNT[viewMode] / 2)
}

/**
 * Whether the mode is one of the 1-9 day column views.
 */
export function isDayRangeMode(viewMode: ViewMode): boolean {
  return VIEW_MODE_DAY_COUNT[viewMode] <= 9
}

/**
 * The inclusive day range a mode displays for an anchor.
 *
 * - 1-9 day views extend forward from the anchor.
 * - twoWeeks is centered: a week either side of the anchor.
 * - month covers the anchor's month padded out to whole weeks.
 * - year covers January 1 to December 31 of the anchor's year.
 *
 * Returns null if any boundary cannot be computed.
 *
 * @param firstWeekday - Weekday weeks start on (0 = Sunday)
 */
export function visibleRange(
  viewMode: ViewMode,
  currentAnchor: Date,
  firstWeekday = 0,
): DayRange | null {
  const anchor = startOfDay(currentAnchor)

  if (isDayRangeMode(viewMode)) {
    const end = addDays(anchor, VIEW_MODE_DAY_COUNT[viewMode] - 1)
    return end ? { start: anchor, end } : null
  }

  const { year, month } = getDateComponents(anchor)

  switch (viewMode) {
    case "twoWeeks": {
      const radius = halfWindowRadius(viewMode)
      const start = addDays(anchor, -radius)
      const end = addDays(anchor, radius)
      return start && end ? { start, end } : null
    }
    case "month": {
      const first = dateFromComponents(year, month, 1)
      const last = dateFromComponents(year, month, daysInMonth(year, month))
      const start = first ? startOfWeek(first, firstWeekday) : null
      const lastWeekStart = last ? startOfWeek(last, firstWeekday) : null
      const end = lastWeekStart ? addDays(lastWeekStart, 6) : null
      return start && end ? { start, end } : null
    }
    default: {
      const start = dateFromComponents(year, 1, 1)
      const end = dateFromComponents(year, 12, 31)
      return start && end ? { start, end } : null
    }
  }
}

/**
 * Whether a date lies in the month or year a month or year view displays.
 * Day and two-week views have no such period and always return true.
 */
export function isInDisplayedPeriod(viewMode: ViewMode, anchor: Date, date: Date): boolean {
  const shown = getDateComponents(anchor)
  const target = getDateComponents(date)

  switch (viewMode) {
    case "month":
      return shown.year === target.year && shown.month === target.month
    case "year":
      return shown.year === target.year
    default:
      return true
  }
}
