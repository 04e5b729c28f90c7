/**
 * Holiday types shared by the rules, the resolver and the definition loader.
 */

// ============================================================================
// Categories
// ============================================================================

export const HOLIDAY_CATEGORIES = [
  "religious",
  "cultural",
  "national",
  "seasonal",
  "educational",
  "other",
] as const

export type HolidayCategory = (typeof HOLIDAY_CATEGORIES)[number]

export function isHolidayCategory(value: unknown): value is HolidayCategory {
  return HOLIDAY_CATEGORIES.some((category) => category === value)
}

// ============================================================================
// Recurrence rules
// ============================================================================

/** Weekday index, 0 = Sunday ... 6 = Saturday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

export const Weekdays = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
} as const satisfies Record<string, Weekday>

/**
 * How a recurring holiday lands in a given year.
 * - fixed: same month and day as the definition's reference date
 * - nthWeekday: nth weekday of a month (4th Thursday of November)
 * - lastWeekday: last weekday of a month (last Monday of May)
 * - easter: Easter Sunday
 * offsetDays shifts the computed day (Black Friday = Thanksgiving + 1).
 */
export type HolidayRule =
  | { type: "fixed" }
  | { type: "nthWeekday"; month: number; weekday: Weekday; n: number; offsetDays?: number }
  | { type: "lastWeekday"; month: number; weekday: Weekday; offsetDays?: number }
  | { type: "easter"; offsetDays?: number }

// ============================================================================
// Definitions and occurrences
// ============================================================================

/** Immutable holiday template */
export interface HolidayDefinition {
  /** Unique identifier */
  readonly name: string
  /**
   * Exact occurrence for one-off holidays. For recurring fixed-date holidays
   * only its month and day matter.
   */
  readonly referenceDate: Date
  readonly isRecurring: boolean
  readonly category: HolidayCategory
  readonly rule: HolidayRule
  readonly emoji: string
  readonly description: string
}

/** A definition materialized for one concrete year */
export interface HolidayOccurrence {
  readonly name: string
  readonly occurrenceDate: Date
  readonly isRecurring: boolean
  readonly category: HolidayCategory
  readonly rule: HolidayRule
  readonly emoji: string
  readonly description: string
}

/** Occurrences for referenceYear - 1 through referenceYear + 1, sorted by date */
export interface HolidaySnapshot {
  readonly referenceYear: number
  readonly occurrences: readonly HolidayOccurrence[]
}
