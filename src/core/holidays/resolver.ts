/**
 * Holiday resolution - pure functions with no side effects.
 *
 * Definitions are expanded into a three-year snapshot of concrete
 * occurrences; queries run against a snapshot. A definition that cannot be
 * resolved for a year is simply absent for that year.
 *
 * HolidayResolver owns the current snapshot and replaces it wholesale.
 */

import {
  addDays,
  compareDays,
  dateFromComponents,
  getDateComponents,
  isSameDay,
  isValidDate,
} from "@core/calendar/dates"

import { easterSunday, lastWeekdayOfMonth, nthWeekdayOfMonth } from "./rules"
import type {
  HolidayCategory,
  HolidayDefinition,
  HolidayOccurrence,
  HolidayRule,
  HolidaySnapshot,
} from "./types"

/** Years on each side of the reference year covered by a snapshot */
export const SNAPSHOT_YEAR_RADIUS = 1

/** Default number of results from upcomingHolidays */
export const DEFAULT_UPCOMING_LIMIT = 10

/** Longest delay setTimeout accepts (2^31 - 1 ms, about 24.8 days) */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

// ============================================================================
// Resolution
// ============================================================================

function applyOffset(date: Date | null, offsetDays: number | undefined): Date | null {
  if (!date) return null
  return offsetDays ? addDays(date, offsetDays) : date
}

/**
 * Get the date of a definition in the given year.
 *
 * One-off definitions return their stored date whatever the year. Fixed-date
 * recurring definitions are rebuilt from their month and day, which fails
 * for Feb 29 outside leap years.
 */
export function dateInYear(definition: HolidayDefinition, year: number): Date | null {
  if (!definition.isRecurring) {
    return isValidDate(definition.referenceDate) ? new Date(definition.referenceDate) : null
  }

  const { rule } = definition
  switch (rule.type) {
    case "fixed": {
      const { month, day } = getDateComponents(definition.referenceDate)
      return dateFromComponents(year, month, day)
    }
    case "nthWeekday": {
      const nth = nthWeekdayOfMonth(year, rule.month, rule.weekday, rule.n)
      return applyOffset(nth, rule.offsetDays)
    }
    case "lastWeekday":
      return applyOffset(lastWeekdayOfMonth(year, rule.month, rule.weekday), rule.offsetDays)
    case "easter":
      return applyOffset(easterSunday(year), rule.offsetDays)
  }
}

/**
 * Whether a rule moves from year to year.
 */
export function isFloatingRule(rule: HolidayRule): boolean {
  return rule.type !== "fixed"
}

/**
 * Materialize a definition for one year. Returns null if it does not occur.
 */
export function createOccurrence(
  definition: HolidayDefinition,
  year: number,
): HolidayOccurrence | null {
  const occurrenceDate = dateInYear(definition, year)
  if (!occurrenceDate) return null

  return Object.freeze({
    name: definition.name,
    occurrenceDate,
    isRecurring: definition.isRecurring,
    category: definition.category,
    rule: definition.rule,
    emoji: definition.emoji,
    description: definition.description,
  })
}

/**
 * Check if an occurrence falls on the given date.
 *
 * Recurring fixed-date occurrences match on month and day alone, ignoring
 * year and time of day. One-off and floating occurrences need the same
 * calendar day in the host timezone, since a floating holiday's month and
 * day change every year.
 */
export function occursOn(occurrence: HolidayOccurrence, queryDate: Date): boolean {
  if (!isValidDate(queryDate)) return false

  if (occurrence.isRecurring && !isFloatingRule(occurrence.rule)) {
    const held = getDateComponents(occurrence.occurrenceDate)
    const query = getDateComponents(queryDate)
    return held.month === query.month && held.day === query.day
  }

  return isSameDay(occurrence.occurrenceDate, queryDate)
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Expand every definition for referenceYear - 1 .. referenceYear + 1.
 * Years a definition cannot be resolved in are skipped, and a one-off
 * definition only appears in the year it actually falls in. The result is
 * sorted by date (ties keep definition order) and frozen.
 */
export function rebuildSnapshot(
  definitions: readonly HolidayDefinition[],
  referenceYear: number,
): HolidaySnapshot {
  const occurrences: HolidayOccurrence[] = []

  for (const definition of definitions) {
    for (let offset = -SNAPSHOT_YEAR_RADIUS; offset <= SNAPSHOT_YEAR_RADIUS; offset++) {
      const year = referenceYear + offset
      const occurrence = createOccurrence(definition, year)
      if (!occurrence) continue
      if (!occurrence.isRecurring && occurrence.occurrenceDate.getFullYear() !== year) continue
      occurrences.push(occurrence)
    }
  }

  occurrences.sort((a, b) => a.occurrenceDate.getTime() - b.occurrenceDate.getTime())

  return Object.freeze({ referenceYear, occurrences: Object.freeze(occurrences) })
}

/**
 * Create an empty snapshot, used before definitions are loaded.
 */
export function emptySnapshot(referenceYear: number): HolidaySnapshot {
  return Object.freeze({ referenceYear, occurrences: Object.freeze([]) })
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Keep the first occurrence of each name, in input order.
 */
export function dedupeByName(occurrences: readonly HolidayOccurrence[]): HolidayOccurrence[] {
  const seen = new Set<string>()
  const result: HolidayOccurrence[] = []

  for (const occurrence of occurrences) {
    if (seen.has(occurrence.name)) continue
    seen.add(occurrence.name)
    result.push(occurrence)
  }

  return result
}

/**
 * Get holidays that occur on a specific date.
 *
 * A recurring holiday is expanded for up to three years, and more than one
 * expansion can match; only the earliest-dated one is returned per name.
 */
export function holidaysOn(snapshot: HolidaySnapshot, queryDate: Date): HolidayOccurrence[] {
  return dedupeByName(snapshot.occurrences.filter((occurrence) => occursOn(occurrence, queryDate)))
}

/**
 * Get all occurrences in a 1-based month of a year.
 */
export function holidaysInMonth(
  snapshot: HolidaySnapshot,
  year: number,
  month: number,
): HolidayOccurrence[] {
  return snapshot.occurrences.filter((occurrence) => {
    const components = getDateComponents(occurrence.occurrenceDate)
    return components.year === year && components.month === month
  })
}

/**
 * Get all occurrences in a year.
 */
export function holidaysForYear(snapshot: HolidaySnapshot, year: number): HolidayOccurrence[] {
  return snapshot.occurrences.filter(
    (occurrence) => getDateComponents(occurrence.occurrenceDate).year === year,
  )
}

/**
 * Group occurrences by category. Categories without occurrences are omitted.
 */
export function holidaysByCategory(
  snapshot: HolidaySnapshot,
): Partial<Record<HolidayCategory, HolidayOccurrence[]>> {
  const groups: Partial<Record<HolidayCategory, HolidayOccurrence[]>> = {}

  for (const occurrence of snapshot.occurrences) {
    const group = groups[occurrence.category] ?? []
    group.push(occurrence)
    groups[occurrence.category] = group
  }

  return groups
}

/**
 * Get the next occurrences on or after a date's calendar day.
 */
export function upcomingHolidays(
  snapshot: HolidaySnapshot,
  from: Date,
  limit = DEFAULT_UPCOMING_LIMIT,
): HolidayOccurrence[] {
  if (!isValidDate(from) || limit <= 0) return []

  return snapshot.occurrences
    .filter((occurrence) => compareDays(occurrence.occurrenceDate, from) >= 0)
    .slice(0, limit)
}

/**
 * Drop occurrences whose category is not enabled.
 */
export function filterByCategories(
  occurrences: readonly HolidayOccurrence[],
  enabledCategories: readonly HolidayCategory[],
): HolidayOccurrence[] {
  return occurrences.filter((occurrence) => enabledCategories.includes(occurrence.category))
}

/**
 * Milliseconds until the next January 1 at local midnight, capped at
 * MAX_TIMER_DELAY_MS. Returns null for an invalid date.
 */
export function msUntilNextYear(now: Date): number | null {
  if (!isValidDate(now)) return null

  const nextYear = dateFromComponents(now.getFullYear() + 1, 1, 1)
  if (!nextYear) return null

  return Math.min(Math.max(nextYear.getTime() - now.getTime(), 0), MAX_TIMER_DELAY_MS)
}

// ============================================================================
// HolidayResolver
// ============================================================================

type Listener = () => void

/**
 * Owns the definition table and the current snapshot.
 *
 * The snapshot is never patched: rebuild() computes a new one and publishes
 * it with a single assignment, so readers always see a complete snapshot.
 */
export class HolidayResolver {
  private definitions: readonly HolidayDefinition[]
  private snapshot: HolidaySnapshot
  private readonly listeners = new Set<Listener>()

  constructor(definitions: readonly HolidayDefinition[], referenceYear = new Date().getFullYear()) {
    this.definitions = definitions
    this.snapshot = rebuildSnapshot(definitions, referenceYear)
  }

  getSnapshot = (): HolidaySnapshot => this.snapshot

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getDefinitions(): readonly HolidayDefinition[] {
    return this.definitions
  }

  /**
   * Replace the snapshot with one centered on referenceYear.
   */
  rebuild(referenceYear: number): void {
    this.publish(rebuildSnapshot(this.definitions, referenceYear))
  }

  /**
   * Replace the definition table and rebuild around the current reference year.
   */
  setDefinitions(definitions: readonly HolidayDefinition[]): void {
    this.definitions = definitions
    this.rebuild(this.snapshot.referenceYear)
  }

  /**
   * Rebuild when the year has rolled over since the last build.
   * Returns true if a new snapshot was published.
   */
  refreshIfNeeded(now: Date = new Date()): boolean {
    if (!isValidDate(now)) return false

    const year = now.getFullYear()
    if (year === this.snapshot.referenceYear) return false

    this.rebuild(year)
    return true
  }

  holidaysOn(date: Date): HolidayOccurrence[] {
    return holidaysOn(this.snapshot, date)
  }

  holidaysInMonth(year: number, month: number): HolidayOccurrence[] {
    return holidaysInMonth(this.snapshot, year, month)
  }

  holidaysForYear(year: number): HolidayOccurrence[] {
    return holidaysForYear(this.snapshot, year)
  }

  holidaysByCategory(): Partial<Record<HolidayCategory, HolidayOccurrence[]>> {
    return holidaysByCategory(this.snapshot)
  }

  upcomingHolidays(from: Date = new Date(), limit = DEFAULT_UPCOMING_LIMIT): HolidayOccurrence[] {
    return upcomingHolidays(this.snapshot, from, limit)
  }

  private publish(snapshot: HolidaySnapshot): void {
    this.snapshot = snapshot
    for (const listener of this.listeners) {
      listener()
    }
  }
}
