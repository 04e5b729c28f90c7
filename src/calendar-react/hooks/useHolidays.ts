/**
 * Holiday hook - Imperative Shell.
 * Owns a HolidayResolver for the view, keeps its snapshot current across
 * year rollovers and filters results by the enabled categories.
 */

import { loadDefaultHolidayDefinitions } from "@core/holidays/definitions"
import {
  DEFAULT_UPCOMING_LIMIT,
  filterByCategories,
  HolidayResolver,
  holidaysInMonth,
  holidaysOn,
  msUntilNextYear,
  upcomingHolidays,
} from "@core/holidays/resolver"
import {
  HOLIDAY_CATEGORIES,
  type HolidayCategory,
  type HolidayDefinition,
  type HolidayOccurrence,
  type HolidaySnapshot,
} from "@core/holidays/types"
import { useEffect, useState, useSyncExternalStore } from "react"

/** Configuration for useHolidays hook */
export interface UseHolidaysConfig {
  /** Definition table; the bundled table is used when omitted */
  definitions?: readonly HolidayDefinition[]
  /** Existing resolver to bind to instead of creating one */
  resolver?: HolidayResolver
  /** Categories to show (all by default) */
  enabledCategories?: readonly HolidayCategory[]
  /** Clock used for the year rollover check; keep it stable across renders */
  now?: () => Date
}

/** Result of useHolidays hook */
export interface UseHolidaysResult {
  snapshot: HolidaySnapshot
  holidaysOn: (date: Date) => HolidayOccurrence[]
  holidaysInMonth: (year: number, month: number) => HolidayOccurrence[]
  upcomingHolidays: (from?: Date, limit?: number) => HolidayOccurrence[]
}

const systemClock = () => new Date()

/**
 * Create a resolver over the bundled definition table.
 * Rejected table entries are logged and left out.
 */
export function createDefaultHolidayResolver(referenceYear: number): HolidayResolver {
  const { definitions, issues } = loadDefaultHolidayDefinitions()
  for (const issue of issues) {
    const label = issue.name ?? "unnamed"
    console.warn(`[Holidays] Skipped definition #${issue.index} (${label}): ${issue.message}`)
  }
  return new HolidayResolver(definitions, referenceYear)
}

/**
 * Hook to query holidays for displayed dates.
 *
 * @param config - Hook configuration
 */
export function useHolidays(config: UseHolidaysConfig = {}): UseHolidaysResult {
  const { enabledCategories = HOLIDAY_CATEGORIES, now = systemClock } = config

  const [resolver] = useState(() => {
    if (config.resolver) return config.resolver
    const referenceYear = now().getFullYear()
    return config.definitions
      ? new HolidayResolver(config.definitions, referenceYear)
      : createDefaultHolidayResolver(referenceYear)
  })

  const snapshot = useSyncExternalStore(
    resolver.subscribe,
    resolver.getSnapshot,
    resolver.getSnapshot,
  )

  // Check on mount and whenever the clock changes, then again at each New Year
  useEffect(() => {
    let timer: ReturnType<typeof setTimeout> | undefined

    const check = () => {
      if (resolver.refreshIfNeeded(now())) {
        console.log(`[Holidays] Rebuilt snapshot for ${resolver.getSnapshot().referenceYear}`)
      }
      const delay = msUntilNextYear(now())
      if (delay !== null) timer = setTimeout(check, delay)
    }

    check()
    return () => clearTimeout(timer)
  }, [resolver, now])

  const onDate = (date: Date) =>
    filterByCategories(holidaysOn(snapshot, date), enabledCategories)

  const inMonth = (year: number, month: number) =>
    filterByCategories(holidaysInMonth(snapshot, year, month), enabledCategories)

  const upcoming = (from: Date = now(), limit = DEFAULT_UPCOMING_LIMIT) => {
    const enabled = filterByCategories(snapshot.occurrences, enabledCategories)
    return upcomingHolidays({ ...snapshot, occurrences: enabled }, from, limit)
  }

  return { snapshot, holidaysOn: onDate, holidaysInMonth: inMonth, upcomingHolidays: upcoming }
}
