/**
 * Core holiday module - recurrence rules, snapshot expansion and queries.
 */

export type { DefinitionIssue, DefinitionParseResult, RawHolidayDefinition } from "./definitions"
export {
  holidayDefinitionSchema,
  loadDefaultHolidayDefinitions,
  parseHolidayDefinitions,
} from "./definitions"
export {
  createOccurrence,
  DEFAULT_UPCOMING_LIMIT,
  dateInYear,
  dedupeByName,
  emptySnapshot,
  filterByCategories,
  HolidayResolver,
  holidaysByCategory,
  holidaysForYear,
  holidaysInMonth,
  holidaysOn,
  isFloatingRule,
  MAX_TIMER_DELAY_MS,
  msUntilNextYear,
  occursOn,
  rebuildSnapshot,
  SNAPSHOT_YEAR_RADIUS,
  upcomingHolidays,
} from "./resolver"
export { easterSunday, lastWeekdayOfMonth, nthWeekdayOfMonth, thanksgivingDate } from "./rules"
export type {
  HolidayCategory,
  HolidayDefinition,
  HolidayOccurrence,
  HolidayRule,
  HolidaySnapshot,
  Weekday,
} from "./types"
export { HOLIDAY_CATEGORIES, isHolidayCategory, Weekdays } from "./types"
