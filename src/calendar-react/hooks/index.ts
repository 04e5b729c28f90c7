/**
 * React Calendar Hooks
 */

export type {
  CalendarNavigationActions,
  CalendarNavigationState,
  UseCalendarNavigationConfig,
} from "./useCalendarNavigation"
export { useCalendarNavigation } from "./useCalendarNavigation"
export type { CalendarSettingsActions, UseCalendarSettingsConfig } from "./useCalendarSettings"
export { useCalendarSettings } from "./useCalendarSettings"
export type { UseHolidaysConfig, UseHolidaysResult } from "./useHolidays"
export { createDefaultHolidayResolver, useHolidays } from "./useHolidays"
