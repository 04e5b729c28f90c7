/**
 * Core calendar module - pure functions with no side effects.
 * This is the Functional Core of the calendar navigation engine.
 */

// Re-export date functions
export type { DateComponents } from "./dates"
export {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  compareDays,
  dateFromComponents,
  daysInMonth,
  differenceInCalendarDays,
  formatDateKey,
  getDateComponents,
  getDateRange,
  isSameDay,
  isValidDate,
  parseDateKey,
  startOfDay,
  startOfWeek,
} from "./dates"
// Re-export keyboard functions
export type { KeyModifiers, NavigationCommand } from "./keyboard"
export { applyCommand, keyToCommand } from "./keyboard"
// Re-export navigation functions
export type {
  NavigationDirection,
  NavigationState,
  NavigationStateInit,
  NavigationUnit,
} from "./navigation"
export {
  clearSelection,
  createNavigationState,
  isWithinStabilityWindow,
  moveSelectedBy,
  NavigationEngine,
  navigate,
  navigateToToday,
  offsetByUnit,
  selectDate,
  setViewMode,
  toggleYearView,
} from "./navigation"
// Re-export settings functions
export type { CalendarSettings } from "./settings"
export {
  DEFAULT_SETTINGS,
  getSettingsStorageKey,
  parseSettingsJson,
  SETTINGS_STORAGE_PREFIX,
  serializeSettings,
  toggleCategory,
  updateFirstWeekday,
  updateViewMode,
} from "./settings"
// Re-export view mode functions
export type { DayRange, ViewMode } from "./viewModes"
export {
  DEFAULT_VIEW_MODE,
  halfWindowRadius,
  isDayRangeMode,
  isInDisplayedPeriod,
  isViewMode,
  VIEW_MODE_DAY_COUNT,
  VIEW_MODES,
  visibleRange,
} from "./viewModes"
