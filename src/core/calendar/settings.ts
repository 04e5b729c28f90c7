/**
 * Pure functions for calendar settings management.
 * Settings are persisted to localStorage per calendar.
 */

import { HOLIDAY_CATEGORIES, type HolidayCategory, isHolidayCategory } from "@core/holidays/types"

import { DEFAULT_VIEW_MODE, isViewMode, type ViewMode } from "./viewModes"

// ============================================================================
// Types
// ============================================================================

/** Calendar settings stored per calendar */
export interface CalendarSettings {
  /** Current view mode */
  viewMode: ViewMode
  /** Weekday weeks start on (0 = Sunday) */
  firstWeekday: number
  /** Holiday categories shown on the calendar */
  enabledCategories: HolidayCategory[]
}

// ============================================================================
// Constants
// ============================================================================

/** localStorage key prefix for calendar settings */
export const SETTINGS_STORAGE_PREFIX = "calendar_settings_"

/** Default settings for new calendars */
export const DEFAULT_SETTINGS: CalendarSettings = {
  viewMode: DEFAULT_VIEW_MODE,
  firstWeekday: 0,
  enabledCategories: [...HOLIDAY_CATEGORIES],
}

// ============================================================================
// Storage Key Functions
// ============================================================================

/**
 * Get the localStorage key for a calendar's settings.
 */
export function getSettingsStorageKey(calendarId: string): string {
  return `${SETTINGS_STORAGE_PREFIX}${calendarId}`
}

// ============================================================================
// Serialization Functions
// ============================================================================

function isWeekday(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 6
}

function defaultSettings(): CalendarSettings {
  return { ...DEFAULT_SETTINGS, enabledCategories: [...DEFAULT_SETTINGS.enabledCategories] }
}

/**
 * Parse settings JSON from localStorage.
 * Returns default settings if JSON is null or invalid.
 */
export function parseSettingsJson(json: string | null): CalendarSettings {
  if (!json) {
    return defaultSettings()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    return defaultSettings()
  }

  if (typeof parsed !== "object" || parsed === null) {
    return defaultSettings()
  }

  // Validate and extract settings with defaults
  const stored: object = parsed
  const field = (key: keyof CalendarSettings): unknown => Reflect.get(stored, key)

  const rawViewMode = field("viewMode")
  const viewMode: ViewMode = isViewMode(rawViewMode) ? rawViewMode : DEFAULT_SETTINGS.viewMode

  const rawFirstWeekday = field("firstWeekday")
  const firstWeekday: number = isWeekday(rawFirstWeekday)
    ? rawFirstWeekday
    : DEFAULT_SETTINGS.firstWeekday

  const rawCategories = field("enabledCategories")
  const enabledCategories: HolidayCategory[] = Array.isArray(rawCategories)
    ? HOLIDAY_CATEGORIES.filter((category) => rawCategories.includes(category))
    : [...DEFAULT_SETTINGS.enabledCategories]

  return { viewMode, firstWeekday, enabledCategories }
}

/**
 * Serialize settings to JSON string for localStorage.
 */
export function serializeSettings(settings: CalendarSettings): string {
  return JSON.stringify(settings)
}

// ============================================================================
// Update Functions (Pure)
// ============================================================================

/**
 * Create new settings with updated view mode.
 */
export function updateViewMode(settings: CalendarSettings, viewMode: ViewMode): CalendarSettings {
  return { ...settings, viewMode }
}

/**
 * Create new settings with updated first weekday. Out-of-range values are ignored.
 */
export function updateFirstWeekday(
  settings: CalendarSettings,
  firstWeekday: number,
): CalendarSettings {
  return isWeekday(firstWeekday) ? { ...settings, firstWeekday } : settings
}

/**
 * Create new settings with a holiday category toggled on or off.
 * Categories stay in their canonical order.
 */
export function toggleCategory(
  settings: CalendarSettings,
  category: HolidayCategory,
): CalendarSettings {
  if (!isHolidayCategory(category)) return settings

  const enabled = settings.enabledCategories.includes(category)
  const enabledCategories = HOLIDAY_CATEGORIES.filter((c) =>
    c === category ? !enabled : settings.enabledCategories.includes(c),
  )
  return { ...settings, enabledCategories }
}
