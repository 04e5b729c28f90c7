/**
 * Calendar settings hook - Imperative Shell.
 * Handles localStorage persistence for view mode, week start and holiday
 * category settings.
 */

import {
  type CalendarSettings,
  DEFAULT_SETTINGS,
  getSettingsStorageKey,
  parseSettingsJson,
  serializeSettings,
  toggleCategory as toggleCategoryPure,
  updateFirstWeekday as updateFirstWeekdayPure,
  updateViewMode as updateViewModePure,
} from "@core/calendar/settings"
import type { ViewMode } from "@core/calendar/viewModes"
import type { HolidayCategory } from "@core/holidays/types"
import { useCallback, useEffect, useState } from "react"

/** Configuration for useCalendarSettings hook */
export interface UseCalendarSettingsConfig {
  /** Calendar ID for localStorage key */
  calendarId: string
}

/** Actions returned by useCalendarSettings */
export interface CalendarSettingsActions {
  /** Set the view mode */
  setViewMode: (mode: ViewMode) => void
  /** Set the first day of the week (0 = Sunday) */
  setFirstWeekday: (weekday: number) => void
  /** Show or hide a holiday category */
  toggleCategory: (category: HolidayCategory) => void
}

function readStoredSettings(storageKey: string): CalendarSettings {
  try {
    return parseSettingsJson(localStorage.getItem(storageKey))
  } catch (error) {
    console.warn("[Settings] Failed to read settings, using defaults:", error)
    return parseSettingsJson(null)
  }
}

/**
 * Hook to manage calendar settings with localStorage persistence.
 *
 * @param config - Hook configuration
 * @returns Tuple of [state, actions]
 */
export function useCalendarSettings(
  config: UseCalendarSettingsConfig,
): [CalendarSettings, CalendarSettingsActions] {
  const { calendarId } = config
  const [settings, setSettings] = useState<CalendarSettings>(() => {
    // Initialize from localStorage if available (SSR-safe)
    if (typeof window === "undefined") {
      return { ...DEFAULT_SETTINGS, enabledCategories: [...DEFAULT_SETTINGS.enabledCategories] }
    }
    return readStoredSettings(getSettingsStorageKey(calendarId))
  })

  // Persist to localStorage on change
  useEffect(() => {
    if (typeof window === "undefined") return
    const storageKey = getSettingsStorageKey(calendarId)
    try {
      localStorage.setItem(storageKey, serializeSettings(settings))
    } catch (error) {
      console.warn("[Settings] Failed to persist settings:", error)
    }
  }, [calendarId, settings])

  const setViewMode = useCallback((mode: ViewMode) => {
    setSettings((prev) => updateViewModePure(prev, mode))
  }, [])

  const setFirstWeekday = useCallback((weekday: number) => {
    setSettings((prev) => updateFirstWeekdayPure(prev, weekday))
  }, [])

  const toggleCategory = useCallback((category: HolidayCategory) => {
    setSettings((prev) => toggleCategoryPure(prev, category))
  }, [])

  const actions: CalendarSettingsActions = {
    setViewMode,
    setFirstWeekday,
    toggleCategory,
  }

  return [settings, actions]
}
