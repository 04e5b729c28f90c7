/**
 * Calendar navigation hook - Imperative Shell.
 * Binds a NavigationEngine to React and exposes its transitions as actions.
 */

import { applyCommand, type KeyModifiers, keyToCommand } from "@core/calendar/keyboard"
import {
  NavigationEngine,
  type NavigationDirection,
  type NavigationState,
  type NavigationStateInit,
  type NavigationUnit,
} from "@core/calendar/navigation"
import { type DayRange, type ViewMode, visibleRange } from "@core/calendar/viewModes"
import { useCallback, useMemo, useState, useSyncExternalStore } from "react"

/** Configuration for useCalendarNavigation hook */
export interface UseCalendarNavigationConfig {
  /** Initial state when the hook creates its own engine */
  initialState?: NavigationStateInit
  /** Existing engine to bind to instead of creating one */
  engine?: NavigationEngine
  /** Weekday weeks start on (0 = Sunday) */
  firstWeekday?: number
}

/** State returned by useCalendarNavigation */
export interface CalendarNavigationState extends NavigationState {
  /** Days the current view mode displays, null if it cannot be computed */
  visibleRange: DayRange | null
}

/** Actions returned by useCalendarNavigation */
export interface CalendarNavigationActions {
  navigate: (unit: NavigationUnit, direction: NavigationDirection) => void
  moveSelectedBy: (days: number) => void
  selectDate: (date: Date) => void
  clearSelection: () => void
  goToToday: () => void
  setViewMode: (mode: ViewMode) => void
  toggleYearView: () => void
  /** Handle a KeyboardEvent.key value. Returns true if the key was bound. */
  handleKey: (key: string, modifiers?: KeyModifiers) => boolean
}

/**
 * Hook to manage calendar navigation.
 *
 * @param config - Hook configuration
 * @returns Tuple of [state, actions]
 */
export function useCalendarNavigation(
  config: UseCalendarNavigationConfig = {},
): [CalendarNavigationState, CalendarNavigationActions] {
  const { firstWeekday = 0 } = config
  const [engine] = useState(() => config.engine ?? new NavigationEngine(config.initialState))

  const navigation = useSyncExternalStore(engine.subscribe, engine.getState, engine.getState)

  const range = useMemo(
    () => visibleRange(navigation.viewMode, navigation.currentAnchor, firstWeekday),
    [navigation.viewMode, navigation.currentAnchor, firstWeekday],
  )

  const handleKey = useCallback(
    (key: string, modifiers?: KeyModifiers) => {
      const command = keyToCommand(key, modifiers)
      if (!command) return false
      engine.update((state) => applyCommand(state, command))
      return true
    },
    [engine],
  )

  const actions = useMemo<CalendarNavigationActions>(
    () => ({
      navigate: (unit, direction) => engine.navigate(unit, direction),
      moveSelectedBy: (days) => engine.moveSelectedBy(days),
      selectDate: (date) => engine.selectDate(date),
      clearSelection: () => engine.clearSelection(),
      goToToday: () => engine.navigateToToday(),
      setViewMode: (mode) => engine.setViewMode(mode),
      toggleYearView: () => engine.toggleYearView(),
      handleKey,
    }),
    [engine, handleKey],
  )

  const state: CalendarNavigationState = { ...navigation, visibleRange: range }

  return [state, actions]
}
