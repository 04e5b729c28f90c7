// navigation.ts - Calendar navigation state machine

/**
 * Navigation state and its transitions.
 *
 * The pure functions take a NavigationState and return the next one. When a
 * transition cannot be computed (an invalid date, a failed calendar step) the
 * input state is returned unchanged, so callers can compare by reference to
 * see whether anything moved. Nothing here throws.
 *
 * NavigationEngine is the Imperative Shell that owns one state for one view
 * session and notifies subscribers when it is replaced.
 */

import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  differenceInCalendarDays,
  isSameDay,
  isValidDate,
} from "./dates"
import {
  type DayRange,
  DEFAULT_VIEW_MODE,
  halfWindowRadius,
  isInDisplayedPeriod,
  type ViewMode,
  visibleRange,
} from "./viewModes"

// ============================================================================
// Types
// ============================================================================

export type NavigationUnit = "day" | "week" | "month" | "year"

export type NavigationDirection = "forward" | "backward"

export interface NavigationState {
  /** Reference point for the visible window */
  readonly currentAnchor: Date
  /** Highlighted day, independent of the anchor; null when nothing is selected */
  readonly selectedDate: Date | null
  readonly viewMode: ViewMode
  /** Mode to return to when leaving the year view */
  readonly previousViewMode: ViewMode | null
}

export interface NavigationStateInit {
  currentAnchor?: Date
  selectedDate?: Date | null
  viewMode?: ViewMode
}

// ============================================================================
// Pure transitions
// ============================================================================

function freezeState(state: NavigationState): NavigationState {
  return Object.freeze(state)
}

/**
 * Create a navigation state. The anchor defaults to now.
 */
export function createNavigationState(init: NavigationStateInit = {}): NavigationState {
  const currentAnchor = init.currentAnchor ? new Date(init.currentAnchor) : new Date()
  const selectedDate = init.selectedDate ? new Date(init.selectedDate) : null

  return freezeState({
    currentAnchor,
    selectedDate,
    viewMode: init.viewMode ?? DEFAULT_VIEW_MODE,
    previousViewMode: null,
  })
}

/**
 * Offset a date by one signed navigation unit.
 */
export function offsetByUnit(date: Date, unit: NavigationUnit, amount: number): Date | null {
  switch (unit) {
    case "day":
      return addDays(date, amount)
    case "week":
      return addWeeks(date, amount)
    case "month":
      return addMonths(date, amount)
    case "year":
      return addYears(date, amount)
  }
}

/**
 * Move the anchor by exactly one unit in the given direction.
 * Month steps keep the day of month when the target month is long enough.
 */
export function navigate(
  state: NavigationState,
  unit: NavigationUnit,
  direction: NavigationDirection,
): NavigationState {
  const multiplier = direction === "forward" ? 1 : -1
  const newAnchor = offsetByUnit(state.currentAnchor, unit, multiplier)
  if (!newAnchor) return state

  return freezeState({ ...state, currentAnchor: newAnchor })
}

/**
 * Whether a date lies within [anchor - R, anchor + R] by calendar day,
 * where R is the view mode's half-window radius.
 */
export function isWithinStabilityWindow(anchor: Date, date: Date, viewMode: ViewMode): boolean {
  if (!isValidDate(anchor) || !isValidDate(date)) return false
  return Math.abs(differenceInCalendarDays(anchor, date)) <= halfWindowRadius(viewMode)
}

/**
 * Stability rule: keep the anchor while the selection stays inside the
 * visible window, recenter it on the selection once it leaves. Month and
 * year views also recenter when the selection crosses into another month
 * or year.
 */
function withSelection(state: NavigationState, selectedDate: Date): NavigationState {
  const { currentAnchor, viewMode } = state
  const keepAnchor =
    isWithinStabilityWindow(currentAnchor, selectedDate, viewMode) &&
    isInDisplayedPeriod(viewMode, currentAnchor, selectedDate)

  return freezeState({
    ...state,
    selectedDate,
    currentAnchor: keepAnchor ? currentAnchor : new Date(selectedDate),
  })
}

/**
 * Move the selection by a signed number of calendar days.
 * ±7 is the week up/down operation, ±1 day left/right.
 * No-op when nothing is selected.
 */
export function moveSelectedBy(state: NavigationState, days: number): NavigationState {
  if (!state.selectedDate) return state

  const newSelection = addDays(state.selectedDate, days)
  if (!newSelection) return state

  return withSelection(state, newSelection)
}

/**
 * Select a date, recentering the anchor if it falls outside the window.
 */
export function selectDate(state: NavigationState, date: Date): NavigationState {
  if (!isValidDate(date)) return state
  return withSelection(state, new Date(date))
}

export function clearSelection(state: NavigationState): NavigationState {
  if (!state.selectedDate) return state
  return freezeState({ ...state, selectedDate: null })
}

/**
 * Jump anchor and selection to today.
 */
export function navigateToToday(state: NavigationState, today: Date = new Date()): NavigationState {
  if (!isValidDate(today)) return state
  if (
    isSameDay(state.currentAnchor, today) &&
    state.selectedDate !== null &&
    isSameDay(state.selectedDate, today)
  ) {
    return state
  }

  return freezeState({ ...state, currentAnchor: new Date(today), selectedDate: new Date(today) })
}

/**
 * Switch view mode, remembering the previous one so the year view can
 * toggle back to it.
 */
export function setViewMode(state: NavigationState, viewMode: ViewMode): NavigationState {
  if (viewMode === state.viewMode) return state

  return freezeState({
    ...state,
    viewMode,
    previousViewMode: viewMode === "year" ? state.previousViewMode : state.viewMode,
  })
}

/**
 * Enter the year view, or leave it for the remembered mode (month by default).
 */
export function toggleYearView(state: NavigationState): NavigationState {
  if (state.viewMode === "year") {
    return freezeState({
      ...state,
      viewMode: state.previousViewMode ?? "month",
      previousViewMode: null,
    })
  }

  return freezeState({ ...state, viewMode: "year", previousViewMode: state.viewMode })
}

// ============================================================================
// NavigationEngine
// ============================================================================

type Listener = () => void

/**
 * Owns the navigation state of one calendar view.
 *
 * getState and subscribe are bound so they can be handed straight to
 * useSyncExternalStore.
 */
export class NavigationEngine {
  private state: NavigationState
  private readonly listeners = new Set<Listener>()

  constructor(init: NavigationStateInit = {}) {
    this.state = createNavigationState(init)
  }

  getState = (): NavigationState => this.state

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Apply any pure transition to the owned state.
   */
  update(transition: (state: NavigationState) => NavigationState): void {
    this.commit(transition(this.state))
  }

  navigate(unit: NavigationUnit, direction: NavigationDirection): void {
    this.commit(navigate(this.state, unit, direction))
  }

  moveSelectedBy(days: number): void {
    this.commit(moveSelectedBy(this.state, days))
  }

  moveUpOneWeek(): void {
    this.moveSelectedBy(-7)
  }

  moveDownOneWeek(): void {
    this.moveSelectedBy(7)
  }

  moveLeftOneDay(): void {
    this.moveSelectedBy(-1)
  }

  moveRightOneDay(): void {
    this.moveSelectedBy(1)
  }

  selectDate(date: Date): void {
    this.commit(selectDate(this.state, date))
  }

  clearSelection(): void {
    this.commit(clearSelection(this.state))
  }

  navigateToToday(today: Date = new Date()): void {
    this.commit(navigateToToday(this.state, today))
  }

  setViewMode(viewMode: ViewMode): void {
    this.commit(setViewMode(this.state, viewMode))
  }

  toggleYearView(): void {
    this.commit(toggleYearView(this.state))
  }

  visibleRange(firstWeekday = 0): DayRange | null {
    return visibleRange(this.state.viewMode, this.state.currentAnchor, firstWeekday)
  }

  private commit(next: NavigationState): void {
    if (next === this.state) return
    this.state = next
    for (const listener of this.listeners) {
      listener()
    }
  }
}
