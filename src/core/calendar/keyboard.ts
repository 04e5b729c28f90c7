/**
 * Keyboard commands for calendar navigation - pure functions.
 * Maps key presses to navigation commands and applies them to a state.
 */

import {
  clearSelection,
  moveSelectedBy,
  type NavigationDirection,
  type NavigationState,
  type NavigationUnit,
  navigate,
  navigateToToday,
  setViewMode,
  toggleYearView,
} from "./navigation"
import type { ViewMode } from "./viewModes"

/**
 * A navigation action triggered by user input.
 * - navigate: move the anchor by one unit
 * - moveSelection: move the selected day by a number of days
 * - setViewMode: switch to a view mode
 * - toggleYearView: enter or leave the year view
 * - today: jump anchor and selection to today
 * - clearSelection: drop the selected day
 */
export type NavigationCommand =
  | { type: "navigate"; unit: NavigationUnit; direction: NavigationDirection }
  | { type: "moveSelection"; days: number }
  | { type: "setViewMode"; viewMode: ViewMode }
  | { type: "toggleYearView" }
  | { type: "today" }
  | { type: "clearSelection" }

export interface KeyModifiers {
  /** Command (macOS) or Control key */
  meta?: boolean
  shift?: boolean
}

/** Digit keys to view modes: 1-9 day views, 0 for two weeks */
const DIGIT_VIEW_MODES = new Map<string, ViewMode>([
  ["1", "singleDay"],
  ["2", "twoDays"],
  ["3", "threeDays"],
  ["4", "fourDays"],
  ["5", "fiveDays"],
  ["6", "sixDays"],
  ["7", "sevenDays"],
  ["8", "eightDays"],
  ["9", "nineDays"],
  ["0", "twoWeeks"],
])

/** Arrow keys to selection offsets in days */
const ARROW_SELECTION_DAYS = new Map<string, number>([
  ["ArrowUp", -7],
  ["ArrowDown", 7],
  ["ArrowLeft", -1],
  ["ArrowRight", 1],
])

/**
 * Map a KeyboardEvent.key value to a navigation command.
 *
 * Arrows move the selection (up/down a week, left/right a day); with Shift
 * they move the anchor instead. Returns null for unbound keys and for
 * Command/Control chords, which belong to the host application.
 */
export function keyToCommand(key: string, modifiers: KeyModifiers = {}): NavigationCommand | null {
  if (modifiers.meta) return null

  const arrowDays = ARROW_SELECTION_DAYS.get(key)
  if (arrowDays !== undefined) {
    if (modifiers.shift) {
      return {
        type: "navigate",
        unit: Math.abs(arrowDays) === 7 ? "week" : "day",
        direction: arrowDays > 0 ? "forward" : "backward",
      }
    }
    return { type: "moveSelection", days: arrowDays }
  }

  const viewMode = DIGIT_VIEW_MODES.get(key)
  if (viewMode) return { type: "setViewMode", viewMode }

  switch (key.toLowerCase()) {
    case "n":
      return { type: "navigate", unit: "month", direction: "forward" }
    case "p":
      return { type: "navigate", unit: "month", direction: "backward" }
    case "t":
      return { type: "today" }
    case "m":
      return { type: "setViewMode", viewMode: "month" }
    case "y":
      return { type: "toggleYearView" }
    case "escape":
      return { type: "clearSelection" }
    default:
      return null
  }
}

/**
 * Apply a command to a navigation state.
 * Month steps become year steps while the year view is showing.
 * @param today - Date used by the "today" command
 */
export function applyCommand(
  state: NavigationState,
  command: NavigationCommand,
  today: Date = new Date(),
): NavigationState {
  switch (command.type) {
    case "navigate": {
      const unit = command.unit === "month" && state.viewMode === "year" ? "year" : command.unit
      return navigate(state, unit, command.direction)
    }
    case "moveSelection":
      return moveSelectedBy(state, command.days)
    case "setViewMode":
      return setViewMode(state, command.viewMode)
    case "toggleYearView":
      return toggleYearView(state)
    case "today":
      return navigateToToday(state, today)
    case "clearSelection":
      return clearSelection(state)
  }
}
