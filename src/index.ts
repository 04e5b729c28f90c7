/**
 * Calendar navigation and holiday resolution.
 *
 * React bindings live under the "./hooks" entry point.
 */

export * from "./core/calendar"
export * from "./core/holidays"
