/**
 * Holiday definition table loading.
 *
 * Definitions are configuration, not code: the bundled table lives in
 * data/holidays.json and every entry is validated before use. Invalid or
 * duplicate entries are reported and skipped so one bad row never blocks
 * the rest of the table.
 */

import { parseDateKey } from "@core/calendar/dates"
import { z } from "zod"

import holidayData from "./data/holidays.json"
import { HOLIDAY_CATEGORIES, type HolidayDefinition } from "./types"

// ============================================================================
// Schemas
// ============================================================================

const weekdaySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
])

const monthSchema = z.number().int().min(1).max(12)

const offsetDaysSchema = z.number().int().optional()

const ruleSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("fixed") }),
  z.object({
    type: z.literal("nthWeekday"),
    month: monthSchema,
    weekday: weekdaySchema,
    n: z.number().int().min(1).max(5),
    offsetDays: offsetDaysSchema,
  }),
  z.object({
    type: z.literal("lastWeekday"),
    month: monthSchema,
    weekday: weekdaySchema,
    offsetDays: offsetDaysSchema,
  }),
  z.object({ type: z.literal("easter"), offsetDays: offsetDaysSchema }),
])

const referenceDateSchema = z.string().transform((value, ctx) => {
  const date = parseDateKey(value)
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date key "${value}"` })
    return z.NEVER
  }
  return date
})

export const holidayDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  referenceDate: referenceDateSchema,
  isRecurring: z.boolean(),
  category: z.enum(HOLIDAY_CATEGORIES),
  rule: ruleSchema.default({ type: "fixed" }),
  emoji: z.string().default(""),
  description: z.string().default(""),
})

/** Raw definition as written in the JSON table */
export type RawHolidayDefinition = z.input<typeof holidayDefinitionSchema>

// ============================================================================
// Parsing
// ============================================================================

/** A rejected table entry */
export interface DefinitionIssue {
  /** Position in the input array, -1 when the input is not an array */
  index: number
  name: string | null
  message: string
}

export interface DefinitionParseResult {
  definitions: HolidayDefinition[]
  issues: DefinitionIssue[]
}

function entryName(entry: unknown): string | null {
  if (typeof entry !== "object" || entry === null) return null
  const name: unknown = Reflect.get(entry, "name")
  return typeof name === "string" ? name : null
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ")
}

/**
 * Validate a raw definition table.
 * The first entry with a given name wins; later duplicates are reported.
 */
export function parseHolidayDefinitions(raw: unknown): DefinitionParseResult {
  if (!Array.isArray(raw)) {
    return {
      definitions: [],
      issues: [{ index: -1, name: null, message: "Expected an array of holiday definitions" }],
    }
  }

  const definitions: HolidayDefinition[] = []
  const issues: DefinitionIssue[] = []
  const names = new Set<string>()

  raw.forEach((entry: unknown, index) => {
    const result = holidayDefinitionSchema.safeParse(entry)
    if (!result.success) {
      issues.push({ index, name: entryName(entry), message: formatZodError(result.error) })
      return
    }

    const definition = result.data
    if (names.has(definition.name)) {
      const message = `Duplicate holiday "${definition.name}"`
      issues.push({ index, name: definition.name, message })
      return
    }

    names.add(definition.name)
    definitions.push(Object.freeze(definition))
  })

  return { definitions, issues }
}

/**
 * Parse the bundled holiday table.
 */
export function loadDefaultHolidayDefinitions(): DefinitionParseResult {
  return parseHolidayDefinitions(holidayData)
}
