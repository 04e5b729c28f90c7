import { formatDateKey } from "@core/calendar/dates"
import { describe, expect, test, vi } from "vitest"
import {
  createOccurrence,
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
  upcomingHolidays,
} from "../resolver"
import type { HolidayDefinition, HolidayOccurrence } from "../types"

function definition(
  name: string,
  referenceDate: Date,
  overrides: Partial<HolidayDefinition> = {},
): HolidayDefinition {
  return {
    name,
    referenceDate,
    isRecurring: true,
    category: "other",
    rule: { type: "fixed" },
    emoji: "",
    description: "",
    ...overrides,
  }
}

const christmas = definition("Christmas Day", new Date(2000, 11, 25), { category: "religious" })
const thanksgiving = definition("Thanksgiving", new Date(2000, 10, 1), {
  category: "cultural",
  rule: { type: "nthWeekday", month: 11, weekday: 4, n: 4 },
})
const leapDay = definition("Leap Day", new Date(2024, 1, 29))
const launch = definition("Product Launch", new Date(2025, 2, 10, 9, 30), { isRecurring: false })

const definitions = [christmas, thanksgiving, leapDay, launch]

const key = (date: Date | null) => (date ? formatDateKey(date) : null)
const dates = (occurrences: readonly HolidayOccurrence[]) =>
  occurrences.map((occurrence) => formatDateKey(occurrence.occurrenceDate))

function occurrenceOf(holiday: HolidayDefinition, year: number): HolidayOccurrence {
  const occurrence = createOccurrence(holiday, year)
  if (!occurrence) throw new Error(`${holiday.name} does not occur in ${year}`)
  return occurrence
}

describe("dateInYear", () => {
  test("moves a fixed recurring date into the year", () => {
    expect(key(dateInYear(christmas, 2026))).toBe("2026-12-25")
  })

  test("returns the stored date for one-off holidays in any year", () => {
    expect(key(dateInYear(launch, 2025))).toBe("2025-03-10")
    expect(key(dateInYear(launch, 2031))).toBe("2025-03-10")
  })

  test("does not hand out the definition's own Date", () => {
    expect(dateInYear(launch, 2025)).not.toBe(launch.referenceDate)
  })

  test("skips Feb 29 outside leap years", () => {
    expect(dateInYear(leapDay, 2025)).toBeNull()
    expect(key(dateInYear(leapDay, 2028))).toBe("2028-02-29")
  })

  test("resolves nth weekday rules", () => {
    expect(key(dateInYear(thanksgiving, 2025))).toBe("2025-11-27")
  })

  test("applies day offsets", () => {
    const blackFriday = definition("Black Friday", new Date(2000, 10, 1), {
      rule: { type: "nthWeekday", month: 11, weekday: 4, n: 4, offsetDays: 1 },
    })
    const goodFriday = definition("Good Friday", new Date(2000, 3, 1), {
      rule: { type: "easter", offsetDays: -2 },
    })
    expect(key(dateInYear(blackFriday, 2025))).toBe("2025-11-28")
    expect(key(dateInYear(goodFriday, 2025))).toBe("2025-04-18")
  })

  test("resolves last weekday rules", () => {
    const memorialDay = definition("Memorial Day", new Date(2000, 4, 1), {
      rule: { type: "lastWeekday", month: 5, weekday: 1 },
    })
    expect(key(dateInYear(memorialDay, 2025))).toBe("2025-05-26")
  })

  test("returns null when an nth weekday does not exist", () => {
    const fifthMonday = definition("Fifth Monday", new Date(2000, 10, 1), {
      rule: { type: "nthWeekday", month: 11, weekday: 1, n: 5 },
    })
    expect(dateInYear(fifthMonday, 2025)).toBeNull()
  })
})

describe("isFloatingRule", () => {
  test("only fixed rules stay put", () => {
    expect(isFloatingRule({ type: "fixed" })).toBe(false)
    expect(isFloatingRule({ type: "easter" })).toBe(true)
  })
})

describe("createOccurrence", () => {
  test("carries the definition through", () => {
    const occurrence = occurrenceOf(christmas, 2025)
    expect(occurrence.name).toBe("Christmas Day")
    expect(occurrence.category).toBe("religious")
    expect(occurrence.isRecurring).toBe(true)
    expect(Object.isFrozen(occurrence)).toBe(true)
  })

  test("returns null for years the holiday skips", () => {
    expect(createOccurrence(leapDay, 2027)).toBeNull()
  })
})

describe("occursOn", () => {
  test("matches recurring fixed holidays by month and day in any year", () => {
    const occurrence = occurrenceOf(christmas, 2025)
    for (let year = 2015; year <= 2035; year++) {
      expect(occursOn(occurrence, new Date(year, 11, 25, 15, 0))).toBe(true)
      expect(occursOn(occurrence, new Date(year, 11, 24))).toBe(false)
      expect(occursOn(occurrence, new Date(year, 10, 25))).toBe(false)
    }
  })

  test("matches one-off holidays on the same calendar day only", () => {
    const occurrence = occurrenceOf(launch, 2025)
    expect(occursOn(occurrence, new Date(2025, 2, 10, 23, 59))).toBe(true)
    expect(occursOn(occurrence, new Date(2026, 2, 10))).toBe(false)
  })

  test("matches floating holidays on their own day only", () => {
    const occurrence = occurrenceOf(thanksgiving, 2025)
    expect(occursOn(occurrence, new Date(2025, 10, 27))).toBe(true)
    expect(occursOn(occurrence, new Date(2026, 10, 27))).toBe(false)
  })

  test("is false for an invalid date", () => {
    expect(occursOn(occurrenceOf(christmas, 2025), new Date(Number.NaN))).toBe(false)
  })
})

describe("rebuildSnapshot", () => {
  const snapshot = rebuildSnapshot(definitions, 2025)

  test("expands the year before and after, sorted by date", () => {
    expect(snapshot.referenceYear).toBe(2025)
    expect(dates(snapshot.occurrences)).toEqual([
      "2024-02-29",
      "2024-11-28",
      "2024-12-25",
      "2025-03-10",
      "2025-11-27",
      "2025-12-25",
      "2026-11-26",
      "2026-12-25",
    ])
  })

  test("leaves out one-off holidays outside the window", () => {
    const later = rebuildSnapshot(definitions, 2030)
    expect(later.occurrences.some((occurrence) => occurrence.name === "Product Launch")).toBe(
      false,
    )
  })

  test("is frozen", () => {
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot.occurrences)).toBe(true)
  })

  test("returns an empty snapshot for no definitions", () => {
    expect(rebuildSnapshot([], 2025)).toEqual(emptySnapshot(2025))
  })
})

describe("holidaysOn", () => {
  const snapshot = rebuildSnapshot(definitions, 2025)

  test("returns each recurring holiday once, earliest expansion first", () => {
    const result = holidaysOn(snapshot, new Date(2025, 11, 25))
    expect(result).toHaveLength(1)
    expect(result[0]?.name).toBe("Christmas Day")
    expect(key(result[0]?.occurrenceDate ?? null)).toBe("2024-12-25")
  })

  test("never returns a name twice", () => {
    const query = new Date(2025, 0, 1)
    for (let offset = 0; offset < 366; offset++) {
      query.setDate(query.getDate() + 1)
      const names = holidaysOn(snapshot, query).map((occurrence) => occurrence.name)
      expect(new Set(names).size).toBe(names.length)
    }
  })

  test("finds floating holidays on their day", () => {
    const result = holidaysOn(snapshot, new Date(2026, 10, 26))
    expect(result.map((occurrence) => occurrence.name)).toEqual(["Thanksgiving"])
  })

  test("finds Leap Day in other leap years", () => {
    const result = holidaysOn(snapshot, new Date(2028, 1, 29))
    expect(result.map((occurrence) => occurrence.name)).toEqual(["Leap Day"])
  })

  test("returns nothing on an ordinary day", () => {
    expect(holidaysOn(snapshot, new Date(2025, 6, 15))).toEqual([])
  })
})

describe("dedupeByName", () => {
  test("keeps the first occurrence of each name", () => {
    const first = occurrenceOf(christmas, 2024)
    const second = occurrenceOf(christmas, 2025)
    const other = occurrenceOf(thanksgiving, 2025)
    expect(dedupeByName([first, other, second])).toEqual([first, other])
  })
})

describe("snapshot queries", () => {
  const snapshot = rebuildSnapshot(definitions, 2025)

  test("holidaysInMonth", () => {
    expect(dates(holidaysInMonth(snapshot, 2025, 11))).toEqual(["2025-11-27"])
    expect(holidaysInMonth(snapshot, 2025, 2)).toEqual([])
  })

  test("holidaysForYear", () => {
    expect(dates(holidaysForYear(snapshot, 2024))).toEqual([
      "2024-02-29",
      "2024-11-28",
      "2024-12-25",
    ])
  })

  test("holidaysByCategory", () => {
    const groups = holidaysByCategory(snapshot)
    expect(groups.religious).toHaveLength(3)
    expect(groups.cultural).toHaveLength(3)
    expect(groups.other).toHaveLength(2)
    expect(groups.national).toBeUndefined()
  })

  test("upcomingHolidays starts on the given day", () => {
    const result = upcomingHolidays(snapshot, new Date(2025, 10, 27, 10, 0), 3)
    expect(dates(result)).toEqual(["2025-11-27", "2025-12-25", "2026-11-26"])
  })

  test("upcomingHolidays with no limit left", () => {
    expect(upcomingHolidays(snapshot, new Date(2025, 0, 1), 0)).toEqual([])
  })

  test("filterByCategories", () => {
    const religious = filterByCategories(snapshot.occurrences, ["religious"])
    expect(dates(religious)).toEqual(["2024-12-25", "2025-12-25", "2026-12-25"])
  })
})

describe("HolidayResolver", () => {
  test("builds a snapshot for the reference year", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    expect(resolver.getSnapshot().referenceYear).toBe(2025)
    expect(resolver.getSnapshot().occurrences).toHaveLength(8)
    expect(resolver.getDefinitions()).toBe(definitions)
  })

  test("refreshes only when the year rolls over", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    const listener = vi.fn()
    resolver.subscribe(listener)

    expect(resolver.refreshIfNeeded(new Date(2025, 11, 31, 23, 59))).toBe(false)
    expect(listener).not.toHaveBeenCalled()

    const before = resolver.getSnapshot()
    expect(resolver.refreshIfNeeded(new Date(2026, 0, 1))).toBe(true)
    expect(listener).toHaveBeenCalledTimes(1)
    expect(resolver.getSnapshot().referenceYear).toBe(2026)
    expect(before.referenceYear).toBe(2025)
    expect(dates(holidaysForYear(resolver.getSnapshot(), 2027))).toEqual([
      "2027-11-25",
      "2027-12-25",
    ])
  })

  test("ignores an invalid clock", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    expect(resolver.refreshIfNeeded(new Date(Number.NaN))).toBe(false)
  })

  test("setDefinitions replaces the snapshot", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    resolver.setDefinitions([christmas])
    expect(dates(resolver.getSnapshot().occurrences)).toEqual([
      "2024-12-25",
      "2025-12-25",
      "2026-12-25",
    ])
  })

  test("unsubscribe stops notifications", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    const listener = vi.fn()
    const unsubscribe = resolver.subscribe(listener)
    unsubscribe()
    resolver.rebuild(2030)
    expect(listener).not.toHaveBeenCalled()
  })

  test("queries the current snapshot", () => {
    const resolver = new HolidayResolver(definitions, 2025)
    expect(resolver.holidaysOn(new Date(2025, 2, 10)).map((o) => o.name)).toEqual([
      "Product Launch",
    ])
    expect(resolver.holidaysInMonth(2026, 12)).toHaveLength(1)
    expect(resolver.holidaysForYear(2026)).toHaveLength(2)
    expect(resolver.holidaysByCategory().cultural).toHaveLength(3)
    expect(dates(resolver.upcomingHolidays(new Date(2026, 0, 1), 1))).toEqual(["2026-11-26"])
  })
})

describe("msUntilNextYear", () => {
  test("counts down to local midnight on January 1", () => {
    expect(msUntilNextYear(new Date(2025, 11, 31, 23, 59))).toBe(60_000)
    expect(msUntilNextYear(new Date(2025, 11, 31))).toBe(
      new Date(2026, 0, 1).getTime() - new Date(2025, 11, 31).getTime(),
    )
  })

  test("caps the delay at the longest timer setTimeout accepts", () => {
    expect(msUntilNextYear(new Date(2025, 0, 1))).toBe(MAX_TIMER_DELAY_MS)
  })

  test("returns null for an invalid date", () => {
    expect(msUntilNextYear(new Date(Number.NaN))).toBeNull()
  })
})
