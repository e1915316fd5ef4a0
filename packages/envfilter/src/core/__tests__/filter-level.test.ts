import { FilterLevels, Levels } from "../../ports/filter-level"
import { filterLevelName, levelName, maxFilterLevel, parseFilterLevel } from "../filter-level"

describe("parseFilterLevel", () => {
  it.each([
    ["off", FilterLevels.Off],
    ["error", FilterLevels.Error],
    ["warn", FilterLevels.Warning],
    ["warning", FilterLevels.Warning],
    ["info", FilterLevels.Info],
    ["debug", FilterLevels.Debug],
    ["trace", FilterLevels.Trace],
  ])("parses the name %s", (text, expected) => {
    expect(parseFilterLevel(text)).toBe(expected)
  })

  it("is case-insensitive", () => {
    expect(parseFilterLevel("WARN")).toBe(FilterLevels.Warning)
    expect(parseFilterLevel("Debug")).toBe(FilterLevels.Debug)
  })

  it("accepts the four-letter short names", () => {
    expect(parseFilterLevel("erro")).toBe(FilterLevels.Error)
    expect(parseFilterLevel("debg")).toBe(FilterLevels.Debug)
    expect(parseFilterLevel("trce")).toBe(FilterLevels.Trace)
  })

  it("parses integer ranks 0 through 5", () => {
    expect(parseFilterLevel("0")).toBe(FilterLevels.Off)
    expect(parseFilterLevel("1")).toBe(FilterLevels.Error)
    expect(parseFilterLevel("3")).toBe(FilterLevels.Info)
    expect(parseFilterLevel("5")).toBe(FilterLevels.Trace)
  })

  it("rejects out-of-range and non-integer ranks", () => {
    expect(parseFilterLevel("6")).toBeUndefined()
    expect(parseFilterLevel("-1")).toBeUndefined()
    expect(parseFilterLevel("2.5")).toBeUndefined()
  })

  it("rejects unknown names and inherited object keys", () => {
    expect(parseFilterLevel("noNumber")).toBeUndefined()
    expect(parseFilterLevel("crate1")).toBeUndefined()
    expect(parseFilterLevel("constructor")).toBeUndefined()
    expect(parseFilterLevel("")).toBeUndefined()
  })

  it("does not trim its input", () => {
    expect(parseFilterLevel(" info")).toBeUndefined()
  })
})

describe("level names", () => {
  it("maxFilterLevel is trace", () => {
    expect(maxFilterLevel).toBe(FilterLevels.Trace)
  })

  it("filterLevelName maps every filter level", () => {
    expect(filterLevelName(FilterLevels.Off)).toBe("off")
    expect(filterLevelName(FilterLevels.Warning)).toBe("warn")
    expect(filterLevelName(FilterLevels.Trace)).toBe("trace")
  })

  it("levelName maps record levels", () => {
    expect(levelName(Levels.Error)).toBe("error")
    expect(levelName(Levels.Warning)).toBe("warn")
    expect(levelName(Levels.Info)).toBe("info")
    expect(levelName(Levels.Debug)).toBe("debug")
    expect(levelName(Levels.Trace)).toBe("trace")
  })

  it("orders Off < Error < Warning < Info < Debug < Trace", () => {
    const ordered = [
      FilterLevels.Off,
      FilterLevels.Error,
      FilterLevels.Warning,
      FilterLevels.Info,
      FilterLevels.Debug,
      FilterLevels.Trace,
    ]

    expect([...ordered].sort((a, b) => a - b)).toEqual(ordered)
  })
})
