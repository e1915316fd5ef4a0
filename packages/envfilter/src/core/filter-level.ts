import {
  type FilterLevel,
  type FilterLevelName,
  FilterLevels,
  type Level,
  type LevelName,
  Levels,
  filterLevelNames,
} from "../ports/filter-level"

export const maxFilterLevel: FilterLevel = FilterLevels.Trace

const NAME_TO_LEVEL: ReadonlyMap<string, FilterLevel> = new Map<string, FilterLevel>([
  ["off", FilterLevels.Off],
  ["error", FilterLevels.Error],
  ["erro", FilterLevels.Error],
  ["warn", FilterLevels.Warning],
  ["warning", FilterLevels.Warning],
  ["info", FilterLevels.Info],
  ["debug", FilterLevels.Debug],
  ["debg", FilterLevels.Debug],
  ["trace", FilterLevels.Trace],
  ["trce", FilterLevels.Trace],
])

const RANK_PATTERN = /^\d+$/

function isFilterLevel(n: number): n is FilterLevel {
  return Number.isInteger(n) && n >= FilterLevels.Off && n <= FilterLevels.Trace
}

/**
 * Parses a level name (case-insensitive) or an integer rank ("0".."5").
 *
 * @returns the level, or `undefined` when `text` is neither.
 */
export function parseFilterLevel(text: string): FilterLevel | undefined {
  if (RANK_PATTERN.test(text)) {
    const rank = Number(text)
    return isFilterLevel(rank) ? rank : undefined
  }

  return NAME_TO_LEVEL.get(text.toLowerCase())
}

export function filterLevelName(level: FilterLevel): FilterLevelName {
  return filterLevelNames[level]
}

const LEVEL_NAMES: Readonly<Record<Level, LevelName>> = {
  [Levels.Error]: "error",
  [Levels.Warning]: "warn",
  [Levels.Info]: "info",
  [Levels.Debug]: "debug",
  [Levels.Trace]: "trace",
}

export function levelName(level: Level): LevelName {
  return LEVEL_NAMES[level]
}
