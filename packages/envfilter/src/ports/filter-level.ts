/**
 * Record severities, ordered from most to least severe.
 *
 * These values define the ordering used for filtering
 * (lower = more severe).
 */
export const Levels = {
  /** Errors that indicate a failure in the current operation. */
  Error: 1,
  /** Indications of potential issues or unexpected situations. */
  Warning: 2,
  /** High-level informational messages about normal operation. */
  Info: 3,
  /** Debug-level information useful during development and investigation. */
  Debug: 4,
  /** Finest-grained diagnostic information. */
  Trace: 5,
} as const

export type Level = (typeof Levels)[keyof typeof Levels]

/**
 * Verbosity ceilings a directive can carry.
 *
 * `Off` permits nothing, `Trace` permits everything.
 */
export const FilterLevels = {
  Off: 0,
  ...Levels,
} as const

export type FilterLevel = (typeof FilterLevels)[keyof typeof FilterLevels]

export const filterLevelNames = ["off", "error", "warn", "info", "debug", "trace"] as const

export type FilterLevelName = (typeof filterLevelNames)[number]

export type LevelName = Exclude<FilterLevelName, "off">
