/**
 * Matches rendered message text.
 *
 * At most one content filter is active per EnvFilter. It is tested after the
 * level check and before the record is forwarded.
 */
export interface ContentFilter {
  /** The pattern the filter was built from, as written in the spec. */
  readonly pattern: string

  isMatch(text: string): boolean

  toString(): string
}

export const filterStrategies = ["regex", "substring"] as const

/**
 * How the pattern after `/` is interpreted.
 *
 * - `regex`: a JavaScript regular expression, unanchored
 * - `substring`: a literal substring
 */
export type FilterStrategy = (typeof filterStrategies)[number]
