/**
 * A source of raw configuration values.
 *
 * A source only *loads* values. Validation and defaults happen downstream.
 */
export interface ConfigSource {
  /**
   * Human-readable name for diagnostics.
   * Example: "env"
   */
  readonly name: string

  /**
   * Returns one entry per requested key. Undefined means "value not provided".
   */
  load(keys: readonly string[]): Record<string, string | undefined>
}
