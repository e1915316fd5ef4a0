import type { FilterStrategy } from "./content-filter"
import type { Diagnostics } from "./diagnostics"

/**
 * Options shared by the parser, the builder and the env loader.
 */
export type EnvFilterOptions = {
  /**
   * Where parse and config warnings go.
   * Defaults to a console adapter writing to stderr.
   */
  diagnostics?: Diagnostics

  /**
   * How the content filter pattern is compiled.
   *
   * @default "regex"
   */
  filterStrategy?: FilterStrategy
}
