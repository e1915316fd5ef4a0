import type { Drain } from "../ports/drain"
import type { EnvFilter } from "./env-filter"
import { EnvFilterBuilder } from "./env-filter-builder"
import type { LoadEnvFilterConfigOptions } from "./load-config"

/**
 * Wraps `drain` in an EnvFilter configured from the environment.
 *
 * With LOG_FILTER unset, only errors pass.
 *
 * @example
 * ```ts
 * // LOG_FILTER="info,app::db=debug/pool"
 * const drain = createEnvFilter(new PinoDrain())
 * ```
 */
export function createEnvFilter<E>(
  drain: Drain<E>,
  options: LoadEnvFilterConfigOptions = {},
): EnvFilter<E> {
  return EnvFilterBuilder.fromEnv(drain, options).build()
}
