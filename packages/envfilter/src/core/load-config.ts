import { z } from "zod"
import { createConsoleDiagnostics } from "../adapters/diagnostics/console/console-diagnostics"
import { EnvSource } from "../adapters/env/env-source"
import { type FilterStrategy, filterStrategies } from "../ports/content-filter"
import type { Diagnostics } from "../ports/diagnostics"
import type { ConfigSource } from "../ports/source"
import { EnvFilterError } from "./errors"

export const DEFAULT_SPEC_VARIABLE = "LOG_FILTER"
export const DEFAULT_STRATEGY_VARIABLE = "LOG_FILTER_STRATEGY"

export type EnvFilterConfig = {
  /** The raw spec string; undefined when the variable is unset. */
  spec?: string
  filterStrategy: FilterStrategy
}

export type LoadEnvFilterConfigOptions = {
  /** Defaults to an EnvSource over process.env. */
  source?: ConfigSource
  /** Variable holding the spec. */
  variable?: string
  /** Variable selecting the content filter strategy. */
  strategyVariable?: string
  diagnostics?: Diagnostics
}

const strategySchema = z.enum(filterStrategies).default("regex")

/**
 * Reads the spec and filter strategy from the environment.
 *
 * @remarks
 * Never throws on bad values: an unknown strategy is reported through
 * diagnostics and replaced by the default.
 */
export function loadEnvFilterConfig(
  options: LoadEnvFilterConfigOptions = {},
): EnvFilterConfig {
  const source = options.source ?? new EnvSource()
  const variable = options.variable ?? DEFAULT_SPEC_VARIABLE
  const strategyVariable = options.strategyVariable ?? DEFAULT_STRATEGY_VARIABLE

  const values = source.load([variable, strategyVariable])
  const spec = values[variable]
  const rawStrategy = values[strategyVariable]

  const result = strategySchema.safeParse(
    rawStrategy === undefined ? undefined : rawStrategy.trim().toLowerCase(),
  )

  if (result.success) {
    return { ...(spec !== undefined && { spec }), filterStrategy: result.data }
  }

  const diagnostics = options.diagnostics ?? createConsoleDiagnostics()
  const err = new EnvFilterError(
    `invalid ${strategyVariable} '${rawStrategy}' from ${source.name}, using 'regex'`,
    {
      code: "invalid_config",
      context: { variable: strategyVariable, value: rawStrategy },
      cause: new Error(z.prettifyError(result.error)),
    },
  )
  diagnostics.warn(err.message, { err })

  return { ...(spec !== undefined && { spec }), filterStrategy: "regex" }
}
