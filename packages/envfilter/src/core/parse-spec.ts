import { createConsoleDiagnostics } from "../adapters/diagnostics/console/console-diagnostics"
import type { ContentFilter } from "../ports/content-filter"
import type { Directive } from "../ports/directive"
import type { EnvFilterOptions } from "../ports/env-filter-options"
import { createContentFilter } from "./create-content-filter"
import { EnvFilterError } from "./errors"
import { maxFilterLevel, parseFilterLevel } from "./filter-level"

export type ParsedSpec = {
  /** Directives in the order they appear in the spec. */
  directives: Directive[]
  filter?: ContentFilter
  /** One entry per diagnostic emitted while parsing, in order. */
  warnings: EnvFilterError[]
}

/**
 * Parses a logging spec such as `"info,app::db=debug,app::http/timeout"`.
 *
 * Malformed directives are reported and dropped; the rest of the spec still
 * applies. A spec with more than one `/` is rejected as a whole.
 *
 * @example
 * ```ts
 * const { directives, filter } = parseSpec("warn,app::db=trace/slow query")
 * // directives: [{ level: 2 }, { module: "app::db", level: 5 }]
 * // filter?.pattern: "slow query"
 * ```
 */
export function parseSpec(spec: string, options: EnvFilterOptions = {}): ParsedSpec {
  const diagnostics = options.diagnostics ?? createConsoleDiagnostics()
  const warnings: EnvFilterError[] = []

  const report = (err: EnvFilterError) => {
    warnings.push(err)
    diagnostics.warn(err.message, { err })
  }

  const [mods, pattern, ...rest] = spec.split("/")

  if (rest.length > 0) {
    report(
      new EnvFilterError(`invalid logging spec '${spec}', ignoring it (too many '/'s)`, {
        code: "too_many_segments",
        context: { spec },
      }),
    )
    return { directives: [], warnings }
  }

  const directives: Directive[] = []

  for (const token of (mods ?? "").split(",")) {
    if (token.length === 0) continue

    const directive = parseDirective(token, report)
    if (directive) directives.push(directive)
  }

  const filter =
    pattern === undefined ? undefined : compileFilter(pattern, options, report)

  return { directives, ...(filter && { filter }), warnings }
}

function parseDirective(
  token: string,
  report: (err: EnvFilterError) => void,
): Directive | undefined {
  const parts = token.split("=")
  const [name, rawLevel] = parts

  if (name === undefined || parts.length > 2) {
    report(
      new EnvFilterError(`invalid logging spec '${token}', ignoring it`, {
        code: "invalid_directive",
        context: { token },
      }),
    )
    return undefined
  }

  // A lone token is a global level if it parses as one, otherwise a module.
  if (rawLevel === undefined) {
    const level = parseFilterLevel(name)
    return level === undefined ? { module: name, level: maxFilterLevel } : { level }
  }

  const levelText = rawLevel.trim()
  if (levelText.length === 0) return { module: name, level: maxFilterLevel }

  const level = parseFilterLevel(levelText)

  if (level === undefined) {
    report(
      new EnvFilterError(`invalid logging spec '${levelText}', ignoring it`, {
        code: "invalid_level",
        context: { token, level: levelText },
      }),
    )
    return undefined
  }

  return { module: name, level }
}

function compileFilter(
  pattern: string,
  options: EnvFilterOptions,
  report: (err: EnvFilterError) => void,
): ContentFilter | undefined {
  try {
    return createContentFilter(pattern, options.filterStrategy)
  } catch (err) {
    if (!(err instanceof EnvFilterError)) throw err

    report(
      new EnvFilterError(`invalid regex filter - ${err.message}`, {
        code: "invalid_filter",
        context: { pattern },
        cause: err,
      }),
    )
    return undefined
  }
}
