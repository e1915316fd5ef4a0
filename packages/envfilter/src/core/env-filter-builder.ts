import type { ContentFilter } from "../ports/content-filter"
import type { Directive } from "../ports/directive"
import type { Drain } from "../ports/drain"
import type { EnvFilterOptions } from "../ports/env-filter-options"
import { type FilterLevel, FilterLevels } from "../ports/filter-level"
import { EnvFilter } from "./env-filter"
import { type LoadEnvFilterConfigOptions, loadEnvFilterConfig } from "./load-config"
import { parseSpec } from "./parse-spec"

/**
 * Accumulates directives and a content filter, then builds an EnvFilter.
 *
 * @example
 * ```ts
 * const filter = new EnvFilterBuilder(drain)
 *   .filter(undefined, FilterLevels.Info)
 *   .parse("app::db=trace")
 *   .build()
 * ```
 */
export class EnvFilterBuilder<E = never> {
  private readonly pending: Directive[] = []
  private content: ContentFilter | undefined

  constructor(
    private readonly drain: Drain<E>,
    private readonly opts: EnvFilterOptions = {},
  ) {}

  /**
   * Starts from the spec found in the environment (LOG_FILTER by default).
   * A missing variable yields an empty builder.
   */
  static fromEnv<E>(
    drain: Drain<E>,
    options: LoadEnvFilterConfigOptions = {},
  ): EnvFilterBuilder<E> {
    const config = loadEnvFilterConfig(options)
    const builder = new EnvFilterBuilder(drain, {
      ...(options.diagnostics && { diagnostics: options.diagnostics }),
      filterStrategy: config.filterStrategy,
    })

    return config.spec === undefined ? builder : builder.parse(config.spec)
  }

  /**
   * Records from `module` (and its sub-paths) pass up to `level`.
   * Without a module the directive applies to everything else.
   */
  filter(module: string | undefined, level: FilterLevel): this {
    this.pending.push(module === undefined ? { level } : { module, level })
    return this
  }

  /**
   * Adds the directives of a spec string and replaces the content filter with
   * the spec's own (none, if the spec has no `/pattern`).
   */
  parse(spec: string): this {
    const { directives, filter } = parseSpec(spec, this.opts)

    this.pending.push(...directives)
    this.content = filter

    return this
  }

  contentFilter(filter: ContentFilter | undefined): this {
    this.content = filter
    return this
  }

  build(): EnvFilter<E> {
    const directives: Directive[] =
      this.pending.length === 0
        ? [{ level: FilterLevels.Error }]
        : [...this.pending].sort((a, b) => moduleLength(a) - moduleLength(b))

    return new EnvFilter<E>({
      drain: this.drain,
      directives,
      ...(this.content && { filter: this.content }),
    })
  }
}

function moduleLength(directive: Directive): number {
  return directive.module?.length ?? 0
}
