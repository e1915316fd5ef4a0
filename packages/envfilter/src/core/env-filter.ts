import type { ContentFilter } from "../ports/content-filter"
import type { Directive } from "../ports/directive"
import type { Drain, DrainResult, DrainSuccess } from "../ports/drain"
import { type FilterLevel, FilterLevels, type Level } from "../ports/filter-level"
import type { KeyValues, LogRecord } from "../ports/log-record"
import { RenderBufferPool, writeMessage } from "./render-buffer"

const DROPPED: DrainSuccess = Object.freeze({ success: true })

export type EnvFilterDeps<E> = {
  drain: Drain<E>
  /** Sorted ascending by module length. See EnvFilterBuilder.build(). */
  directives: readonly Directive[]
  filter?: ContentFilter
  buffers?: RenderBufferPool
}

/**
 * A drain that forwards a record to the wrapped drain only when the record's
 * module and level pass the directives, and its message passes the content
 * filter (if any).
 *
 * @remarks
 * Use EnvFilterBuilder or createEnvFilter() to construct one; they apply the
 * default directive and the sort order this class relies on.
 *
 * Dropped records report success, the same as forwarded ones. Whatever the
 * wrapped drain returns for a forwarded record is returned unchanged.
 */
export class EnvFilter<E = never> implements Drain<E> {
  private readonly drain: Drain<E>
  private readonly rules: readonly Directive[]
  private readonly content: ContentFilter | undefined
  private readonly buffers: RenderBufferPool

  constructor(deps: EnvFilterDeps<E>) {
    this.drain = deps.drain
    this.rules = Object.freeze([...deps.directives])
    this.content = deps.filter
    this.buffers = deps.buffers ?? new RenderBufferPool()
  }

  get directives(): readonly Directive[] {
    return this.rules
  }

  get filter(): ContentFilter | undefined {
    return this.content
  }

  /**
   * The most verbose level any directive allows.
   * Records above it can never pass and need not be built.
   */
  maxLevel(): FilterLevel {
    let max: FilterLevel = FilterLevels.Off

    for (const directive of this.rules) {
      if (directive.level > max) max = directive.level
    }

    return max
  }

  enabled(level: Level, module: string): boolean {
    // Longest prefix wins: the list is sorted by module length, so walk it backwards.
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const directive = this.rules[i]
      if (!directive) continue

      if (directive.module !== undefined && !module.startsWith(directive.module)) continue

      return level <= directive.level
    }

    return false
  }

  log(record: LogRecord, values: KeyValues): DrainResult<E> {
    if (!this.enabled(record.level, record.module)) return DROPPED

    const content = this.content
    if (content && !this.matches(content, record)) return DROPPED

    return this.drain.log(record, values)
  }

  private matches(content: ContentFilter, record: LogRecord): boolean {
    return this.buffers.use((buffer) => {
      writeMessage(record.message, buffer)
      return content.isMatch(buffer.toString())
    })
  }
}
