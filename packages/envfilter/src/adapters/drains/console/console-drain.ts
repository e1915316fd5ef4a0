import { levelName } from "../../../core/filter-level"
import { renderMessage } from "../../../core/render-buffer"
import type { Drain, DrainResult } from "../../../ports/drain"
import type { LevelName } from "../../../ports/filter-level"
import type { KeyValues, LogRecord } from "../../../ports/log-record"

export type ConsoleWriter = Pick<Console, "debug" | "info" | "warn" | "error">

export type ConsoleDrainDeps = {
  console?: ConsoleWriter
}

export type ConsoleDrainOptions = {
  /**
   * Emit `<timestamp> <LEVEL> <module> <message> {json}` lines instead of
   * one JSON object per line.
   */
  prettify?: boolean
}

type ConsoleMethod = "debug" | "info" | "warn" | "error"

// console.trace prints a stack trace, so trace records go to debug.
const LEVEL_TO_CONSOLE_METHOD: Record<LevelName, ConsoleMethod> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
}

const RESERVED_KEYS = ["timestamp", "level", "module", "message"] as const

export class ConsoleDrain implements Drain {
  private readonly sink: ConsoleWriter

  constructor(
    deps: ConsoleDrainDeps = {},
    private readonly opts: ConsoleDrainOptions = {},
  ) {
    this.sink = deps.console ?? globalThis.console
  }

  log(record: LogRecord, values: KeyValues): DrainResult {
    const level = levelName(record.level)

    const fields = stripUndefined({ ...values, ...record.kv })
    for (const key of RESERVED_KEYS) delete fields[key]

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      module: record.module,
      message: renderMessage(record.message),
      ...fields,
    }

    if ("err" in payload) {
      payload.err = normalizeError(payload.err)
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)

    return { success: true }
  }
}

function normalizeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err

  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    ...(err.cause !== undefined && { cause: normalizeError(err.cause) }),
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, module, message, ...rest } = payload

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""

  return `${String(timestamp)} ${String(level).toUpperCase()} ${String(module)} ${String(message)}${tail}`
}

export function createConsoleDrain(
  deps: ConsoleDrainDeps = {},
  opts: ConsoleDrainOptions = {},
): Drain {
  return new ConsoleDrain(deps, opts)
}
