import type { Level } from "./filter-level"

export type KeyValues = Readonly<Record<string, unknown>>

export interface MessageWriter {
  write(chunk: string): void
}

/**
 * Renders a message lazily. Only called when the message text is needed,
 * i.e. by a content filter or by the drain that prints it.
 */
export type MessageFormatter = (out: MessageWriter) => void

export type RecordMessage = string | MessageFormatter

export type LogRecord = Readonly<{
  level: Level
  /** Path of the module that emitted the record, e.g. "app::db::pool". */
  module: string
  message: RecordMessage
  /** Key-values attached at the call site. */
  kv?: KeyValues
}>
