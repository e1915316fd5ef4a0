import type { Level } from "../../ports/filter-level"
import type { KeyValues, LogRecord, RecordMessage } from "../../ports/log-record"

export function makeRecord(
  level: Level,
  module: string,
  message: RecordMessage = "message",
  kv?: KeyValues,
): LogRecord {
  return { level, module, message, ...(kv && { kv }) }
}
