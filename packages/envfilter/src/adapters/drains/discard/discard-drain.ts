import type { Drain, DrainResult } from "../../../ports/drain"
import type { KeyValues, LogRecord } from "../../../ports/log-record"

export class DiscardDrain implements Drain {
  log(_record: LogRecord, _values: KeyValues): DrainResult {
    return { success: true }
  }
}

export function createDiscardDrain(): Drain {
  return new DiscardDrain()
}
