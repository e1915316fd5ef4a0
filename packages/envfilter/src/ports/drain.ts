import type { KeyValues, LogRecord } from "./log-record"

export type DrainSuccess = {
  readonly success: true
}

export type DrainFailure<E> = {
  readonly success: false
  readonly error: E
}

export type DrainResult<E = never> = DrainSuccess | DrainFailure<E>

/**
 * A destination for log records.
 *
 * @typeParam E - The error a drain reports when it cannot accept a record.
 * Drains that never fail use `never`.
 *
 * @remarks
 * `values` carries the logger-level key-values (bindings inherited from the
 * logger that produced the record). Drains must not mutate either argument.
 */
export interface Drain<E = never> {
  log(record: LogRecord, values: KeyValues): DrainResult<E>
}
