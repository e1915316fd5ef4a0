/**
 * Receives warnings about malformed specs and configuration.
 *
 * Diagnostics are never fatal. Implementations should not throw.
 */
export interface Diagnostics {
  warn(message: string, meta?: Record<string, unknown>): void
}
