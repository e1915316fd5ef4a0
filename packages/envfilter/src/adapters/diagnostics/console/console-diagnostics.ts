import type { Diagnostics } from "../../../ports/diagnostics"

export type DiagnosticsWriter = Pick<Console, "warn">

export type ConsoleDiagnosticsDeps = {
  console?: DiagnosticsWriter
}

/**
 * Writes one human-readable `warning: ...` line per diagnostic to
 * `console.warn` (stderr). Metadata is not printed.
 */
export class ConsoleDiagnostics implements Diagnostics {
  private readonly sink: DiagnosticsWriter

  constructor(deps: ConsoleDiagnosticsDeps = {}) {
    this.sink = deps.console ?? globalThis.console
  }

  warn(message: string, _meta?: Record<string, unknown>): void {
    this.sink.warn(`warning: ${message}`)
  }
}

export function createConsoleDiagnostics(deps: ConsoleDiagnosticsDeps = {}): Diagnostics {
  return new ConsoleDiagnostics(deps)
}
