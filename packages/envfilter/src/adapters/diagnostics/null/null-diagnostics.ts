import type { Diagnostics } from "../../../ports/diagnostics"

export class NullDiagnostics implements Diagnostics {
  warn(_message: string, _meta?: Record<string, unknown>): void {}
}

export function createNullDiagnostics(): Diagnostics {
  return new NullDiagnostics()
}
