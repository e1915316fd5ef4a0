import type { Drain } from "../../../ports/drain"
import type { LevelName } from "../../../ports/filter-level"

export type CapturedEntry = {
  level: LevelName
  module: unknown
  message: unknown
  payload: Record<string, unknown>
}

export type DrainHarness = {
  name: string
  make: () => {
    drain: Drain
    read: () => CapturedEntry[]
  }
}
