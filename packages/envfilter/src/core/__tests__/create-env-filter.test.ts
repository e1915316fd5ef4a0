import { mock } from "vitest-mock-extended"
import { EnvSource } from "../../adapters/env/env-source"
import type { Diagnostics } from "../../ports/diagnostics"
import { FilterLevels, Levels } from "../../ports/filter-level"
import { makeRecord } from "../../tests/utils/records"
import { RecordingDrain } from "../../tests/utils/recording-drain"
import { createEnvFilter } from "../create-env-filter"

describe("createEnvFilter", () => {
  it("builds a filter from the environment around the given drain", () => {
    const drain = new RecordingDrain()
    const source = new EnvSource({ env: { LOG_FILTER: "error,worker=debug" } })

    const filter = createEnvFilter(drain, { source, diagnostics: mock<Diagnostics>() })

    filter.log(makeRecord(Levels.Debug, "worker::queue", "picked job"), {})
    filter.log(makeRecord(Levels.Warning, "http", "slow"), {})
    filter.log(makeRecord(Levels.Error, "http", "crashed"), {})

    expect(drain.messages()).toEqual(["picked job", "crashed"])
  })

  it("lets only errors through when nothing is configured", () => {
    const filter = createEnvFilter(new RecordingDrain(), {
      source: new EnvSource({ env: {} }),
    })

    expect(filter.directives).toEqual([{ level: FilterLevels.Error }])
    expect(filter.maxLevel()).toBe(FilterLevels.Error)
  })

  it("reads process.env by default", () => {
    vi.stubEnv("LOG_FILTER", "trace")

    try {
      const filter = createEnvFilter(new RecordingDrain())

      expect(filter.maxLevel()).toBe(FilterLevels.Trace)
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
