import { Levels } from "../../../../ports/filter-level"
import { makeRecord } from "../../../../tests/utils/records"
import { createDiscardDrain, DiscardDrain } from "../discard-drain"

describe("DiscardDrain", () => {
  it("accepts every record without rendering it", () => {
    const formatter = vi.fn()
    const drain = new DiscardDrain()

    expect(drain.log(makeRecord(Levels.Error, "app", formatter), {})).toEqual({ success: true })
    expect(drain.log(makeRecord(Levels.Trace, "app"), { a: 1 })).toEqual({ success: true })
    expect(formatter).not.toHaveBeenCalled()
  })

  it("createDiscardDrain() returns a working drain", () => {
    expect(createDiscardDrain().log(makeRecord(Levels.Info, "x"), {})).toEqual({ success: true })
  })
})
