import { EnvFilterError } from "../../../core/errors"
import { RegexFilter } from "../regex-filter"

describe("RegexFilter", () => {
  it("matches anywhere in the text", () => {
    const filter = new RegexFilter("f.o")

    expect(filter.isMatch("foo")).toBe(true)
    expect(filter.isMatch("a f1o b")).toBe(true)
    expect(filter.isMatch("fo")).toBe(false)
  })

  it("supports quantifiers and classes", () => {
    const filter = new RegexFilter("foo*foo")

    expect(filter.isMatch("foofoo")).toBe(true)
    expect(filter.isMatch("fofoo")).toBe(true)
    expect(filter.isMatch("fooooooofoo")).toBe(true)
    expect(filter.isMatch("foo")).toBe(false)

    expect(new RegexFilter("[0-9] scopes").isMatch("in 2 scopes")).toBe(true)
  })

  it("honors explicit anchors", () => {
    const filter = new RegexFilter("^start")

    expect(filter.isMatch("start here")).toBe(true)
    expect(filter.isMatch("do not start")).toBe(false)
  })

  it("is case-sensitive", () => {
    expect(new RegexFilter("abc").isMatch("ABC")).toBe(false)
  })

  it("gives the same answer on repeated calls", () => {
    const filter = new RegexFilter("x")

    expect([filter.isMatch("x"), filter.isMatch("x"), filter.isMatch("x")]).toEqual([
      true,
      true,
      true,
    ])
  })

  it("exposes the original pattern", () => {
    const filter = new RegexFilter("a*c")

    expect(filter.pattern).toBe("a*c")
    expect(filter.toString()).toBe("a*c")
    expect(String(filter)).toBe("a*c")
  })

  it("throws an invalid_filter error for a pattern that does not compile", () => {
    expect(() => new RegexFilter("a(b")).toThrow(EnvFilterError)

    try {
      new RegexFilter("a(b")
    } catch (err) {
      if (!(err instanceof EnvFilterError)) throw err

      expect(err.code).toBe("invalid_filter")
      expect(err.context).toEqual({ pattern: "a(b" })
      expect(err.cause).toBeInstanceOf(SyntaxError)
    }

    expect.assertions(4)
  })
})
