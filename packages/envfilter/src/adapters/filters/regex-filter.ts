import { EnvFilterError } from "../../core/errors"
import type { ContentFilter } from "../../ports/content-filter"

/**
 * Matches messages against a regular expression.
 *
 * The expression is unanchored: it matches when it occurs anywhere in the
 * message. No flags are applied, so matching is case-sensitive and stateless.
 *
 * @throws EnvFilterError (`invalid_filter`) when the pattern does not compile.
 */
export class RegexFilter implements ContentFilter {
  readonly pattern: string
  private readonly re: RegExp

  constructor(pattern: string) {
    this.pattern = pattern
    this.re = compile(pattern)
  }

  isMatch(text: string): boolean {
    return this.re.test(text)
  }

  toString(): string {
    return this.pattern
  }
}

function compile(pattern: string): RegExp {
  try {
    return new RegExp(pattern)
  } catch (err) {
    throw new EnvFilterError(err instanceof Error ? err.message : String(err), {
      code: "invalid_filter",
      context: { pattern },
      cause: err,
    })
  }
}
