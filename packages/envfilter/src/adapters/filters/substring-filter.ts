import type { ContentFilter } from "../../ports/content-filter"

export class SubstringFilter implements ContentFilter {
  constructor(readonly pattern: string) {}

  isMatch(text: string): boolean {
    return text.includes(this.pattern)
  }

  toString(): string {
    return this.pattern
  }
}
