import { RegexFilter } from "../adapters/filters/regex-filter"
import { SubstringFilter } from "../adapters/filters/substring-filter"
import type { ContentFilter, FilterStrategy } from "../ports/content-filter"

/**
 * Builds the content filter for a pattern.
 *
 * @throws EnvFilterError (`invalid_filter`) for a regex that does not compile.
 */
export function createContentFilter(
  pattern: string,
  strategy: FilterStrategy = "regex",
): ContentFilter {
  switch (strategy) {
    case "regex":
      return new RegexFilter(pattern)
    case "substring":
      return new SubstringFilter(pattern)
  }
}
