import type { FilterLevel } from "./filter-level"

/**
 * A single filtering rule.
 *
 * @remarks
 * `module` is a path prefix ("app::db", "app.http"). When it is absent the
 * directive is the global default, used when no prefix matches.
 */
export type Directive = Readonly<{
  module?: string
  level: FilterLevel
}>
