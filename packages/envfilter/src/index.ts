export {
  ConsoleDiagnostics,
  createConsoleDiagnostics,
} from "./adapters/diagnostics/console/console-diagnostics"
export { createNullDiagnostics, NullDiagnostics } from "./adapters/diagnostics/null/null-diagnostics"
export { ConsoleDrain, createConsoleDrain } from "./adapters/drains/console/console-drain"
export type {
  ConsoleDrainDeps,
  ConsoleDrainOptions,
  ConsoleWriter,
} from "./adapters/drains/console/console-drain"
export { createDiscardDrain, DiscardDrain } from "./adapters/drains/discard/discard-drain"
export { createPinoDrain, PinoDrain } from "./adapters/drains/pino/pino-drain"
export type { PinoDrainDeps, PinoDrainOptions } from "./adapters/drains/pino/pino-drain"
export { EnvSource } from "./adapters/env/env-source"
export type { EnvSourceOptions } from "./adapters/env/env-source"
export { RegexFilter } from "./adapters/filters/regex-filter"
export { SubstringFilter } from "./adapters/filters/substring-filter"
export { createContentFilter } from "./core/create-content-filter"
export { createEnvFilter } from "./core/create-env-filter"
export { EnvFilter } from "./core/env-filter"
export type { EnvFilterDeps } from "./core/env-filter"
export { EnvFilterBuilder } from "./core/env-filter-builder"
export { EnvFilterError, isEnvFilterError } from "./core/errors"
export type { EnvFilterErrorCode, SerializedEnvFilterError } from "./core/errors"
export {
  filterLevelName,
  levelName,
  maxFilterLevel,
  parseFilterLevel,
} from "./core/filter-level"
export {
  DEFAULT_SPEC_VARIABLE,
  DEFAULT_STRATEGY_VARIABLE,
  loadEnvFilterConfig,
} from "./core/load-config"
export type { EnvFilterConfig, LoadEnvFilterConfigOptions } from "./core/load-config"
export { parseSpec } from "./core/parse-spec"
export type { ParsedSpec } from "./core/parse-spec"
export { RenderBuffer, RenderBufferPool, renderMessage } from "./core/render-buffer"
export { filterStrategies } from "./ports/content-filter"
export type { ContentFilter, FilterStrategy } from "./ports/content-filter"
export type { Diagnostics } from "./ports/diagnostics"
export type { Directive } from "./ports/directive"
export type { Drain, DrainFailure, DrainResult, DrainSuccess } from "./ports/drain"
export type { EnvFilterOptions } from "./ports/env-filter-options"
export { FilterLevels, filterLevelNames, Levels } from "./ports/filter-level"
export type { FilterLevel, FilterLevelName, Level, LevelName } from "./ports/filter-level"
export type {
  KeyValues,
  LogRecord,
  MessageFormatter,
  MessageWriter,
  RecordMessage,
} from "./ports/log-record"
export type { ConfigSource } from "./ports/source"
