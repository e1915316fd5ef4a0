export type EnvFilterErrorCode =
  | "too_many_segments"
  | "invalid_directive"
  | "invalid_level"
  | "invalid_filter"
  | "invalid_config"

/**
 * Contextual metadata attached to errors.
 * Carries the offending input without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type EnvFilterErrorOptions = Readonly<{
  code: EnvFilterErrorCode
  context?: ErrorContext
  cause?: unknown
}>

/**
 * JSON.stringify-safe error shape, used when errors are attached to log payloads.
 */
export type SerializedEnvFilterError = Readonly<{
  name: string
  code: EnvFilterErrorCode
  message: string
  context: Record<string, unknown>
  cause?: string
}>

/**
 * Describes a rejected piece of configuration.
 *
 * @remarks
 * These errors are reported through diagnostics, not thrown to callers of the
 * parser or the builder. The only place one escapes is a direct call to a
 * content filter constructor with a pattern that does not compile.
 */
export class EnvFilterError extends Error {
  readonly code: EnvFilterErrorCode
  readonly context: ErrorContext

  constructor(message: string, options: EnvFilterErrorOptions) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedEnvFilterError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    }
  }
}

export function isEnvFilterError(e: unknown): e is EnvFilterError {
  return e instanceof EnvFilterError
}
