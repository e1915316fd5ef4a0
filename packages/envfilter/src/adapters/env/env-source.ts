import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>
}

/** Reads the requested variables from an environment map. */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  load(keys: readonly string[]): Record<string, string | undefined> {
    const values: Record<string, string | undefined> = {}

    for (const key of keys) {
      values[key] = Object.hasOwn(this.env, key) ? this.env[key] : undefined
    }

    return values
  }
}
