import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { levelName } from "../../../core/filter-level"
import { renderMessage } from "../../../core/render-buffer"
import type { Drain, DrainResult } from "../../../ports/drain"
import type { KeyValues, LogRecord } from "../../../ports/log-record"

export type PinoDrainDeps = {
  /**
   * Existing pino logger to write to. Its own level still applies, so give it
   * "trace" to leave all filtering to the EnvFilter in front of this drain.
   */
  base?: PinoLoggerBase
  /**
   * Optional destination stream for pino output. Ignored when `base` is set.
   */
  destination?: DestinationStream
}

export type PinoDrainOptions = {
  /**
   * Pretty-print through pino-pretty.
   *
   * @remarks
   * Only applies when pino owns its destination: a transport cannot be
   * combined with `deps.destination`.
   */
  prettify?: boolean
}

// Fields pino writes itself; a key-value with the same name would duplicate them.
const PINO_RESERVED_KEYS = ["level", "time", "msg", "pid", "hostname"] as const

/**
 * Forwards records to pino.
 *
 * Payload fields are the logger key-values, then the record key-values, then
 * `module`; later ones win on conflict. Key-values named after pino's own
 * fields are dropped.
 */
export class PinoDrain implements Drain {
  protected readonly logger: PinoLoggerBase

  constructor(deps: PinoDrainDeps = {}, opts: PinoDrainOptions = {}) {
    this.logger = deps.base ?? this.init(deps, opts)
  }

  private init(deps: PinoDrainDeps, opts: PinoDrainOptions): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      level: "trace",
      serializers: { err: errWithCause },
    }

    if (deps.destination) return pino(pinoOpts, deps.destination)

    return pino({
      ...pinoOpts,
      ...(opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    })
  }

  log(record: LogRecord, values: KeyValues): DrainResult {
    const fields: Record<string, unknown> = { ...values, ...record.kv }
    for (const key of PINO_RESERVED_KEYS) delete fields[key]

    this.logger[levelName(record.level)](
      { ...fields, module: record.module },
      renderMessage(record.message),
    )

    return { success: true }
  }
}

export function createPinoDrain(deps: PinoDrainDeps = {}, opts: PinoDrainOptions = {}): Drain {
  return new PinoDrain(deps, opts)
}
