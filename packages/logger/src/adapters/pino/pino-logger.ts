import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Write JSON lines here instead of stdout. Disables the pretty transport. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.logger = base ? base.child(bindings) : this.init(bindings)
  }

  private init(bindings: LogContextPatch): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = this.deps.destination
      ? pino(pinoOpts, this.deps.destination)
      : pino(pinoOpts)

    return root.child(bindings)
  }

  private toPinoMeta(meta?: LogMeta<TContext>): object {
    return { ...meta }
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(this.toPinoMeta(meta), message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(this.toPinoMeta(meta), message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(this.toPinoMeta(meta), message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(this.toPinoMeta(meta), message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(this.toPinoMeta(meta), message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(this.toPinoMeta(meta), message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.deps, this.opts, context, this.logger)
  }
}
