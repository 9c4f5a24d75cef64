import type { LogContextPatch } from "../ports/log-context"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import { NullLogger } from "./null/null-logger"
import { PinoLogger, type PinoLoggerDeps } from "./pino/pino-logger"

export function createPinoLogger(
  bindings: LogContextPatch = {},
  opts: Partial<LoggerOptions> = {},
  deps: PinoLoggerDeps = {},
): Logger {
  return new PinoLogger(deps, opts, bindings)
}

export function createNullLogger(): Logger {
  return new NullLogger()
}
