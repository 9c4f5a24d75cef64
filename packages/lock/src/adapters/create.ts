import { createNullLogger, type Logger } from "@rfwhois/logger"
import { pollUntil } from "../core/polling/poll-until"
import { sleep } from "../core/polling/sleep"
import { type Clock, SystemClock } from "../core/time/clock"
import { FileLock, type FileLockConfig } from "./file/file-lock"

export type CreateFileLockOptions = FileLockConfig & {
  logger?: Logger
  clock?: Clock
}

export function createFileLock(options: CreateFileLockOptions): FileLock {
  const { logger, clock, ...config } = options

  return new FileLock(
    {
      clock: clock ?? new SystemClock(),
      sleep,
      pollUntil,
      logger: logger ?? createNullLogger(),
    },
    config,
  )
}
