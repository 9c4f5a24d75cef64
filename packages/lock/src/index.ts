export { type CreateFileLockOptions, createFileLock } from "./adapters/create"
export { FileLock, type FileLockConfig, type FileLockDeps } from "./adapters/file/file-lock"
export { lockPathFor } from "./adapters/file/lock-file"
export { LockAcquisitionError, type LockAcquisitionFailure } from "./core/lock-errors"
export { type PollUntilResult, pollUntil } from "./core/polling/poll-until"
export { type Sleep, sleep } from "./core/polling/sleep"
export { type Clock, SystemClock } from "./core/time/clock"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type {
  AcquireOptions,
  LockConfig,
  LockTtl,
  TryAcquireOptions,
} from "./ports/options"
export type { Milliseconds } from "./ports/time"
