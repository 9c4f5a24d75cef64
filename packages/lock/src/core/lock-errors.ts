import type { LockKey } from "../ports/lock"

export type LockAcquisitionFailure = "timeout" | "aborted"

export class LockAcquisitionError extends Error {
  constructor(
    readonly key: LockKey,
    readonly reason: LockAcquisitionFailure,
  ) {
    super(
      reason === "aborted"
        ? `Lock acquisition aborted: ${key}`
        : `Failed to acquire lock: ${key}`,
    )
    this.name = "LockAcquisitionError"
  }
}
