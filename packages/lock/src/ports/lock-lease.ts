import type { LockKey } from "./lock"
import type { LockTtl } from "./options"

export interface LockLease {
  /** The key this lease holds. */
  readonly key: LockKey

  /**
   * Release the lock if still owned. Idempotent.
   */
  release(): Promise<void>

  /**
   * Push the lease expiry out to `ttl` from now.
   *
   * Returns `false` if the lease is no longer owned, either because it was
   * released or because another holder took it over after it expired.
   */
  extend(ttl: LockTtl): Promise<boolean>
}
