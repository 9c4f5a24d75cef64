import { randomUUID } from "node:crypto"
import * as path from "node:path"
import type { Logger } from "@rfwhois/logger"
import type { PollOptions, PollUntilFn } from "../../core/polling/poll-until"
import type { Sleep } from "../../core/polling/sleep"
import type { Clock } from "../../core/time/clock"
import {
  assertPositiveTimeMs,
  assertValidTimeMs,
} from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type {
  AcquireOptions,
  LockConfig,
  LockTtl,
  TryAcquireOptions,
} from "../../ports/options"
import { FileLease } from "./file-lock-lease"
import {
  claimLockFile,
  createLockFile,
  isProcessAlive,
  type LockFileRecord,
  lockPathFor,
  readLockFile,
  restoreLockFile,
  unlinkIfPresent,
} from "./lock-file"

export type FileLockDeps = {
  clock: Clock
  sleep: Sleep
  pollUntil: PollUntilFn
  logger: Logger
}

export type FileLockConfig = LockConfig & {
  /** Base directory for relative keys. Defaults to the process working directory. */
  rootDir?: string
}

/**
 * Exclusive lock on a filesystem path, shared by every process that can see it.
 *
 * Holding the lock for key `k` means owning the file `k.lock`. Lock files carry
 * an expiry and the holder's pid. Once `expiresAtMs` has passed, or the holder
 * process has exited, the next contender removes the file and retries.
 * The lock is advisory; only callers going through a FileLock are excluded.
 */
export class FileLock implements Lock {
  public constructor(
    private readonly deps: FileLockDeps,
    private readonly config: FileLockConfig,
  ) {}

  public async acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    assertValidTimeMs(timeoutMs, "acquire timeoutMs")

    if (timeoutMs === 0) return await this.tryAcquire(key, { ttl: opts.ttl })

    const pollOpts: PollOptions = {
      pollMs: this.config.pollMs,
      timeoutMs,
      ...(opts.signal && { signal: opts.signal }),
    }

    const acquired = await this.deps.pollUntil(
      () => this.tryAcquire(key, { ttl: opts.ttl }),
      { clock: this.deps.clock, sleep: this.deps.sleep },
      pollOpts,
    )

    return acquired.ok ? acquired.value : null
  }

  public async tryAcquire(
    key: LockKey,
    opts: TryAcquireOptions,
  ): Promise<LockLease | null> {
    assertPositiveTimeMs(opts.ttl.milliseconds, `ttl for lock ${key}`)

    const lockPath = lockPathFor(path.resolve(this.config.rootDir ?? ".", key))

    const lease = await this.tryCreate(key, lockPath, opts.ttl)
    if (lease) return lease

    const holder = await readLockFile(lockPath)

    if (holder !== null && holder !== "corrupt" && !this.isStale(holder)) {
      return null
    }

    if (holder !== null) {
      await this.removeStale(lockPath, holder)
    }

    return this.tryCreate(key, lockPath, opts.ttl)
  }

  private async tryCreate(
    key: LockKey,
    lockPath: string,
    ttl: LockTtl,
  ): Promise<FileLease | null> {
    const token = randomUUID()
    const record: LockFileRecord = {
      token,
      pid: process.pid,
      expiresAtMs: this.deps.clock.nowMs() + ttl.milliseconds,
    }

    const created = await createLockFile(lockPath, record)
    if (!created) return null

    return new FileLease(key, lockPath, token, { clock: this.deps.clock })
  }

  private isStale(holder: LockFileRecord): boolean {
    return holder.expiresAtMs <= this.deps.clock.nowMs() || !isProcessAlive(holder.pid)
  }

  private async removeStale(
    lockPath: string,
    observed: LockFileRecord | "corrupt",
  ): Promise<void> {
    const claimPath = `${lockPath}.${randomUUID()}.stale`

    if (!(await claimLockFile(lockPath, claimPath))) return

    // Another contender may have replaced the stale file before our rename.
    const claimed = await readLockFile(claimPath)

    const unchanged =
      observed === "corrupt"
        ? claimed === "corrupt"
        : claimed !== null && claimed !== "corrupt" && claimed.token === observed.token

    if (!unchanged) {
      await restoreLockFile(claimPath, lockPath)
      return
    }

    this.deps.logger.warn("Taking over stale lock", { path: lockPath })

    await unlinkIfPresent(claimPath)
  }
}
