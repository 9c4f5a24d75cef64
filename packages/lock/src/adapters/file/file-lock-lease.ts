import type { Clock } from "../../core/time/clock"
import { assertPositiveTimeMs } from "../../core/validation/validation"
import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl } from "../../ports/options"
import { readLockFile, rewriteLockFile, unlinkIfPresent } from "./lock-file"

export type FileLeaseDeps = {
  clock: Clock
}

export class FileLease implements LockLease {
  private released = false

  public constructor(
    public readonly key: LockKey,
    private readonly lockPath: string,
    private readonly token: string,
    private readonly deps: FileLeaseDeps,
  ) {}

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true

    if (await this.isOwned()) {
      await unlinkIfPresent(this.lockPath)
    }
  }

  public async extend(ttl: LockTtl): Promise<boolean> {
    assertPositiveTimeMs(ttl.milliseconds, `ttl for lock ${this.key}`)

    if (this.released) return false
    if (!(await this.isOwned())) return false

    await rewriteLockFile(this.lockPath, {
      token: this.token,
      pid: process.pid,
      expiresAtMs: this.deps.clock.nowMs() + ttl.milliseconds,
    })

    return true
  }

  private async isOwned(): Promise<boolean> {
    const holder = await readLockFile(this.lockPath)

    return holder !== null && holder !== "corrupt" && holder.token === this.token
  }
}
