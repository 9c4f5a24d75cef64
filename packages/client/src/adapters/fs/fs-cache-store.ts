import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import { type Lock, LockAcquisitionError, type Milliseconds, withLock } from "@rfwhois/lock"
import type { Logger } from "@rfwhois/logger"
import { cachePathFor } from "../../core/cache-path"
import { BaseError } from "../../errors/base-error"
import {
  CacheDeleteError,
  CacheReadError,
  CacheWriteError,
} from "../../errors/whois-errors"
import type { CachePath, CacheStore } from "../../ports/cache-store"
import type { Domain } from "../../ports/domain"

export type FsCacheStoreDeps = {
  lock: Lock
  logger: Logger
}

export type FsCacheStoreConfig = {
  cacheRoot: string
  lockTimeoutMs: Milliseconds
  lockTtlMs: Milliseconds
  /** Formatting of `modifiedDate`. Both default to the process locale and zone. */
  dateFormat?: {
    locale?: string | undefined
    timeZone?: string | undefined
  }
}

type LockFailureHandlers<T> = {
  /** The shard directory does not exist, so there is nothing to lock. */
  missingDir: (cause: unknown) => T
  /** The lock file cannot be created because the shard is not writable. */
  readOnlyDir?: (cause: unknown) => Promise<T>
  /** The lock was not acquired within `lockTimeoutMs`. */
  timedOut: (cause: LockAcquisitionError) => BaseError
  /** The lock file itself could not be created or removed. */
  failed: (cause: unknown) => BaseError
}

/**
 * Whois records on disk, one file per domain, sharded by first letter.
 *
 * Reads, writes and deletes of one entry are serialized across processes with
 * a file lock on the entry's path. Writes go to a temp file in the shard
 * directory and are renamed over the entry.
 */
export class FsCacheStore implements CacheStore {
  private readonly logger: Logger

  constructor(
    private readonly deps: FsCacheStoreDeps,
    private readonly config: FsCacheStoreConfig,
  ) {
    this.logger = deps.logger.child({ module: "cache-store", cacheRoot: config.cacheRoot })
  }

  path(domain: Domain): CachePath {
    return cachePathFor(this.config.cacheRoot, domain)
  }

  async exists(domain: Domain): Promise<boolean> {
    const { filePath } = this.path(domain)

    try {
      const stat = await fs.stat(filePath)
      return stat.isFile()
    } catch (err) {
      if (isMissing(err)) return false
      throw CacheReadError.unreadable(domain, filePath, err)
    }
  }

  async read(domain: Domain): Promise<string> {
    const { filePath } = this.path(domain)

    const readEntry = async () => {
      try {
        return await fs.readFile(filePath, "utf-8")
      } catch (err) {
        if (isMissing(err)) throw CacheReadError.missing(domain, filePath)
        throw CacheReadError.unreadable(domain, filePath, err)
      }
    }

    const payload = await this.locked(filePath, readEntry, {
      missingDir: () => {
        throw CacheReadError.missing(domain, filePath)
      },
      // Entries are replaced by rename, so an unlocked reader still sees a whole file.
      readOnlyDir: async (cause) => {
        this.logger.debug("Reading cache entry without lock", {
          domain,
          path: filePath,
          err: cause,
        })
        return readEntry()
      },
      timedOut: (cause) => CacheReadError.locked(domain, filePath, cause),
      failed: (cause) => CacheReadError.unreadable(domain, filePath, cause),
    })

    this.logger.debug("Read cache entry", { domain, path: filePath })

    return payload
  }

  async write(domain: Domain, payload: string): Promise<void> {
    const { filePath, shardDir } = this.path(domain)

    try {
      await fs.mkdir(shardDir, { recursive: true })
    } catch (err) {
      throw CacheWriteError.unwritable(domain, filePath, err)
    }

    await this.locked(
      filePath,
      async () => {
        const tmpPath = `${filePath}.${randomUUID()}.tmp`

        try {
          await fs.writeFile(tmpPath, payload, "utf-8")
          await fs.rename(tmpPath, filePath)
        } catch (err) {
          try {
            await fs.rm(tmpPath, { force: true })
          } catch (cleanupErr) {
            this.logger.warn("Failed to remove temp file", {
              domain,
              path: tmpPath,
              err: cleanupErr,
            })
          }
          throw CacheWriteError.unwritable(domain, filePath, err)
        }
      },
      {
        missingDir: (cause) => {
          throw CacheWriteError.unwritable(domain, filePath, cause)
        },
        timedOut: (cause) => CacheWriteError.locked(domain, filePath, cause),
        failed: (cause) => CacheWriteError.unwritable(domain, filePath, cause),
      },
    )

    this.logger.debug("Wrote cache entry", { domain, path: filePath })
  }

  async delete(domain: Domain): Promise<void> {
    const { filePath } = this.path(domain)

    if (!(await this.exists(domain))) return

    const removed = await this.locked(
      filePath,
      async () => {
        try {
          await fs.unlink(filePath)
          return true
        } catch (err) {
          if (isMissing(err)) return false
          throw CacheDeleteError.undeletable(domain, filePath, err)
        }
      },
      {
        missingDir: () => false,
        timedOut: (cause) => CacheDeleteError.locked(domain, filePath, cause),
        failed: (cause) => CacheDeleteError.undeletable(domain, filePath, cause),
      },
    )

    if (removed) {
      this.logger.debug("Deleted cache entry", { domain, path: filePath })
    }
  }

  async modifiedAt(domain: Domain): Promise<Date> {
    const { filePath } = this.path(domain)

    try {
      const stat = await fs.stat(filePath)
      return stat.mtime
    } catch (err) {
      if (isMissing(err)) throw CacheReadError.missing(domain, filePath)
      throw CacheReadError.unreadable(domain, filePath, err)
    }
  }

  async modifiedDate(domain: Domain): Promise<string> {
    const mtime = await this.modifiedAt(domain)
    const format = this.config.dateFormat

    return new Intl.DateTimeFormat(format?.locale, {
      dateStyle: "short",
      ...(format?.timeZone !== undefined && { timeZone: format.timeZone }),
    }).format(mtime)
  }

  /**
   * Run `fn` holding the entry's lock. Errors raised by `fn` pass through;
   * failures of the lock itself are mapped by `on`.
   */
  private async locked<T>(
    filePath: string,
    fn: () => Promise<T>,
    on: LockFailureHandlers<T>,
  ): Promise<T> {
    try {
      return await withLock(this.deps.lock, filePath, fn, {
        ttl: { milliseconds: this.config.lockTtlMs },
        timeoutMs: this.config.lockTimeoutMs,
      })
    } catch (err) {
      if (err instanceof BaseError) throw err
      if (err instanceof LockAcquisitionError) throw on.timedOut(err)
      if (isMissing(err)) return on.missingDir(err)
      if (on.readOnlyDir && isReadOnly(err)) return on.readOnlyDir(err)
      throw on.failed(err)
    }
  }
}

function isMissing(err: unknown): boolean {
  const code = errnoCode(err)
  return code === "ENOENT" || code === "ENOTDIR"
}

function isReadOnly(err: unknown): boolean {
  const code = errnoCode(err)
  return code === "EACCES" || code === "EPERM" || code === "EROFS"
}

function errnoCode(err: unknown): unknown {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined
  return err.code
}
