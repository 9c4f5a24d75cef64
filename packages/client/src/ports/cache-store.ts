import type { Domain } from "./domain"

export type CachePath = Readonly<{
  /** `<cacheRoot>/<shard>/<domain>.xml` */
  filePath: string
  /** `<cacheRoot>/<shard>`, where shard is the lowercased first character. */
  shardDir: string
}>

export interface CacheStore {
  path(domain: Domain): CachePath

  /** True iff a regular file holds a cached record for `domain`. */
  exists(domain: Domain): Promise<boolean>

  /** @throws CacheReadError if the entry is missing or unreadable. */
  read(domain: Domain): Promise<string>

  /**
   * Replace the entry for `domain` with `payload`. Concurrent readers see either
   * the previous content or the new content, never a partial write.
   *
   * @throws CacheWriteError
   */
  write(domain: Domain, payload: string): Promise<void>

  /**
   * Remove the entry for `domain`. Removing an entry that does not exist is a no-op.
   *
   * @throws CacheDeleteError if an existing entry cannot be removed.
   */
  delete(domain: Domain): Promise<void>

  /** @throws CacheReadError if the entry does not exist. */
  modifiedAt(domain: Domain): Promise<Date>

  /** Last-modified date of the entry as a locale short date, e.g. "1/15/24". */
  modifiedDate(domain: Domain): Promise<string>
}
