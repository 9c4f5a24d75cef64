import * as path from "node:path"
import type { CachePath } from "../ports/cache-store"
import type { Domain } from "../ports/domain"

/**
 * Locate the cache file for `domain`: `<cacheRoot>/<shard>/<domain>.xml`, with
 * the shard being the domain's first character, lowercased. The domain itself
 * keeps its case.
 *
 * @example
 * ```ts
 * cachePathFor("/registryfusion", "Example.com")
 * // { shardDir: "/registryfusion/e", filePath: "/registryfusion/e/Example.com.xml" }
 * ```
 */
export function cachePathFor(cacheRoot: string, domain: Domain): CachePath {
  const shardDir = path.join(cacheRoot, domain.charAt(0).toLowerCase())

  return {
    shardDir,
    filePath: path.join(shardDir, `${domain}.xml`),
  }
}
