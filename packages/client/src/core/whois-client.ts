import type { Logger } from "@rfwhois/logger"
import type { CacheStore } from "../ports/cache-store"
import type { Domain } from "../ports/domain"
import type { WhoisSession } from "../ports/whois-session"
import { assertValidDomain } from "./domain"
import type { LookupOrchestrator } from "./lookup-orchestrator"

export type WhoisClientDeps = {
  session: WhoisSession
  orchestrator: LookupOrchestrator
  cache: CacheStore
  logger: Logger
}

export type WhoisClientConfig = {
  refreshCache: boolean
}

/**
 * A logged-in whois client. Obtain one with `createWhoisClient` and `close()`
 * it when done, or let `withWhoisClient` scope it.
 *
 * Every domain argument is validated before any cache or network access.
 */
export class WhoisClient {
  /** Fixed at construction. */
  readonly refreshCache: boolean

  private closed = false

  constructor(
    private readonly deps: WhoisClientDeps,
    config: WhoisClientConfig,
  ) {
    this.refreshCache = config.refreshCache
  }

  /**
   * Raw whois record for `domain`, from the cache when present (and refresh is
   * off), otherwise fetched and written back to the cache.
   *
   * @throws RemoteFetchError | CacheReadError | CacheWriteError | InvalidDomainError
   */
  async lookup(domain: Domain): Promise<string> {
    assertValidDomain(domain)
    return this.deps.orchestrator.lookup(domain)
  }

  /** Same as {@link WhoisClient.lookup}. */
  async whois(domain: Domain): Promise<string> {
    return this.lookup(domain)
  }

  async isCached(domain: Domain): Promise<boolean> {
    assertValidDomain(domain)
    return this.deps.cache.exists(domain)
  }

  /** Remove the cached record. No-op when nothing is cached. */
  async deleteFromCache(domain: Domain): Promise<void> {
    assertValidDomain(domain)
    await this.deps.cache.delete(domain)
  }

  /** Short, locale-formatted date the record was cached. */
  async cacheDate(domain: Domain): Promise<string> {
    assertValidDomain(domain)
    return this.deps.cache.modifiedDate(domain)
  }

  async cacheModifiedAt(domain: Domain): Promise<Date> {
    assertValidDomain(domain)
    return this.deps.cache.modifiedAt(domain)
  }

  /** File that holds (or would hold) the cached record. */
  cachePath(domain: Domain): string {
    assertValidDomain(domain)
    return this.deps.cache.path(domain).filePath
  }

  fetchedDomains(): Domain[] {
    return this.deps.orchestrator.fetchedDomains()
  }

  sessionToken(): string | undefined {
    return this.deps.session.sessionToken()
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Log out. Later lookups are served from the cache only. Never throws, and
   * calling it again does nothing.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.deps.session.logout()
    this.deps.logger.debug("Whois client closed", { operation: "close" })
  }
}
