import type { Logger } from "@rfwhois/logger"
import { AuthenticationError } from "../errors/whois-errors"
import type { CacheStore } from "../ports/cache-store"
import type { Domain } from "../ports/domain"
import type { WhoisFetcher } from "../ports/whois-fetcher"
import type { WhoisSession } from "../ports/whois-session"

export type LookupOrchestratorDeps = {
  session: WhoisSession
  fetcher: WhoisFetcher
  cache: CacheStore
  logger: Logger
}

export type LookupOrchestratorConfig = {
  refreshCache: boolean
}

/**
 * Decides per lookup whether to serve from the cache or fetch remotely.
 *
 * - refresh off, entry present: read the cache.
 * - refresh off, entry absent: fetch, then write the entry.
 * - refresh on: always fetch, then overwrite the entry.
 *
 * A failed fetch leaves the cache untouched.
 */
export class LookupOrchestrator {
  private readonly fetched: Domain[] = []

  constructor(
    private readonly deps: LookupOrchestratorDeps,
    private readonly config: LookupOrchestratorConfig,
  ) {}

  async lookup(domain: Domain): Promise<string> {
    if (!this.config.refreshCache && (await this.deps.cache.exists(domain))) {
      this.deps.logger.debug("Cache hit", { domain, operation: "lookup" })
      return this.deps.cache.read(domain)
    }

    return this.fetchAndCache(domain)
  }

  /** Domains fetched remotely by this instance, in order, duplicates kept. */
  fetchedDomains(): Domain[] {
    return [...this.fetched]
  }

  private async fetchAndCache(domain: Domain): Promise<string> {
    const token = this.deps.session.sessionToken()
    if (token === undefined) {
      throw AuthenticationError.noSession(domain)
    }

    const payload = await this.deps.fetcher.fetch(domain, token)
    this.fetched.push(domain)

    await this.deps.cache.write(domain, payload)

    return payload
  }
}
