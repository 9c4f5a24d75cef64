import type { Clock, Milliseconds } from "@rfwhois/lock"
import type { Logger } from "@rfwhois/logger"
import { RemoteFetchError } from "../errors/whois-errors"
import type { Domain } from "../ports/domain"
import type { WhoisEndpoints } from "../ports/endpoints"
import type { FetchFn } from "../ports/http"
import type { WhoisFetcher } from "../ports/whois-fetcher"
import { whoisUrl } from "./endpoints"
import { type HttpTextResult, httpGetText } from "./http-get"

export type RemoteWhoisFetcherDeps = {
  fetch: FetchFn
  clock: Clock
  logger: Logger
}

export type RemoteWhoisFetcherConfig = {
  endpoints: WhoisEndpoints
  requestTimeoutMs: Milliseconds
}

export class RemoteWhoisFetcher implements WhoisFetcher {
  constructor(
    private readonly deps: RemoteWhoisFetcherDeps,
    private readonly config: RemoteWhoisFetcherConfig,
  ) {}

  async fetch(domain: Domain, sessionToken: string): Promise<string> {
    const url = whoisUrl(this.config.endpoints, sessionToken, domain)
    const startedAt = this.deps.clock.nowMs()

    let result: HttpTextResult
    try {
      result = await httpGetText(this.deps.fetch, url, this.config.requestTimeoutMs)
    } catch (err) {
      throw RemoteFetchError.requestFailed(domain, err)
    }

    if (result.kind === "http_error") {
      throw RemoteFetchError.badStatus(domain, result.status)
    }

    if (result.body.length === 0) {
      throw RemoteFetchError.emptyResponse(domain)
    }

    this.deps.logger.info("Fetched whois record", {
      domain,
      durationMs: this.deps.clock.nowMs() - startedAt,
    })

    return result.body
  }
}
