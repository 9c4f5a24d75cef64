import type { Domain } from "./domain"

export interface WhoisFetcher {
  /**
   * Retrieve the raw whois record for `domain`.
   *
   * @throws RemoteFetchError when the request fails or returns no content.
   */
  fetch(domain: Domain, sessionToken: string): Promise<string>
}
