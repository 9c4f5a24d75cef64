import { type Clock, createFileLock, SystemClock } from "@rfwhois/lock"
import { createPinoLogger, type Logger } from "@rfwhois/logger"
import { FsCacheStore } from "../adapters/fs/fs-cache-store"
import { resolveWhoisClientOptions, type WhoisClientOptions } from "../config/options"
import type { CacheStore } from "../ports/cache-store"
import type { FetchFn } from "../ports/http"
import { LookupOrchestrator } from "./lookup-orchestrator"
import { RemoteWhoisFetcher } from "./remote-whois-fetcher"
import { SessionManager } from "./session-manager"
import { WhoisClient } from "./whois-client"

export type CreateWhoisClientDeps = {
  /** @default globalThis.fetch */
  fetch?: FetchFn
  /** @default a pino logger at "info" */
  logger?: Logger
  clock?: Clock
  /** Replaces the file-backed cache under `cacheRoot`. */
  cacheStore?: CacheStore
}

/**
 * Validate `options`, log in and return a ready client.
 *
 * @throws ConfigurationError when options are invalid; nothing is sent.
 * @throws AuthenticationError when login fails.
 */
export async function createWhoisClient(
  options: WhoisClientOptions,
  deps: CreateWhoisClientDeps = {},
): Promise<WhoisClient> {
  const config = resolveWhoisClientOptions(options)

  const fetchFn = deps.fetch ?? globalThis.fetch
  const clock = deps.clock ?? new SystemClock()
  const logger = (deps.logger ?? createPinoLogger({ service: "rfwhois" })).child({
    module: "whois-client",
  })

  const cache =
    deps.cacheStore ??
    new FsCacheStore(
      {
        lock: createFileLock({
          logger,
          clock,
          defaultTimeoutMs: config.lock.timeoutMs,
          pollMs: config.lock.pollMs,
        }),
        logger,
      },
      {
        cacheRoot: config.cacheRoot,
        lockTimeoutMs: config.lock.timeoutMs,
        lockTtlMs: config.lock.ttlMs,
        ...(config.cacheDate && { dateFormat: config.cacheDate }),
      },
    )

  const session = new SessionManager(
    { fetch: fetchFn, logger },
    {
      endpoints: config.endpoints,
      credentials: { username: config.username, password: config.password },
      requestTimeoutMs: config.requestTimeoutMs,
    },
  )

  const fetcher = new RemoteWhoisFetcher(
    { fetch: fetchFn, clock, logger },
    { endpoints: config.endpoints, requestTimeoutMs: config.requestTimeoutMs },
  )

  const orchestrator = new LookupOrchestrator(
    { session, fetcher, cache, logger },
    { refreshCache: config.refreshCache },
  )

  await session.login()

  return new WhoisClient(
    { session, orchestrator, cache, logger },
    { refreshCache: config.refreshCache },
  )
}

/**
 * Run `fn` with a logged-in client and log out afterwards, whether `fn`
 * returns or throws.
 *
 * @example
 * ```ts
 * const xml = await withWhoisClient(options, (client) => client.lookup("example.com"))
 * ```
 */
export async function withWhoisClient<T>(
  options: WhoisClientOptions,
  fn: (client: WhoisClient) => Promise<T> | T,
  deps: CreateWhoisClientDeps = {},
): Promise<T> {
  const client = await createWhoisClient(options, deps)

  try {
    return await fn(client)
  } finally {
    await client.close()
  }
}
