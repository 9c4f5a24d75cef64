import type { Logger } from "@rfwhois/logger"
import { mock } from "vitest-mock-extended"
import { RemoteFetchError } from "../../errors/whois-errors"
import { FakeRegistry, TEST_ENDPOINTS } from "../../tests/utils/fake-registry"
import type { Mock } from "../../tests/utils/mock"
import { RemoteWhoisFetcher } from "../remote-whois-fetcher"

describe("RemoteWhoisFetcher", () => {
  let registry: FakeRegistry
  let logger: Mock<Logger>
  let nowMs: number
  let fetcher: RemoteWhoisFetcher

  beforeEach(() => {
    registry = new FakeRegistry({
      sessionKey: "session-1",
      records: { "example.com": "<Whois>example</Whois>" },
    })
    logger = mock<Logger>()
    nowMs = 1_000

    fetcher = new RemoteWhoisFetcher(
      {
        fetch: registry.fetch,
        clock: { now: () => new Date(nowMs), nowMs: () => nowMs },
        logger,
      },
      { endpoints: TEST_ENDPOINTS, requestTimeoutMs: 1_000 },
    )
  })

  it("returns the raw body", async () => {
    await expect(fetcher.fetch("example.com", "session-1")).resolves.toBe(
      "<Whois>example</Whois>",
    )
    expect(registry.queries).toEqual(["example.com"])
  })

  it("logs the domain and the elapsed time", async () => {
    const slowFetch = vi.fn<typeof fetch>().mockImplementation(async () => {
      nowMs += 42
      return new Response("<Whois/>")
    })
    const timed = new RemoteWhoisFetcher(
      { fetch: slowFetch, clock: { now: () => new Date(nowMs), nowMs: () => nowMs }, logger },
      { endpoints: TEST_ENDPOINTS, requestTimeoutMs: 1_000 },
    )

    await timed.fetch("example.com", "session-1")

    expect(logger.info).toHaveBeenCalledWith("Fetched whois record", {
      domain: "example.com",
      durationMs: 42,
    })
  })

  it("fails on a non-2xx response", async () => {
    registry.whoisStatus = 503

    await expect(fetcher.fetch("example.com", "session-1")).rejects.toMatchObject({
      code: "remote_fetch_failed",
      context: { domain: "example.com", status: 503 },
    })
  })

  it("fails on an empty body", async () => {
    const emptyFetch = vi.fn<typeof fetch>().mockResolvedValue(new Response(""))
    const empty = new RemoteWhoisFetcher(
      { fetch: emptyFetch, clock: { now: () => new Date(0), nowMs: () => 0 }, logger },
      { endpoints: TEST_ENDPOINTS, requestTimeoutMs: 1_000 },
    )

    await expect(empty.fetch("example.com", "session-1")).rejects.toThrow(
      "Whois request for example.com returned no content",
    )
  })

  it("wraps transport errors", async () => {
    registry.networkError = new TypeError("fetch failed")

    const err = await fetcher.fetch("example.com", "session-1").catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RemoteFetchError)
    expect(err).toMatchObject({ isRetryable: true, cause: registry.networkError })
  })

  it("does not log failed fetches as successes", async () => {
    registry.whoisStatus = 500

    await fetcher.fetch("example.com", "session-1").catch(() => undefined)

    expect(logger.info).not.toHaveBeenCalled()
  })
})
