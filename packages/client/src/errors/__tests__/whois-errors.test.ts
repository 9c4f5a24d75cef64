import { BaseError } from "../base-error"
import {
  AuthenticationError,
  CacheDeleteError,
  CacheReadError,
  CacheWriteError,
  ConfigurationError,
  InvalidDomainError,
  isWhoisError,
  RemoteFetchError,
} from "../whois-errors"

describe("whois errors", () => {
  it("gives each kind its code", () => {
    expect(AuthenticationError.missingSessionKey().code).toBe("authentication_failed")
    expect(RemoteFetchError.emptyResponse("example.com").code).toBe("remote_fetch_failed")
    expect(CacheReadError.missing("example.com", "/c/e/example.com.xml").code).toBe(
      "cache_read_failed",
    )
    expect(CacheWriteError.unwritable("example.com", "/p", new Error("x")).code).toBe(
      "cache_write_failed",
    )
    expect(CacheDeleteError.undeletable("example.com", "/p", new Error("x")).code).toBe(
      "cache_delete_failed",
    )
    expect(new ConfigurationError("bad").code).toBe("invalid_configuration")
    expect(new InvalidDomainError("", "must not be empty").code).toBe("invalid_domain")
  })

  it("marks remote fetch failures retryable", () => {
    expect(RemoteFetchError.badStatus("example.com", 503).isRetryable).toBe(true)
    expect(RemoteFetchError.requestFailed("example.com", new Error("x")).isRetryable).toBe(true)
  })

  it("does not retry rejected logins", () => {
    const err = AuthenticationError.rejected(403)

    expect(err.isRetryable).toBe(false)
    expect(err.message).toBe("Login rejected with HTTP status 403")
    expect(err.context).toEqual({ status: 403 })
  })

  it("treats configuration and domain errors as programmer errors", () => {
    expect(new ConfigurationError("bad").isOperational).toBe(false)
    expect(new InvalidDomainError("a/b", "bad").isOperational).toBe(false)
    expect(AuthenticationError.noSession("example.com").isOperational).toBe(false)
  })

  it("marks lock timeouts retryable", () => {
    const cause = new Error("timeout")

    expect(CacheReadError.locked("example.com", "/p", cause).isRetryable).toBe(true)
    expect(CacheWriteError.locked("example.com", "/p", cause).isRetryable).toBe(true)
    expect(CacheDeleteError.locked("example.com", "/p", cause).isRetryable).toBe(true)
  })

  it("records the cache path and reason", () => {
    const err = CacheReadError.missing("example.com", "/c/e/example.com.xml")

    expect(err.context).toEqual({
      domain: "example.com",
      path: "/c/e/example.com.xml",
      reason: "missing",
    })
    expect(err.message).toBe("No cache entry for example.com")
  })

  it("quotes the offending domain", () => {
    const err = new InvalidDomainError("a/b", "must not contain \"/\"")

    expect(err.message).toBe('Invalid domain "a/b": must not contain "/"')
  })

  describe("isWhoisError", () => {
    it("accepts every whois error", () => {
      expect(isWhoisError(AuthenticationError.missingSessionKey())).toBe(true)
      expect(isWhoisError(new ConfigurationError("bad"))).toBe(true)
    })

    it("rejects other errors", () => {
      expect(isWhoisError(new Error("x"))).toBe(false)
      expect(isWhoisError(new BaseError("x", { code: "other" }))).toBe(false)
      expect(isWhoisError("authentication_failed")).toBe(false)
      expect(isWhoisError(null)).toBe(false)
    })
  })
})
