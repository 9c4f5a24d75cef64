import { BaseError, type BaseErrorOptions } from "./base-error"
import type { ErrorCode } from "./error"

type SubclassOptions<C extends ErrorCode> = Omit<BaseErrorOptions<C>, "code">

export class AuthenticationError extends BaseError<"authentication_failed"> {
  constructor(message: string, options: SubclassOptions<"authentication_failed"> = {}) {
    super(message, { ...options, code: "authentication_failed" })
  }

  static requestFailed(cause: unknown): AuthenticationError {
    return new AuthenticationError("Login request to the whois service failed", {
      cause,
      isRetryable: true,
    })
  }

  static rejected(status: number): AuthenticationError {
    return new AuthenticationError(`Login rejected with HTTP status ${status}`, {
      context: { status },
    })
  }

  static missingSessionKey(): AuthenticationError {
    return new AuthenticationError("Couldn't open session: no SessionKey in login response")
  }

  static noSession(domain: string): AuthenticationError {
    return new AuthenticationError("No open session; the client has been closed", {
      context: { domain },
      isOperational: false,
    })
  }
}

export class RemoteFetchError extends BaseError<"remote_fetch_failed"> {
  constructor(message: string, options: SubclassOptions<"remote_fetch_failed"> = {}) {
    super(message, { isRetryable: true, ...options, code: "remote_fetch_failed" })
  }

  static requestFailed(domain: string, cause: unknown): RemoteFetchError {
    return new RemoteFetchError(`Whois request for ${domain} failed`, {
      context: { domain },
      cause,
    })
  }

  static badStatus(domain: string, status: number): RemoteFetchError {
    return new RemoteFetchError(`Whois request for ${domain} returned HTTP ${status}`, {
      context: { domain, status },
    })
  }

  static emptyResponse(domain: string): RemoteFetchError {
    return new RemoteFetchError(`Whois request for ${domain} returned no content`, {
      context: { domain },
    })
  }
}

export class CacheReadError extends BaseError<"cache_read_failed"> {
  constructor(message: string, options: SubclassOptions<"cache_read_failed"> = {}) {
    super(message, { ...options, code: "cache_read_failed" })
  }

  static missing(domain: string, path: string): CacheReadError {
    return new CacheReadError(`No cache entry for ${domain}`, {
      context: { domain, path, reason: "missing" },
    })
  }

  static unreadable(domain: string, path: string, cause: unknown): CacheReadError {
    return new CacheReadError(`Cache entry for ${domain} could not be read`, {
      context: { domain, path, reason: "unreadable" },
      cause,
    })
  }

  static locked(domain: string, path: string, cause: unknown): CacheReadError {
    return new CacheReadError(`Timed out waiting for the lock on ${path}`, {
      context: { domain, path, reason: "locked" },
      cause,
      isRetryable: true,
    })
  }
}

export class CacheWriteError extends BaseError<"cache_write_failed"> {
  constructor(message: string, options: SubclassOptions<"cache_write_failed"> = {}) {
    super(message, { ...options, code: "cache_write_failed" })
  }

  static unwritable(domain: string, path: string, cause: unknown): CacheWriteError {
    return new CacheWriteError(`Cache entry for ${domain} could not be written`, {
      context: { domain, path, reason: "unwritable" },
      cause,
    })
  }

  static locked(domain: string, path: string, cause: unknown): CacheWriteError {
    return new CacheWriteError(`Timed out waiting for the lock on ${path}`, {
      context: { domain, path, reason: "locked" },
      cause,
      isRetryable: true,
    })
  }
}

export class CacheDeleteError extends BaseError<"cache_delete_failed"> {
  constructor(message: string, options: SubclassOptions<"cache_delete_failed"> = {}) {
    super(message, { ...options, code: "cache_delete_failed" })
  }

  static undeletable(domain: string, path: string, cause: unknown): CacheDeleteError {
    return new CacheDeleteError(`Failed to unlink ${path}`, {
      context: { domain, path, reason: "undeletable" },
      cause,
    })
  }

  static locked(domain: string, path: string, cause: unknown): CacheDeleteError {
    return new CacheDeleteError(`Timed out waiting for the lock on ${path}`, {
      context: { domain, path, reason: "locked" },
      cause,
      isRetryable: true,
    })
  }
}

export class ConfigurationError extends BaseError<"invalid_configuration"> {
  constructor(message: string, options: SubclassOptions<"invalid_configuration"> = {}) {
    super(message, { isOperational: false, ...options, code: "invalid_configuration" })
  }
}

export class InvalidDomainError extends BaseError<"invalid_domain"> {
  constructor(domain: string, reason: string) {
    super(`Invalid domain ${JSON.stringify(domain)}: ${reason}`, {
      code: "invalid_domain",
      context: { domain, reason },
      isOperational: false,
    })
  }
}

export type WhoisError =
  | AuthenticationError
  | RemoteFetchError
  | CacheReadError
  | CacheWriteError
  | CacheDeleteError
  | ConfigurationError
  | InvalidDomainError

export type WhoisErrorCode = WhoisError["code"]

const whoisErrorCodes: ReadonlySet<string> = new Set<WhoisErrorCode>([
  "authentication_failed",
  "remote_fetch_failed",
  "cache_read_failed",
  "cache_write_failed",
  "cache_delete_failed",
  "invalid_configuration",
  "invalid_domain",
])

/**
 * Type guard for errors raised by this client.
 *
 * @example
 * ```ts
 * try {
 *   await client.lookup("example.com")
 * } catch (err) {
 *   if (isWhoisError(err) && err.isRetryable) scheduleRetry()
 * }
 * ```
 */
export function isWhoisError(value: unknown): value is WhoisError {
  return value instanceof BaseError && whoisErrorCodes.has(value.code)
}
