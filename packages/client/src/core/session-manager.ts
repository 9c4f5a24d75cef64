import type { Milliseconds } from "@rfwhois/lock"
import type { Logger } from "@rfwhois/logger"
import { AuthenticationError } from "../errors/whois-errors"
import type { Credentials, WhoisEndpoints } from "../ports/endpoints"
import type { FetchFn } from "../ports/http"
import type { WhoisSession } from "../ports/whois-session"
import { loginUrl, logoutUrl } from "./endpoints"
import { type HttpTextResult, httpGetText } from "./http-get"

const SESSION_KEY = /<SessionKey>(.*?)<\/SessionKey>/

export type SessionManagerDeps = {
  fetch: FetchFn
  logger: Logger
}

export type SessionManagerConfig = {
  endpoints: WhoisEndpoints
  credentials: Credentials
  requestTimeoutMs: Milliseconds
}

export function parseSessionKey(body: string): string | undefined {
  const token = SESSION_KEY.exec(body)?.[1]?.trim()

  return token ? token : undefined
}

export class SessionManager implements WhoisSession {
  private token: string | undefined

  constructor(
    private readonly deps: SessionManagerDeps,
    private readonly config: SessionManagerConfig,
  ) {}

  async login(): Promise<void> {
    if (this.token !== undefined) return

    const url = loginUrl(this.config.endpoints, this.config.credentials)

    let result: HttpTextResult
    try {
      result = await httpGetText(this.deps.fetch, url, this.config.requestTimeoutMs)
    } catch (err) {
      throw AuthenticationError.requestFailed(err)
    }

    if (result.kind === "http_error") {
      throw AuthenticationError.rejected(result.status)
    }

    const token = parseSessionKey(result.body)
    if (token === undefined) {
      throw AuthenticationError.missingSessionKey()
    }

    this.token = token
    this.deps.logger.info("Whois session opened", { operation: "login" })
  }

  async logout(): Promise<void> {
    const token = this.token
    if (token === undefined) return

    this.token = undefined

    const url = logoutUrl(this.config.endpoints, token)

    try {
      const result = await httpGetText(this.deps.fetch, url, this.config.requestTimeoutMs)

      if (result.kind === "http_error") {
        this.deps.logger.warn("Logout rejected by the whois service", {
          operation: "logout",
          status: result.status,
        })
        return
      }

      this.deps.logger.info("Whois session closed", { operation: "logout" })
    } catch (err) {
      this.deps.logger.warn("Logout failed", { operation: "logout", err })
    }
  }

  sessionToken(): string | undefined {
    return this.token
  }
}
