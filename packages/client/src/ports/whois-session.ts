export interface WhoisSession {
  /** Authenticate and hold a session token. No-op while a token is held. */
  login(): Promise<void>

  /** Invalidate the held token remotely. Never throws. */
  logout(): Promise<void>

  /** The held token; undefined before login and after logout. */
  sessionToken(): string | undefined
}
