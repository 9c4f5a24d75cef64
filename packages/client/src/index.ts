export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export {
  FsCacheStore,
  type FsCacheStoreConfig,
  type FsCacheStoreDeps,
} from "./adapters/fs/fs-cache-store"
export { ENV_PREFIX, type WhoisEnv, type WhoisEnvKey, whoisEnvSchema } from "./config/env-schema"
export { type LoadWhoisConfigOptions, loadWhoisConfig, WhoisConfig } from "./config/load"
export {
  type ResolvedWhoisClientOptions,
  resolveWhoisClientOptions,
  type WhoisClientOptions,
  whoisClientOptionsSchema,
} from "./config/options"
export { cachePathFor } from "./core/cache-path"
export {
  type CreateWhoisClientDeps,
  createWhoisClient,
  withWhoisClient,
} from "./core/create-client"
export { assertValidDomain } from "./core/domain"
export { DEFAULT_ENDPOINTS } from "./core/endpoints"
export { LookupOrchestrator } from "./core/lookup-orchestrator"
export { RemoteWhoisFetcher } from "./core/remote-whois-fetcher"
export { parseSessionKey, SessionManager } from "./core/session-manager"
export { WhoisClient } from "./core/whois-client"
export { BaseError, type BaseErrorOptions, serializeError } from "./errors/base-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./errors/error"
export {
  AuthenticationError,
  CacheDeleteError,
  CacheReadError,
  CacheWriteError,
  ConfigurationError,
  InvalidDomainError,
  isWhoisError,
  RemoteFetchError,
  type WhoisError,
  type WhoisErrorCode,
} from "./errors/whois-errors"
export type { CachePath, CacheStore } from "./ports/cache-store"
export type { ConfigSource } from "./ports/config-source"
export type { Domain } from "./ports/domain"
export type { Credentials, WhoisEndpoints } from "./ports/endpoints"
export type { FetchFn } from "./ports/http"
export type { WhoisFetcher } from "./ports/whois-fetcher"
export type { WhoisSession } from "./ports/whois-session"
