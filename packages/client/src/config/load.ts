import type { LoggerOptions } from "@rfwhois/logger"
import { z } from "zod"
import { DotenvSource } from "../adapters/config/dotenv-source"
import { EnvSource } from "../adapters/config/env-source"
import { ObjectSource } from "../adapters/config/object-source"
import { ConfigurationError } from "../errors/whois-errors"
import type { ConfigSource } from "../ports/config-source"
import { ENV_PREFIX, type WhoisEnv, type WhoisEnvKey, whoisEnvSchema } from "./env-schema"
import {
  type ResolvedWhoisClientOptions,
  resolveWhoisClientOptions,
  type WhoisClientOptions,
} from "./options"

export type LoadWhoisConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** Directory the .env file is resolved against. @default process.cwd() */
  cwd?: string
  /** .env file to read, or false to skip it. @default ".env" */
  envFile?: string | false
  /** Applied last, keyed without the prefix. */
  overrides?: Partial<Record<WhoisEnvKey, string>>
}

export class WhoisConfig {
  constructor(
    readonly client: ResolvedWhoisClientOptions,
    readonly logging: LoggerOptions,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly unknown: readonly string[],
  ) {}

  /** Name of the source that supplied `key`, or "default". */
  explain(key: WhoisEnvKey): string {
    return this.provenance.get(key) ?? "default"
  }

  /** Sources that supplied at least one recognised value, in application order. */
  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  /** Prefixed variables that no setting reads; usually a typo. */
  unknownKeys(): string[] {
    return [...this.unknown]
  }
}

/**
 * Read client and logging configuration from, in order of precedence, a .env
 * file, `RFWHOIS_*` environment variables and explicit overrides.
 *
 * @example
 * ```ts
 * const config = await loadWhoisConfig()
 * const logger = createPinoLogger({ service: "whois" }, config.logging)
 * await withWhoisClient(config.client, (client) => client.lookup("example.com"), { logger })
 * ```
 *
 * @throws ConfigurationError when a required value is missing or malformed.
 */
export async function loadWhoisConfig(options: LoadWhoisConfigOptions = {}): Promise<WhoisConfig> {
  const envFile = options.envFile ?? ".env"

  const sources: ConfigSource[] = [
    ...(envFile === false
      ? []
      : [
          new DotenvSource({
            file: envFile,
            required: false,
            prefix: ENV_PREFIX,
            ...(options.cwd !== undefined && { cwd: options.cwd }),
          }),
        ]),
    new EnvSource({ prefix: ENV_PREFIX, ...(options.env && { env: options.env }) }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const merged: Record<string, string> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    let values: Record<string, string | undefined>
    try {
      values = await source.load()
    } catch (err) {
      throw new ConfigurationError(`Couldn't load configuration from ${source.name}`, {
        context: { source: source.name },
        cause: err,
      })
    }

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance.set(key, source.name)
      }
    }
  }

  const result = whoisEnvSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { fields: result.error.issues.map((issue) => issue.path.map(String).join(".")) } },
    )
  }

  const known = new Set(Object.keys(whoisEnvSchema.shape))
  const unknown = Object.keys(merged).filter((key) => !known.has(key))
  for (const key of unknown) provenance.delete(key)

  return new WhoisConfig(
    resolveWhoisClientOptions(toClientOptions(result.data)),
    { level: result.data.LOG_LEVEL, prettify: result.data.LOG_PRETTY },
    provenance,
    unknown,
  )
}

function toClientOptions(env: WhoisEnv) {
  return {
    username: env.USERNAME,
    password: env.PASSWORD,
    cacheRoot: env.CACHE_ROOT,
    refreshCache: env.REFRESH_CACHE,
    endpoints: { auth: env.AUTH_URL, whois: env.WHOIS_URL },
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    lock: {
      timeoutMs: env.LOCK_TIMEOUT_MS,
      pollMs: env.LOCK_POLL_MS,
      ttlMs: env.LOCK_TTL_MS,
    },
    cacheDate: {
      locale: env.CACHE_DATE_LOCALE,
      timeZone: env.CACHE_DATE_TIME_ZONE,
    },
  } satisfies WhoisClientOptions
}
