import { logLevelNames } from "@rfwhois/logger"
import { z } from "zod"

/** Prefix of the process environment variables read by `loadWhoisConfig`. */
export const ENV_PREFIX = "RFWHOIS_"

const ms = z.coerce.number().int().positive()

/**
 * Flat, string-valued configuration as found in the environment or a .env
 * file, keyed without the `RFWHOIS_` prefix.
 */
export const whoisEnvSchema = z.object({
  USERNAME: z.string().min(1),
  PASSWORD: z.string().min(1),
  CACHE_ROOT: z.string().min(1),
  REFRESH_CACHE: z.stringbool().default(false),

  AUTH_URL: z.url().optional(),
  WHOIS_URL: z.url().optional(),

  REQUEST_TIMEOUT_MS: ms.optional(),
  LOCK_TIMEOUT_MS: ms.optional(),
  LOCK_POLL_MS: ms.optional(),
  LOCK_TTL_MS: ms.optional(),

  CACHE_DATE_LOCALE: z.string().min(1).optional(),
  CACHE_DATE_TIME_ZONE: z.string().min(1).optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type WhoisEnv = z.output<typeof whoisEnvSchema>
export type WhoisEnvKey = keyof z.input<typeof whoisEnvSchema>
