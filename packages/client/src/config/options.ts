import { z } from "zod"
import { DEFAULT_ENDPOINTS } from "../core/endpoints"
import { ConfigurationError } from "../errors/whois-errors"

const positiveMs = z.number().int().positive()

const timeZone = z
  .string()
  .min(1)
  .refine(isSupportedTimeZone, { message: "Unknown IANA time zone" })

export const whoisClientOptionsSchema = z.object({
  username: z.string().min(1, "username is required"),
  password: z.string().min(1, "password is required"),
  cacheRoot: z.string().min(1, "cacheRoot is required"),

  /** Fetch remotely on every lookup and overwrite the cache entry. */
  refreshCache: z.boolean().default(false),

  endpoints: z
    .object({
      auth: z.url().default(DEFAULT_ENDPOINTS.auth),
      whois: z.url().default(DEFAULT_ENDPOINTS.whois),
    })
    .prefault({}),

  requestTimeoutMs: positiveMs.default(30_000),

  lock: z
    .object({
      timeoutMs: positiveMs.default(10_000),
      pollMs: positiveMs.default(25),
      ttlMs: positiveMs.default(30_000),
    })
    .prefault({}),

  /** Formatting of `cacheDate()`. Defaults to the process locale and zone. */
  cacheDate: z
    .object({
      locale: z.string().min(1).optional(),
      timeZone: timeZone.optional(),
    })
    .optional(),
})

/** Options accepted by `createWhoisClient`. */
export type WhoisClientOptions = z.input<typeof whoisClientOptionsSchema>

/** Options with every default applied. */
export type ResolvedWhoisClientOptions = z.output<typeof whoisClientOptionsSchema>

/**
 * Validate client options and apply defaults.
 *
 * @throws ConfigurationError listing every invalid field. Values are never
 * echoed, so a bad password does not end up in the message.
 */
export function resolveWhoisClientOptions(input: unknown): ResolvedWhoisClientOptions {
  const result = whoisClientOptionsSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid whois client options:\n${z.prettifyError(result.error)}`,
      { context: { fields: result.error.issues.map((issue) => issue.path.map(String).join(".")) } },
    )
  }

  return result.data
}

function isSupportedTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value })
    return true
  } catch (err) {
    if (err instanceof RangeError) return false
    throw err
  }
}
