import { InvalidDomainError } from "../errors/whois-errors"
import type { Domain } from "../ports/domain"

const forbidden = ["/", "\\", "\0"] as const

/**
 * Domains name files under the cache root, so anything that would address a
 * different directory is refused.
 */
export function assertValidDomain(domain: Domain): void {
  if (domain.length === 0) {
    throw new InvalidDomainError(domain, "must not be empty")
  }

  const found = forbidden.find((c) => domain.includes(c))

  if (found !== undefined) {
    throw new InvalidDomainError(domain, `must not contain ${JSON.stringify(found)}`)
  }
}
