import { InvalidDomainError } from "../../errors/whois-errors"
import { assertValidDomain } from "../domain"

describe("assertValidDomain", () => {
  it("accepts ordinary domains", () => {
    expect(() => assertValidDomain("example.com")).not.toThrow()
    expect(() => assertValidDomain("xn--bcher-kva.example")).not.toThrow()
  })

  it("rejects an empty domain", () => {
    expect(() => assertValidDomain("")).toThrow(InvalidDomainError)
  })

  it.each(["../etc/passwd", "a\\b.com", "a\0.com"])("rejects %j", (domain) => {
    expect(() => assertValidDomain(domain)).toThrow(InvalidDomainError)
  })
})
