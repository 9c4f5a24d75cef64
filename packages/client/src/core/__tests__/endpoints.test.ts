import { DEFAULT_ENDPOINTS, loginUrl, logoutUrl, whoisUrl } from "../endpoints"

const endpoints = { auth: "https://rf.test/auth/", whois: "https://rf.test/whois/" }

describe("endpoints", () => {
  it("points at the RegistryFusion XML API by default", () => {
    expect(DEFAULT_ENDPOINTS).toEqual({
      auth: "http://whois.RegistryFusion.com/rf/xml/1.0/auth/",
      whois: "http://whois.RegistryFusion.com/rf/xml/1.0/whois/",
    })
    expect(Object.isFrozen(DEFAULT_ENDPOINTS)).toBe(true)
  })

  it("builds the login URL", () => {
    const url = loginUrl(endpoints, { username: "alice", password: "test-secret" })

    expect(url.href).toBe("https://rf.test/auth/?username=alice&password=test-secret")
  })

  it("encodes credentials", () => {
    const url = loginUrl(endpoints, { username: "a b", password: "p&q=r" })

    expect(url.searchParams.get("username")).toBe("a b")
    expect(url.searchParams.get("password")).toBe("p&q=r")
  })

  it("builds the logout URL", () => {
    expect(logoutUrl(endpoints, "session-1").href).toBe(
      "https://rf.test/auth/?sessionkey=session-1",
    )
  })

  it("builds the whois URL", () => {
    expect(whoisUrl(endpoints, "session-1", "example.com").href).toBe(
      "https://rf.test/whois/?sessionkey=session-1&query=example.com",
    )
  })
})
