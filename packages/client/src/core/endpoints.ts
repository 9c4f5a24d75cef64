import type { Credentials, WhoisEndpoints } from "../ports/endpoints"

export const DEFAULT_ENDPOINTS: WhoisEndpoints = Object.freeze({
  auth: "http://whois.RegistryFusion.com/rf/xml/1.0/auth/",
  whois: "http://whois.RegistryFusion.com/rf/xml/1.0/whois/",
})

export function loginUrl(endpoints: WhoisEndpoints, credentials: Credentials): URL {
  return withParams(endpoints.auth, {
    username: credentials.username,
    password: credentials.password,
  })
}

export function logoutUrl(endpoints: WhoisEndpoints, sessionToken: string): URL {
  return withParams(endpoints.auth, { sessionkey: sessionToken })
}

export function whoisUrl(
  endpoints: WhoisEndpoints,
  sessionToken: string,
  domain: string,
): URL {
  return withParams(endpoints.whois, { sessionkey: sessionToken, query: domain })
}

function withParams(base: string, params: Record<string, string>): URL {
  const url = new URL(base)

  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value)
  }

  return url
}
