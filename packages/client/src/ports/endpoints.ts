/** Base URLs of the remote whois service. Query parameters are appended per call. */
export type WhoisEndpoints = Readonly<{
  /** Login (`username`, `password`) and logout (`sessionkey`). */
  auth: string
  /** Record lookup (`sessionkey`, `query`). */
  whois: string
}>

export type Credentials = Readonly<{
  username: string
  password: string
}>
