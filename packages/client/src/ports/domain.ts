/** A domain name as supplied by the caller. Case is preserved. */
export type Domain = string
