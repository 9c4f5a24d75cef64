/** The WHATWG fetch signature; Node's global `fetch` in production. */
export type FetchFn = typeof fetch
