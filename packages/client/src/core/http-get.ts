import type { Milliseconds } from "@rfwhois/lock"
import type { FetchFn } from "../ports/http"

export type HttpTextResult =
  | { kind: "ok"; body: string }
  | { kind: "http_error"; status: number }

/**
 * GET `url` and read the body as text.
 *
 * Non-2xx responses come back as `http_error`; transport failures and the
 * timeout abort are thrown for the caller to wrap.
 */
export async function httpGetText(
  fetchFn: FetchFn,
  url: URL,
  timeoutMs: Milliseconds,
): Promise<HttpTextResult> {
  const response = await fetchFn(url, {
    method: "GET",
    signal: AbortSignal.timeout(timeoutMs),
  })

  if (!response.ok) {
    await response.body?.cancel()
    return { kind: "http_error", status: response.status }
  }

  return { kind: "ok", body: await response.text() }
}
