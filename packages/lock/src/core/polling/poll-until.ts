import type { Milliseconds } from "../../ports/time"
import type { Clock } from "../time/clock"
import { assertPositiveTimeMs, assertValidTimeMs } from "../validation/validation"
import type { Sleep } from "./sleep"

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilTimeoutFailure = { ok: false; reason: "timeout" }
export type PollUntilAbortFailure = { ok: false; reason: "aborted" }
export type PollUntilFailure = PollUntilTimeoutFailure | PollUntilAbortFailure
export type PollUntilResult<T> = PollUntilSuccess<T> | PollUntilFailure

export type PollOptions = {
  pollMs: Milliseconds
  timeoutMs: Milliseconds
  signal?: AbortSignal
}

export type PollDeps = {
  clock: Clock
  sleep: Sleep
}

/**
 * Repeats `fn` every `pollMs` until it yields a non-null value, the deadline
 * passes or the signal aborts. The first attempt runs without delay.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  assertValidTimeMs(opts.timeoutMs, "timeoutMs")
  assertPositiveTimeMs(opts.pollMs, "pollMs")

  const deadline = deps.clock.nowMs() + opts.timeoutMs

  while (true) {
    if (opts.signal?.aborted) return { ok: false, reason: "aborted" }
    if (deps.clock.nowMs() >= deadline) return { ok: false, reason: "timeout" }

    const result = await fn()

    if (result !== null) return { ok: true, value: result }

    await deps.sleep(opts.pollMs, opts.signal)
  }
}

export type PollUntilFn = typeof pollUntil
