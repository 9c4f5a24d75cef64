import { setTimeout } from "node:timers/promises"
import type { Milliseconds } from "../../ports/time"

export type Sleep = (ms: Milliseconds, signal?: AbortSignal) => Promise<void>

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export async function sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return

  try {
    await setTimeout(ms, undefined, signal ? { signal } : {})
  } catch (err) {
    if (signal?.aborted) return
    throw err
  }
}
