import * as fs from "node:fs/promises"
import type { Milliseconds } from "../../ports/time"

/** Contents of a `<resource>.lock` file. */
export type LockFileRecord = {
  token: string
  pid: number
  expiresAtMs: Milliseconds
}

export function lockPathFor(resourcePath: string): string {
  return `${resourcePath}.lock`
}

/**
 * Publish `record` at `lockPath` only if no lock file exists there.
 *
 * The record is written to a private temp file first and then hard-linked into
 * place: `link` fails with EEXIST when another holder won, and readers never
 * see a partially written lock file.
 */
export async function createLockFile(
  lockPath: string,
  record: LockFileRecord,
): Promise<boolean> {
  const tmpPath = `${lockPath}.${record.token}.tmp`

  await fs.writeFile(tmpPath, JSON.stringify(record), { flag: "wx" })

  try {
    await fs.link(tmpPath, lockPath)
    return true
  } catch (err) {
    if (errorCode(err) === "EEXIST") return false
    throw err
  } finally {
    await unlinkIfPresent(tmpPath)
  }
}

/** Atomically replace the lock file contents. Caller must own the lock. */
export async function rewriteLockFile(
  lockPath: string,
  record: LockFileRecord,
): Promise<void> {
  const tmpPath = `${lockPath}.${record.token}.tmp`

  await fs.writeFile(tmpPath, JSON.stringify(record))
  await fs.rename(tmpPath, lockPath)
}

/**
 * @returns The current holder, `null` if there is no lock file, or `"corrupt"`
 *          when the file exists but does not hold a lock record.
 */
export async function readLockFile(
  lockPath: string,
): Promise<LockFileRecord | "corrupt" | null> {
  let raw: string

  try {
    raw = await fs.readFile(lockPath, "utf-8")
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null
    throw err
  }

  try {
    const parsed: unknown = JSON.parse(raw)
    return isLockFileRecord(parsed) ? parsed : "corrupt"
  } catch {
    return "corrupt"
  }
}

/**
 * Move the lock file at `lockPath` aside to `claimPath`. Only one contender can
 * move a given file, so the winner may inspect it without racing the others.
 *
 * @returns `false` when there was no lock file left to claim.
 */
export async function claimLockFile(lockPath: string, claimPath: string): Promise<boolean> {
  try {
    await fs.rename(lockPath, claimPath)
    return true
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false
    throw err
  }
}

/**
 * Put a claimed lock file back at `lockPath` unless a new one was created in
 * the meantime.
 */
export async function restoreLockFile(claimPath: string, lockPath: string): Promise<void> {
  try {
    await fs.link(claimPath, lockPath)
  } catch (err) {
    if (errorCode(err) !== "EEXIST") throw err
  } finally {
    await unlinkIfPresent(claimPath)
  }
}

/** Whether `pid` names a process on this host. EPERM means it exists under another user. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return errorCode(err) !== "ESRCH"
  }
}

export async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath)
  } catch (err) {
    if (errorCode(err) !== "ENOENT") throw err
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined
  return typeof err.code === "string" ? err.code : undefined
}

function isLockFileRecord(value: unknown): value is LockFileRecord {
  if (typeof value !== "object" || value === null) return false

  return (
    "token" in value &&
    typeof value.token === "string" &&
    "pid" in value &&
    typeof value.pid === "number" &&
    "expiresAtMs" in value &&
    typeof value.expiresAtMs === "number"
  )
}
