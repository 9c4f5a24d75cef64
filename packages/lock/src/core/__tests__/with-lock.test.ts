import { type MockProxy, mock } from "vitest-mock-extended"
import type { Lock } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { LockAcquisitionError } from "../lock-errors"
import { tryWithLock, withLock } from "../with-lock"

const key = "/cache/e/example.com.xml"
const ttl = { milliseconds: 5_000 }

describe("lock helpers", () => {
  let lock: MockProxy<Lock>
  let lease: MockProxy<LockLease>

  beforeEach(() => {
    lock = mock<Lock>()
    lease = mock<LockLease>()
    lease.release.mockResolvedValue(undefined)
  })

  describe("tryWithLock", () => {
    it("runs fn under the lease and releases it", async () => {
      lock.tryAcquire.mockResolvedValue(lease)

      await expect(tryWithLock(lock, key, async () => "payload", { ttl })).resolves.toBe(
        "payload",
      )

      expect(lock.tryAcquire).toHaveBeenCalledWith(key, { ttl })
      expect(lease.release).toHaveBeenCalledTimes(1)
    })

    it("returns null without running fn when the key is held", async () => {
      lock.tryAcquire.mockResolvedValue(null)
      const fn = vi.fn(async () => "payload")

      await expect(tryWithLock(lock, key, fn, { ttl })).resolves.toBeNull()
      expect(fn).not.toHaveBeenCalled()
    })

    it("releases when fn throws", async () => {
      lock.tryAcquire.mockResolvedValue(lease)
      const failure = new Error("disk full")

      await expect(
        tryWithLock(lock, key, () => Promise.reject(failure), { ttl }),
      ).rejects.toBe(failure)
      expect(lease.release).toHaveBeenCalledTimes(1)
    })
  })

  describe("withLock", () => {
    it("runs fn under the lease and releases it", async () => {
      lock.acquire.mockResolvedValue(lease)

      await expect(
        withLock(lock, key, async () => 42, { ttl, timeoutMs: 100 }),
      ).resolves.toBe(42)

      expect(lock.acquire).toHaveBeenCalledWith(key, { ttl, timeoutMs: 100 })
      expect(lease.release).toHaveBeenCalledTimes(1)
    })

    it("releases when fn throws", async () => {
      lock.acquire.mockResolvedValue(lease)
      const failure = new Error("disk full")

      await expect(withLock(lock, key, () => Promise.reject(failure), { ttl })).rejects.toBe(
        failure,
      )
      expect(lease.release).toHaveBeenCalledTimes(1)
    })

    it("throws a timeout error when no lease comes", async () => {
      lock.acquire.mockResolvedValue(null)
      const fn = vi.fn(async () => "payload")

      const err = await withLock(lock, key, fn, { ttl }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(LockAcquisitionError)
      expect(err).toMatchObject({ key, reason: "timeout" })
      expect(fn).not.toHaveBeenCalled()
    })

    it("reports an abort that happened while waiting", async () => {
      const controller = new AbortController()
      lock.acquire.mockImplementation(async () => {
        controller.abort()
        return null
      })

      await expect(
        withLock(lock, key, async () => "payload", { ttl, signal: controller.signal }),
      ).rejects.toMatchObject({ reason: "aborted" })
    })

    it("does not wait at all with an aborted signal", async () => {
      await expect(
        withLock(lock, key, async () => "payload", { ttl, signal: AbortSignal.abort() }),
      ).rejects.toMatchObject({ name: "LockAcquisitionError", reason: "aborted" })

      expect(lock.acquire).not.toHaveBeenCalled()
    })
  })
})
