import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import {
  claimLockFile,
  isProcessAlive,
  readLockFile,
  restoreLockFile,
} from "../lock-file"

describe("lock files", () => {
  let dir: string
  let lockPath: string
  let claimPath: string

  const record = (token: string) =>
    JSON.stringify({ token, pid: process.pid, expiresAtMs: 5_000 })

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "lock-file-"))
    lockPath = path.join(dir, "example.com.xml.lock")
    claimPath = `${lockPath}.claim`
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  describe("claimLockFile", () => {
    it("moves the lock file aside", async () => {
      await fs.writeFile(lockPath, record("first"))

      expect(await claimLockFile(lockPath, claimPath)).toBe(true)
      expect(await readLockFile(lockPath)).toBeNull()
      expect(await readLockFile(claimPath)).toMatchObject({ token: "first" })
    })

    it("lets only one of two claimants win", async () => {
      await fs.writeFile(lockPath, record("first"))

      const results = await Promise.all([
        claimLockFile(lockPath, `${lockPath}.a`),
        claimLockFile(lockPath, `${lockPath}.b`),
      ])

      expect(results.filter(Boolean)).toHaveLength(1)
    })

    it("is false when there is no lock file", async () => {
      expect(await claimLockFile(lockPath, claimPath)).toBe(false)
    })
  })

  describe("restoreLockFile", () => {
    it("puts the claimed record back", async () => {
      await fs.writeFile(claimPath, record("fresh"))

      await restoreLockFile(claimPath, lockPath)

      expect(await readLockFile(lockPath)).toMatchObject({ token: "fresh" })
      expect(await fs.readdir(dir)).toEqual(["example.com.xml.lock"])
    })

    it("keeps a lock file created in the meantime", async () => {
      await fs.writeFile(claimPath, record("fresh"))
      await fs.writeFile(lockPath, record("newer"))

      await restoreLockFile(claimPath, lockPath)

      expect(await readLockFile(lockPath)).toMatchObject({ token: "newer" })
      expect(await fs.readdir(dir)).toEqual(["example.com.xml.lock"])
    })
  })

  describe("isProcessAlive", () => {
    it("is true for this process", () => {
      expect(isProcessAlive(process.pid)).toBe(true)
    })

    it("is false for a pid no process can have", () => {
      expect(isProcessAlive(4_194_305)).toBe(false)
    })
  })
})
