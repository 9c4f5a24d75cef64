import { sleep } from "../sleep"

describe("sleep", () => {
  it("resolves after ms elapses", async () => {
    const start = Date.now()
    await sleep(30)

    expect(Date.now() - start).toBeGreaterThanOrEqual(25)
  })

  it("resolves immediately when the signal is already aborted", async () => {
    const ac = new AbortController()
    ac.abort()

    const start = Date.now()
    await sleep(5_000, ac.signal)

    expect(Date.now() - start).toBeLessThan(500)
  })

  it("resolves early without throwing when aborted mid-sleep", async () => {
    const ac = new AbortController()

    const start = Date.now()
    const p = sleep(5_000, ac.signal)

    setTimeout(() => ac.abort(), 20)

    await expect(p).resolves.toBeUndefined()
    expect(Date.now() - start).toBeLessThan(500)
  })
})
