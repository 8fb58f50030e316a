import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("sleep() waits roughly the requested time", async () => {
    const clock = new SystemClock()
    const start = Date.now()
    await clock.sleep(40)

    expect(Date.now() - start).toBeGreaterThanOrEqual(35)
  })

  it("sleep() resolves early when aborted mid-wait", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const start = Date.now()
    const pending = clock.sleep(5000, ac.signal)

    setTimeout(() => ac.abort(), 20)
    await pending

    expect(Date.now() - start).toBeLessThan(1000)
  })

  it("sleep() returns at once when the signal is already aborted", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    ac.abort()
    const start = Date.now()

    await clock.sleep(5000, ac.signal)

    expect(Date.now() - start).toBeLessThan(1000)
  })
})
