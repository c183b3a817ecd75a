import { describe, expect, it } from "vitest"

import { TimeoutError } from "../core/errors.js"
import { exponentialDelay, sleep, withTimeout } from "../core/timing.js"

describe("sleep", () => {
    it("should end early when the signal aborts", async () => {
        const abort = new AbortController()
        const started = Date.now()
        const pending = sleep(10_000, abort.signal)
        abort.abort()

        await pending
        expect(Date.now() - started).toBeLessThan(1000)
    })

    it("should not wait at all on an aborted signal", async () => {
        const abort = new AbortController()
        abort.abort()
        const started = Date.now()

        await sleep(10_000, abort.signal)
        expect(Date.now() - started).toBeLessThan(1000)
    })
})

describe("exponentialDelay", () => {
    it("should double per attempt", () => {
        expect([0, 1, 2, 3].map((n) => exponentialDelay(100, n))).toEqual([
            100, 200, 400, 800,
        ])
    })
})

describe("withTimeout", () => {
    it("should reject with TimeoutError and abort the operation's signal", async () => {
        let seen: AbortSignal | undefined
        const pending = withTimeout(
            (signal) => {
                seen = signal
                return new Promise<never>(() => undefined)
            },
            10,
            "Slow call"
        )

        await expect(pending).rejects.toThrow("Slow call timed out after 10ms")
        await expect(pending).rejects.toBeInstanceOf(TimeoutError)
        expect(seen?.aborted).toBe(true)
    })

    it("should forward a parent abort and let the operation settle", async () => {
        const parent = new AbortController()
        const pending = withTimeout(
            (signal) =>
                new Promise<string>((resolve) => {
                    signal.addEventListener("abort", () => resolve("stopped"))
                }),
            0,
            "Call",
            parent.signal
        )
        parent.abort()

        expect(await pending).toBe("stopped")
    })
})
