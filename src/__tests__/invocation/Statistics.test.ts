import { describe, expect, it } from "vitest"

import { StatisticsTracker } from "../../invocation/Statistics.js"

describe("StatisticsTracker", () => {
    it("should start empty with zero rates", () => {
        expect(new StatisticsTracker().snapshot()).toEqual({
            totalInvocations: 0,
            primarySuccesses: 0,
            primaryFailures: 0,
            degradedInvocations: 0,
            failureKindCounts: {},
            unitFailureCounts: {},
            fallbackRate: 0,
            primarySuccessRate: 0,
        })
    })

    it("should count successes, degrades and failures", () => {
        const stats = new StatisticsTracker()
        stats.recordPrimarySuccess()
        stats.recordDegraded("writer", "timeout", true)
        stats.recordDegraded("writer", "timeout", true)
        stats.recordFailure("reviewer", ["backend_crash", "both_failed"], true)

        expect(stats.snapshot()).toEqual({
            totalInvocations: 4,
            primarySuccesses: 1,
            primaryFailures: 3,
            degradedInvocations: 2,
            failureKindCounts: { timeout: 2, backend_crash: 1, both_failed: 1 },
            unitFailureCounts: { writer: 2, reviewer: 1 },
            fallbackRate: 0.5,
            primarySuccessRate: 0.25,
        })
    })

    it("should return the running degrade count per unit", () => {
        const stats = new StatisticsTracker()
        expect(stats.recordDegraded("a", "timeout", true)).toBe(1)
        expect(stats.recordDegraded("b", "timeout", true)).toBe(1)
        expect(stats.recordDegraded("a", "network_failure", true)).toBe(2)
    })

    it("should not count a primary failure when the primary was never reached", () => {
        const stats = new StatisticsTracker()
        stats.recordFailure("u", ["validation_failure"], false)
        expect(stats.getCounters().primaryFailures).toBe(0)
        expect(stats.getCounters().totalInvocations).toBe(1)
    })

    it("should not count a primary failure for a degrade the primary never saw", () => {
        const stats = new StatisticsTracker()
        stats.recordDegraded("u", "credentials_absent", false)

        expect(stats.getCounters()).toMatchObject({
            totalInvocations: 1,
            primaryFailures: 0,
            degradedInvocations: 1,
            failureKindCounts: { credentials_absent: 1 },
        })
    })

    it("should hand out copies", () => {
        const stats = new StatisticsTracker()
        stats.recordDegraded("a", "timeout", true)
        const counters = stats.getCounters()
        counters.unitFailureCounts.a = 99
        expect(stats.getCounters().unitFailureCounts.a).toBe(1)
    })

    it("should clear counters and degrade counts on reset", () => {
        const stats = new StatisticsTracker()
        stats.recordDegraded("a", "timeout", true)
        stats.recordKind("context_conversion_failure")
        stats.reset()

        expect(stats.getCounters().totalInvocations).toBe(0)
        expect(stats.getCounters().failureKindCounts).toEqual({})
        expect(stats.recordDegraded("a", "timeout", true)).toBe(1)
    })
})
