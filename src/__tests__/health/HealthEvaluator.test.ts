import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { describe, expect, it, vi } from "vitest"

import { ConfigError } from "../../core/errors.js"
import { EventBus } from "../../events/EventBus.js"
import type { FailsafeEvent } from "../../events/types.js"
import {
    assessResources,
    createDefaultChecks,
    credentialsCheck,
    networkCheck,
    primaryBackendCheck,
    storageCheck,
} from "../../health/checks.js"
import { HealthEvaluator, worstStatus } from "../../health/HealthEvaluator.js"
import type { HealthCheck } from "../../health/HealthEvaluator.js"
import { createFakePrimary, staticCheck } from "../helpers/fakeBackends.js"

const HEALTHY = { status: "healthy", message: "ok" } as const

describe("HealthEvaluator", () => {
    it("should keep both backends ready on warnings", async () => {
        const evaluator = new HealthEvaluator({
            checks: [
                staticCheck("credentials", "primary", {
                    status: "warning",
                    message: "key expires soon",
                }),
                staticCheck("storage", "shared", HEALTHY),
            ],
        })

        const report = await evaluator.getHealthReport()

        expect(report.overall).toBe("warning")
        expect(report.readyForPrimary).toBe(true)
        expect(report.readyForSecondary).toBe(true)
        expect(Object.keys(report.checks)).toEqual(["credentials", "storage"])
    })

    it("should block only the primary on a critical primary check", async () => {
        const evaluator = new HealthEvaluator({
            checks: [
                staticCheck("primary_backend", "primary", {
                    status: "critical",
                    message: "down",
                }),
                staticCheck("storage", "shared", HEALTHY),
            ],
        })

        const report = await evaluator.getHealthReport()

        expect(report.overall).toBe("critical")
        expect(report.readyForPrimary).toBe(false)
        expect(report.readyForSecondary).toBe(true)
    })

    it("should block both backends on a critical shared check", async () => {
        const evaluator = new HealthEvaluator({
            checks: [
                staticCheck("credentials", "primary", HEALTHY),
                staticCheck("storage", "shared", {
                    status: "critical",
                    message: "read-only disk",
                }),
            ],
        })

        const report = await evaluator.getHealthReport()

        expect(report.readyForPrimary).toBe(false)
        expect(report.readyForSecondary).toBe(false)
    })

    it("should turn a throwing check into a critical result", async () => {
        const broken: HealthCheck = {
            name: "network",
            scope: "shared",
            run: () => Promise.reject(new Error("resolver crashed")),
        }
        const evaluator = new HealthEvaluator({ checks: [broken] })

        const report = await evaluator.getHealthReport()

        expect(report.checks.network).toEqual({
            status: "critical",
            message: "resolver crashed",
        })
    })

    it("should time out a hanging check", async () => {
        const hanging: HealthCheck = {
            name: "slow",
            scope: "primary",
            run: () => new Promise<never>(() => undefined),
        }
        const evaluator = new HealthEvaluator({
            checks: [hanging],
            checkTimeoutMs: 10,
        })

        const report = await evaluator.getHealthReport()

        expect(report.checks.slow).toEqual({
            status: "critical",
            message: 'Health check "slow" timed out after 10ms',
        })
    })

    it("should reuse a report until the cache expires", async () => {
        let now = 1_000
        const check = staticCheck("storage", "shared", HEALTHY)
        const evaluator = new HealthEvaluator({
            checks: [check],
            cacheTtlMs: 100,
            clock: () => now,
        })

        const first = await evaluator.getHealthReport()
        now += 99
        const second = await evaluator.getHealthReport()
        now += 1
        await evaluator.getHealthReport()

        expect(second).toBe(first)
        expect(first.generatedAt).toBe(new Date(1_000).toISOString())
        expect(check.run).toHaveBeenCalledTimes(2)
    })

    it("should bypass the cache when asked for a fresh report", async () => {
        const check = staticCheck("storage", "shared", HEALTHY)
        const evaluator = new HealthEvaluator({ checks: [check] })

        await evaluator.getHealthReport()
        await evaluator.getHealthReport({ fresh: true })
        evaluator.invalidate()
        await evaluator.getHealthReport()

        expect(check.run).toHaveBeenCalledTimes(3)
    })

    it("should share one evaluation between concurrent callers", async () => {
        const check = staticCheck("storage", "shared", HEALTHY)
        const evaluator = new HealthEvaluator({ checks: [check] })

        const [a, b] = await Promise.all([
            evaluator.getHealthReport(),
            evaluator.getHealthReport(),
        ])

        expect(a).toBe(b)
        expect(check.run).toHaveBeenCalledTimes(1)
    })

    it("should publish each report on the event bus", async () => {
        const bus = new EventBus()
        const handler = vi.fn((_event: FailsafeEvent) => undefined)
        bus.on(handler)
        const evaluator = new HealthEvaluator({
            checks: [staticCheck("storage", "shared", HEALTHY)],
            eventBus: bus,
        })

        const report = await evaluator.getHealthReport()

        expect(handler).toHaveBeenCalledWith({ type: "health:report", report })
    })

    it("should refuse duplicate check names", () => {
        expect(
            () =>
                new HealthEvaluator({
                    checks: [
                        staticCheck("storage", "shared", HEALTHY),
                        staticCheck("storage", "primary", HEALTHY),
                    ],
                })
        ).toThrow(ConfigError)
    })
})

describe("worstStatus", () => {
    it("should rank critical over warning over healthy", () => {
        expect(worstStatus([])).toBe("healthy")
        expect(worstStatus(["healthy", "warning"])).toBe("warning")
        expect(worstStatus(["warning", "critical", "healthy"])).toBe("critical")
    })
})

describe("health checks", () => {
    const signal = new AbortController().signal

    it("should grade resource samples against thresholds", () => {
        expect(assessResources({ freeMemoryRatio: 0.5, loadPerCpu: 0.25 })).toEqual({
            status: "healthy",
            message: "50.0% memory free, load 0.25/cpu",
        })
        expect(assessResources({ freeMemoryRatio: 0.05, loadPerCpu: 1 })).toEqual({
            status: "warning",
            message: "5.0% memory free, load 1.00/cpu",
        })
        expect(
            assessResources({ freeMemoryRatio: 0.5, loadPerCpu: 5 }).status
        ).toBe("critical")
    })

    it("should report missing credentials as critical", async () => {
        const { backend } = createFakePrimary([{}], { hasCredentials: false })
        expect(await credentialsCheck(backend).run(signal)).toEqual({
            status: "critical",
            message: "No credentials configured for fake-primary",
        })
    })

    it("should treat a backend without credentials or probe as healthy", async () => {
        const { backend } = createFakePrimary([{}])
        expect(await credentialsCheck(backend).run(signal)).toEqual({
            status: "healthy",
            message: "No credentials required",
        })
        expect(await primaryBackendCheck(backend).run(signal)).toEqual({
            status: "healthy",
            message: "fake-primary has no probe; assumed reachable",
        })
    })

    it("should skip the network check without a host", async () => {
        expect(await networkCheck(undefined).run(signal)).toEqual({
            status: "healthy",
            message: "No remote endpoint",
        })
    })

    it("should round-trip a probe file through storage", async () => {
        const dir = await mkdtemp(join(tmpdir(), "failsafe-health-"))
        try {
            expect(await storageCheck(dir).run(signal)).toEqual({
                status: "healthy",
                message: `${dir} writable`,
            })
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })

    it("should build the default battery in order", () => {
        const { backend } = createFakePrimary([{}])
        const checks = createDefaultChecks({
            primary: backend,
            storageDirectory: tmpdir(),
        })
        expect(checks.map((check) => [check.name, check.scope])).toEqual([
            ["primary_backend", "primary"],
            ["credentials", "primary"],
            ["storage", "shared"],
            ["resources", "shared"],
            ["network", "shared"],
        ])
    })
})
