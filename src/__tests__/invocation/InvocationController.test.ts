import { describe, expect, it, vi } from "vitest"

import { ContextStore } from "../../context/ContextStore.js"
import {
    BackendError,
    InvocationFailedError,
    TimeoutError,
    ValidationError,
} from "../../core/errors.js"
import { EventBus } from "../../events/EventBus.js"
import type { FailsafeEvent } from "../../events/types.js"
import { HealthEvaluator } from "../../health/HealthEvaluator.js"
import { InvocationController } from "../../invocation/InvocationController.js"
import type { InvocationControllerOptions } from "../../invocation/InvocationController.js"
import { MemoryStore } from "../../persistence/MemoryStore.js"
import type { RepeatedFailureAlert } from "../../types.js"
import {
    createFakePrimary,
    createFakeSecondary,
    createHangingPrimary,
    errorWithStatus,
    staticCheck,
} from "../helpers/fakeBackends.js"

function newContext() {
    return new ContextStore(new MemoryStore()).create({ task: "release" })
}

function unavailable(): BackendError {
    return new BackendError("fake-primary", "backend_unavailable", "offline")
}

function controllerWith(
    options: Partial<InvocationControllerOptions> &
        Pick<InvocationControllerOptions, "primary" | "secondary">
): InvocationController {
    return new InvocationController({ baseDelayMs: 0, ...options })
}

describe("InvocationController", () => {
    it("should return the primary result when it succeeds", async () => {
        const primary = createFakePrimary([{ answer: 42 }])
        const secondary = createFakeSecondary(["unused"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
            toolPermissions: ["read"],
        })

        const result = await controller.invoke("solver", newContext(), "solve it")

        expect(result).toEqual({ answer: 42 })
        expect(primary.call).toHaveBeenCalledWith(
            "solve it",
            expect.objectContaining({ task: "release" }),
            ["read"],
            expect.any(AbortSignal)
        )
        expect(secondary.call).not.toHaveBeenCalled()
        expect(controller.getLastRecord("solver")).toMatchObject({
            unit: "solver",
            backendAttempted: "primary",
            backendName: "fake-primary",
            failureKind: null,
            retriesUsed: 0,
            degraded: false,
        })
        expect(controller.getStatistics()).toMatchObject({
            totalInvocations: 1,
            primarySuccesses: 1,
            primarySuccessRate: 1,
            fallbackRate: 0,
        })
    })

    it("should degrade at once when credentials are missing", async () => {
        const primary = createFakePrimary([
            new BackendError("fake-primary", "credentials_absent", "no key"),
        ])
        const secondary = createFakeSecondary([
            'Done.\n```json\n{"summary": "ok"}\n```',
        ])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
        })
        const ctx = newContext()

        const result = await controller.invoke("writer", ctx, "write notes")

        expect(result).toEqual({ summary: "ok" })
        expect(primary.call).toHaveBeenCalledTimes(1)
        expect(secondary.call).toHaveBeenCalledTimes(1)
        expect(ctx.degradationLog).toEqual([
            {
                unit: "writer",
                failureKind: "credentials_absent",
                degradedTo: "fake-secondary",
                timestamp: expect.any(String),
            },
        ])
        expect(controller.getLastRecord("writer")).toMatchObject({
            backendAttempted: "secondary",
            backendName: "fake-secondary",
            failureKind: "credentials_absent",
            retriesUsed: 0,
            degraded: true,
        })
        expect(controller.getStatistics()).toMatchObject({
            totalInvocations: 1,
            primaryFailures: 1,
            degradedInvocations: 1,
            failureKindCounts: { credentials_absent: 1 },
            fallbackRate: 1,
        })
    })

    it("should retry transient failures and stay on the primary", async () => {
        const primary = createFakePrimary([
            new TimeoutError("call", 10),
            new TimeoutError("call", 10),
            new TimeoutError("call", 10),
            { done: true },
        ])
        const secondary = createFakeSecondary(["unused"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
            maxRetries: 3,
        })

        const result = await controller.invoke("builder", newContext(), "build")

        expect(result).toEqual({ done: true })
        expect(primary.call).toHaveBeenCalledTimes(4)
        expect(secondary.call).not.toHaveBeenCalled()
        expect(controller.getLastRecord("builder")).toMatchObject({
            backendAttempted: "primary",
            retriesUsed: 3,
            degraded: false,
        })
    })

    it("should degrade once retries are spent", async () => {
        const primary = createFakePrimary([errorWithStatus("overloaded", 503)])
        const secondary = createFakeSecondary(["plain answer"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
            maxRetries: 2,
        })

        const result = await controller.invoke("builder", newContext(), "build")

        expect(result).toEqual({ text: "plain answer" })
        expect(primary.call).toHaveBeenCalledTimes(3)
        expect(controller.getLastRecord("builder")).toMatchObject({
            failureKind: "backend_crash",
            retriesUsed: 2,
            degraded: true,
        })
    })

    it("should emit attempt, failure, degrade and complete in order", async () => {
        const bus = new EventBus()
        const events: FailsafeEvent[] = []
        bus.on((event) => events.push(event))
        const controller = controllerWith({
            primary: createFakePrimary([unavailable()]).backend,
            secondary: createFakeSecondary(["{}"]).backend,
            eventBus: bus,
        })

        await controller.invoke("writer", newContext(), "write")

        expect(events.map((event) => event.type)).toEqual([
            "invoke:attempt",
            "invoke:failure",
            "invoke:degrade",
            "invoke:attempt",
            "invoke:complete",
        ])
        expect(events[2]).toEqual({
            type: "invoke:degrade",
            unit: "writer",
            kind: "backend_unavailable",
            degradedTo: "fake-secondary",
        })
    })

    it("should alert on every multiple of the threshold", async () => {
        const alerts: RepeatedFailureAlert[] = []
        const controller = controllerWith({
            primary: createFakePrimary([unavailable()]).backend,
            secondary: createFakeSecondary(["{}"]).backend,
            alertThreshold: 3,
            onAlert: (alert) => alerts.push(alert),
        })
        const ctx = newContext()

        for (let i = 0; i < 7; i++) {
            await controller.invoke("flaky", ctx, "work")
        }

        expect(alerts.map((alert) => alert.degradeCount)).toEqual([3, 6])
        expect(alerts[0]).toEqual({
            unit: "flaky",
            degradeCount: 3,
            threshold: 3,
            lastFailureKind: "backend_unavailable",
            timestamp: expect.any(String),
        })
        expect(ctx.degradationLog).toHaveLength(7)
    })

    it("should keep alert counts per unit and restart them on reset", async () => {
        const onAlert = vi.fn()
        const controller = controllerWith({
            primary: createFakePrimary([unavailable()]).backend,
            secondary: createFakeSecondary(["{}"]).backend,
            alertThreshold: 2,
            onAlert,
        })
        const ctx = newContext()

        await controller.invoke("a", ctx, "work")
        await controller.invoke("b", ctx, "work")
        expect(onAlert).not.toHaveBeenCalled()

        controller.resetStatistics()
        await controller.invoke("a", ctx, "work")
        expect(onAlert).not.toHaveBeenCalled()
        await controller.invoke("a", ctx, "work")
        expect(onAlert).toHaveBeenCalledTimes(1)
    })

    it("should survive an alert callback that throws", async () => {
        const controller = controllerWith({
            primary: createFakePrimary([unavailable()]).backend,
            secondary: createFakeSecondary(['{"ok": true}']).backend,
            alertThreshold: 1,
            onAlert: () => {
                throw new Error("pager down")
            },
        })

        await expect(
            controller.invoke("a", newContext(), "work")
        ).resolves.toEqual({ ok: true })
    })

    it("should raise InvocationFailedError when both backends fail", async () => {
        const primary = createFakePrimary([unavailable()])
        const secondary = createFakeSecondary([new Error("cli exploded")])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
        })
        const ctx = newContext()

        const error = await controller
            .invoke("writer", ctx, "write")
            .catch((e: unknown) => e)

        expect(error).toBeInstanceOf(InvocationFailedError)
        expect(error).toMatchObject({
            unit: "writer",
            primaryFailure: "backend_unavailable",
            message:
                'Both backends failed for "writer" (primary: backend_unavailable; secondary: cli exploded)',
        })
        expect(ctx.degradationLog).toEqual([])
        expect(controller.getStatistics()).toMatchObject({
            totalInvocations: 1,
            primaryFailures: 1,
            degradedInvocations: 0,
            failureKindCounts: { backend_unavailable: 1, both_failed: 1 },
            unitFailureCounts: { writer: 1 },
        })
        expect(controller.getLastRecord("writer")).toMatchObject({
            backendAttempted: "secondary",
            failureKind: "both_failed",
            degraded: false,
        })
    })

    it("should reject an empty task without calling any backend", async () => {
        const primary = createFakePrimary([{}])
        const secondary = createFakeSecondary(["{}"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
        })

        await expect(
            controller.invoke("writer", newContext(), "   ")
        ).rejects.toBeInstanceOf(ValidationError)
        expect(primary.call).not.toHaveBeenCalled()
        expect(secondary.call).not.toHaveBeenCalled()
        expect(controller.getStatistics()).toMatchObject({
            totalInvocations: 1,
            primaryFailures: 0,
            failureKindCounts: { validation_failure: 1 },
        })
    })

    it("should surface a task the primary rejects as invalid", async () => {
        const primary = createFakePrimary([errorWithStatus("bad request", 400)])
        const secondary = createFakeSecondary(["{}"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
        })

        await expect(
            controller.invoke("writer", newContext(), "write")
        ).rejects.toThrow('Primary rejected the task for "writer": bad request')
        expect(primary.call).toHaveBeenCalledTimes(1)
        expect(secondary.call).not.toHaveBeenCalled()
    })

    it("should stop retrying once the caller aborts", async () => {
        const primary = createFakePrimary([new TimeoutError("call", 10)])
        const secondary = createFakeSecondary(["{}"])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
        })
        const abort = new AbortController()
        abort.abort()

        await expect(
            controller.invoke("writer", newContext(), "write", {
                signal: abort.signal,
            })
        ).rejects.toBeInstanceOf(TimeoutError)
        expect(primary.call).toHaveBeenCalledTimes(1)
        expect(secondary.call).not.toHaveBeenCalled()
    })

    it("should skip the primary when health says credentials are missing", async () => {
        const primary = createFakePrimary([{ never: true }])
        const secondary = createFakeSecondary(['{"via": "secondary"}'])
        const health = new HealthEvaluator({
            checks: [
                staticCheck("credentials", "primary", {
                    status: "critical",
                    message: "No credentials configured",
                }),
                staticCheck("storage", "shared", {
                    status: "healthy",
                    message: "ok",
                }),
            ],
        })
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
            health,
        })
        const ctx = newContext()

        const result = await controller.invoke("writer", ctx, "write")

        expect(result).toEqual({ via: "secondary" })
        expect(primary.call).not.toHaveBeenCalled()
        expect(ctx.degradationLog[0]?.failureKind).toBe("credentials_absent")
        expect(controller.getStatistics()).toMatchObject({
            totalInvocations: 1,
            primaryFailures: 0,
            degradedInvocations: 1,
        })
    })

    it("should degrade once the primary budget is spent", async () => {
        const primary = createHangingPrimary()
        const secondary = createFakeSecondary(['{"via": "secondary"}'])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: secondary.backend,
            primaryTimeoutMs: 50,
            maxRetries: 5,
        })

        const result = await controller.invoke("writer", newContext(), "write", {
            primaryBudgetMs: 120,
        })

        expect(result).toEqual({ via: "secondary" })
        expect(secondary.call).toHaveBeenCalledTimes(1)
        expect(primary.call.mock.calls.length).toBeLessThan(6)
        expect(controller.getLastRecord("writer")).toMatchObject({
            failureKind: "timeout",
            degraded: true,
        })
    })

    it("should call an unready primary backend unavailable", async () => {
        const primary = createFakePrimary([{ never: true }])
        const controller = controllerWith({
            primary: primary.backend,
            secondary: createFakeSecondary(["{}"]).backend,
            health: new HealthEvaluator({
                checks: [
                    staticCheck("primary_backend", "primary", {
                        status: "critical",
                        message: "unreachable",
                    }),
                ],
            }),
        })

        await controller.invoke("writer", newContext(), "write")

        expect(primary.call).not.toHaveBeenCalled()
        expect(controller.getLastRecord("writer")?.failureKind).toBe(
            "backend_unavailable"
        )
    })

    it("should count artifacts the fallback prompt had to summarize", async () => {
        const secondary = createFakeSecondary(["{}"])
        const controller = controllerWith({
            primary: createFakePrimary([unavailable()]).backend,
            secondary: secondary.backend,
        })
        const ctx = newContext()
        ctx.set("big", 7n)

        await controller.invoke("writer", ctx, "write")

        expect(
            controller.getStatistics().failureKindCounts
        ).toEqual({ backend_unavailable: 1, context_conversion_failure: 1 })
        expect(secondary.call.mock.calls[0]?.[0]).toContain(
            "## big (summary)\nbigint 7"
        )
    })

    it("should keep only the newest records", async () => {
        const controller = controllerWith({
            primary: createFakePrimary([{ ok: true }]).backend,
            secondary: createFakeSecondary(["{}"]).backend,
            maxRecords: 2,
        })
        const ctx = newContext()

        await controller.invoke("a", ctx, "work")
        await controller.invoke("b", ctx, "work")
        await controller.invoke("c", ctx, "work")

        expect(controller.getRecords().map((record) => record.unit)).toEqual([
            "b",
            "c",
        ])
    })
})
