import type { PrimaryBackend, SecondaryBackend, StructuredResult } from "../backends/types.js"
import type { SharedContext } from "../context/SharedContext.js"
import {
    ConfigError,
    errorMessage,
    InvocationFailedError,
    toError,
    ValidationError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { sleep, withTimeout } from "../core/timing.js"
import type { EventBus } from "../events/EventBus.js"
import type { HealthEvaluator } from "../health/HealthEvaluator.js"
import type {
    BackendRole,
    FailureKind,
    InvocationRecord,
    RepeatedFailureAlert,
    StatisticsSnapshot,
} from "../types.js"
import { convertContext } from "./ContextConverter.js"
import { decide } from "./DecisionTable.js"
import { classifyFailure } from "./FailureClassifier.js"
import { extractStructured } from "./OutputExtractor.js"
import { StatisticsTracker } from "./Statistics.js"

export interface InvocationControllerOptions {
    primary: PrimaryBackend
    secondary: SecondaryBackend
    /** Without an evaluator the primary is always considered ready. */
    health?: HealthEvaluator
    eventBus?: EventBus
    maxRetries?: number
    baseDelayMs?: number
    /** Per-attempt deadline for the primary; 0 disables it. */
    primaryTimeoutMs?: number
    secondaryTimeoutMs?: number
    alertThreshold?: number
    toolPermissions?: string[]
    onAlert?: (alert: RepeatedFailureAlert) => void
    /** Oldest records are dropped beyond this many. */
    maxRecords?: number
}

export interface InvokeOptions {
    signal?: AbortSignal
    /**
     * Time the primary may use across all its attempts, backoff included.
     * Once it is spent the call degrades; the secondary keeps its own timeout.
     */
    primaryBudgetMs?: number
}

type Attempt =
    | { ok: true; value: StructuredResult }
    | { ok: false; kind: FailureKind; error: Error }

const DEFAULT_MAX_RETRIES = 3
const DEFAULT_BASE_DELAY_MS = 1000
const DEFAULT_PRIMARY_TIMEOUT_MS = 120_000
const DEFAULT_SECONDARY_TIMEOUT_MS = 300_000
const DEFAULT_ALERT_THRESHOLD = 3
const DEFAULT_MAX_RECORDS = 1000

/**
 * Calls the primary backend for a unit and falls back to the secondary
 * when the failure taxonomy says so. Backend-level failures never reach
 * the caller unless both backends fail or the task itself is invalid.
 */
export class InvocationController {
    private readonly primary: PrimaryBackend
    private readonly secondary: SecondaryBackend
    private readonly health?: HealthEvaluator
    private readonly eventBus?: EventBus
    private readonly maxRetries: number
    private readonly baseDelayMs: number
    private readonly primaryTimeoutMs: number
    private readonly secondaryTimeoutMs: number
    private readonly alertThreshold: number
    private readonly toolPermissions: string[]
    private readonly onAlert?: (alert: RepeatedFailureAlert) => void
    private readonly maxRecords: number
    private readonly stats = new StatisticsTracker()
    private records: InvocationRecord[] = []

    constructor(options: InvocationControllerOptions) {
        this.primary = options.primary
        this.secondary = options.secondary
        this.health = options.health
        this.eventBus = options.eventBus
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
        this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
        this.primaryTimeoutMs =
            options.primaryTimeoutMs ?? DEFAULT_PRIMARY_TIMEOUT_MS
        this.secondaryTimeoutMs =
            options.secondaryTimeoutMs ?? DEFAULT_SECONDARY_TIMEOUT_MS
        this.alertThreshold = options.alertThreshold ?? DEFAULT_ALERT_THRESHOLD
        if (!Number.isInteger(this.alertThreshold) || this.alertThreshold < 1) {
            throw new ConfigError("alertThreshold must be a positive integer")
        }
        this.toolPermissions = [...(options.toolPermissions ?? [])]
        this.onAlert = options.onAlert
        this.maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS
    }

    public async invoke(
        unitName: string,
        ctx: SharedContext,
        task: string,
        options: InvokeOptions = {}
    ): Promise<StructuredResult> {
        const startedAt = new Date()
        const record = (
            backend: BackendRole,
            failureKind: FailureKind | null,
            retriesUsed: number,
            degraded: boolean
        ): void =>
            this.addRecord({
                unit: unitName,
                backendAttempted: backend,
                backendName:
                    backend === "primary" ? this.primary.name : this.secondary.name,
                failureKind,
                retriesUsed,
                degraded,
                durationMs: Date.now() - startedAt.getTime(),
                startedAt: startedAt.toISOString(),
            })

        if (!unitName.trim() || !task.trim()) {
            const error = new ValidationError(
                unitName.trim()
                    ? `Task for "${unitName}" must be a non-empty string`
                    : "Unit name must be a non-empty string"
            )
            this.stats.recordFailure(unitName, ["validation_failure"], false)
            record("primary", "validation_failure", 0, false)
            throw error
        }

        let kind = await this.primaryBlocker()
        let retries = 0
        const primaryAttempted = kind === null
        const budgetEndsAt =
            options.primaryBudgetMs !== undefined && options.primaryBudgetMs > 0
                ? startedAt.getTime() + options.primaryBudgetMs
                : Number.POSITIVE_INFINITY
        const giveUp = (failure: FailureKind, error: Error, attempt: number): never => {
            this.stats.recordFailure(unitName, [failure], true)
            record("primary", failure, attempt, false)
            throw error
        }

        if (kind !== null) {
            log.invoke("Primary not ready for %s (%s); degrading", unitName, kind)
        } else {
            for (let attempt = 0; ; attempt++) {
                const remaining = budgetEndsAt - Date.now()
                if (remaining <= 0) {
                    kind = "timeout"
                    log.invoke("Primary budget for %s spent; degrading", unitName)
                    break
                }
                this.eventBus?.emit({
                    type: "invoke:attempt",
                    unit: unitName,
                    backend: "primary",
                    attempt,
                })
                const outcome = await this.attemptPrimary(
                    ctx,
                    task,
                    this.attemptTimeout(remaining),
                    options.signal
                )
                if (outcome.ok) {
                    this.stats.recordPrimarySuccess()
                    record("primary", null, attempt, false)
                    this.emitComplete(unitName, false, startedAt)
                    return outcome.value
                }

                kind = outcome.kind
                log.invoke(
                    "Primary failed for %s (attempt %d, %s): %s",
                    unitName,
                    attempt + 1,
                    kind,
                    outcome.error.message
                )
                this.eventBus?.emit({
                    type: "invoke:failure",
                    unit: unitName,
                    backend: "primary",
                    kind,
                    message: outcome.error.message,
                })

                const decision = decide(
                    kind,
                    attempt,
                    this.maxRetries,
                    this.baseDelayMs
                )
                if (decision.action === "surface") {
                    this.stats.recordFailure(unitName, [kind], true)
                    record("primary", kind, attempt, false)
                    throw new ValidationError(
                        `Primary rejected the task for "${unitName}": ${outcome.error.message}`,
                        outcome.error
                    )
                }
                if (decision.action === "degrade") break
                if (options.signal?.aborted) giveUp(kind, outcome.error, attempt)
                if (Date.now() + decision.delayMs >= budgetEndsAt) {
                    log.invoke(
                        "No primary budget left for another attempt on %s; degrading",
                        unitName
                    )
                    break
                }

                const blocker = await this.primaryBlocker()
                if (blocker !== null) {
                    log.invoke(
                        "Primary became unready for %s (%s); not retrying",
                        unitName,
                        blocker
                    )
                    break
                }
                retries = attempt + 1
                await sleep(decision.delayMs, options.signal)
                if (options.signal?.aborted) giveUp(kind, outcome.error, attempt)
            }
        }

        const primaryFailure: FailureKind = kind ?? "backend_crash"
        let result: StructuredResult
        try {
            result = await this.degrade(
                unitName,
                ctx,
                task,
                primaryFailure,
                options.signal
            )
        } catch (error) {
            const secondaryError = toError(error)
            log.invoke(
                "Secondary %s also failed for %s: %s",
                this.secondary.name,
                unitName,
                secondaryError.message
            )
            this.eventBus?.emit({
                type: "invoke:failure",
                unit: unitName,
                backend: "secondary",
                kind: classifyFailure(secondaryError),
                message: secondaryError.message,
            })
            this.stats.recordFailure(
                unitName,
                [primaryFailure, "both_failed"],
                primaryAttempted
            )
            record("secondary", "both_failed", retries, false)
            throw new InvocationFailedError(
                unitName,
                primaryFailure,
                secondaryError
            )
        }

        record("secondary", primaryFailure, retries, true)
        this.afterDegrade(unitName, ctx, primaryFailure, primaryAttempted)
        this.emitComplete(unitName, true, startedAt)
        return result
    }

    public getStatistics(): StatisticsSnapshot {
        return this.stats.snapshot()
    }

    public resetStatistics(): void {
        this.stats.reset()
        log.invoke("Statistics reset")
    }

    public getRecords(): readonly InvocationRecord[] {
        return [...this.records]
    }

    public getLastRecord(unit: string): InvocationRecord | undefined {
        for (let i = this.records.length - 1; i >= 0; i--) {
            const candidate = this.records[i]
            if (candidate?.unit === unit) return candidate
        }
        return undefined
    }

    /** Why the primary should not be tried, or null when it may be. */
    private async primaryBlocker(): Promise<FailureKind | null> {
        if (!this.health) return null
        const report = await this.health.getHealthReport()
        if (report.readyForPrimary) return null
        return report.checks.credentials?.status === "critical"
            ? "credentials_absent"
            : "backend_unavailable"
    }

    /** The per-attempt deadline, cut down to what is left of the budget. */
    private attemptTimeout(remaining: number): number {
        if (remaining === Number.POSITIVE_INFINITY) return this.primaryTimeoutMs
        if (this.primaryTimeoutMs <= 0) return remaining
        return Math.min(this.primaryTimeoutMs, remaining)
    }

    private async attemptPrimary(
        ctx: SharedContext,
        task: string,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<Attempt> {
        try {
            const value = await withTimeout(
                (attemptSignal) =>
                    this.primary.call(
                        task,
                        ctx.snapshot(),
                        [...this.toolPermissions],
                        attemptSignal
                    ),
                timeoutMs,
                `Primary backend ${this.primary.name}`,
                signal
            )
            return { ok: true, value }
        } catch (error) {
            return { ok: false, kind: classifyFailure(error), error: toError(error) }
        }
    }

    private async degrade(
        unitName: string,
        ctx: SharedContext,
        task: string,
        kind: FailureKind,
        signal?: AbortSignal
    ): Promise<StructuredResult> {
        this.eventBus?.emit({
            type: "invoke:degrade",
            unit: unitName,
            kind,
            degradedTo: this.secondary.name,
        })

        const conversion = convertContext(ctx.snapshot(), unitName, task)
        if (conversion.unconvertible.length > 0) {
            this.stats.recordKind("context_conversion_failure")
            log.invoke(
                "Summarized unserializable artifacts for %s: %s",
                unitName,
                conversion.unconvertible.join(", ")
            )
        }

        this.eventBus?.emit({
            type: "invoke:attempt",
            unit: unitName,
            backend: "secondary",
            attempt: 0,
        })
        const text = await withTimeout(
            (attemptSignal) => this.secondary.call(conversion.prompt, attemptSignal),
            this.secondaryTimeoutMs,
            `Secondary backend ${this.secondary.name}`,
            signal
        )
        return extractStructured(text)
    }

    private afterDegrade(
        unitName: string,
        ctx: SharedContext,
        kind: FailureKind,
        primaryAttempted: boolean
    ): void {
        try {
            ctx.appendDegradation({
                unit: unitName,
                failureKind: kind,
                degradedTo: this.secondary.name,
            })
        } catch (error) {
            log.invoke(
                "Could not log degradation of %s: %s",
                unitName,
                errorMessage(error)
            )
        }

        const count = this.stats.recordDegraded(unitName, kind, primaryAttempted)
        if (count % this.alertThreshold === 0) {
            this.raiseAlert({
                unit: unitName,
                degradeCount: count,
                threshold: this.alertThreshold,
                lastFailureKind: kind,
                timestamp: new Date().toISOString(),
            })
        }
    }

    private raiseAlert(alert: RepeatedFailureAlert): void {
        log.alert(
            "%s has degraded %d times (threshold %d, last: %s)",
            alert.unit,
            alert.degradeCount,
            alert.threshold,
            alert.lastFailureKind
        )
        this.eventBus?.emit({ type: "alert:repeated_failure", ...alert })
        if (!this.onAlert) return
        try {
            this.onAlert(alert)
        } catch (error) {
            log.alert("Alert callback threw: %s", errorMessage(error))
        }
    }

    private addRecord(record: InvocationRecord): void {
        this.records.push(Object.freeze(record))
        if (this.records.length > this.maxRecords) {
            this.records = this.records.slice(-this.maxRecords)
        }
    }

    private emitComplete(unit: string, degraded: boolean, startedAt: Date): void {
        this.eventBus?.emit({
            type: "invoke:complete",
            unit,
            degraded,
            duration: Date.now() - startedAt.getTime(),
        })
    }
}
