import type { SharedContext } from "../context/SharedContext.js"
import {
    FailsafeError,
    toError,
    UnitExecutionFailed,
    UnitStateError,
    ValidationError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { exponentialDelay, sleep, withTimeout } from "../core/timing.js"
import type { EventBus } from "../events/EventBus.js"
import type { UnitDescriptor, UnitState } from "../types.js"

export interface AgentUnitOptions {
    maxRetries?: number
    baseDelayMs?: number
    /** Per-attempt deadline; 0 disables it. */
    timeoutMs?: number
}

export interface RunOptions {
    signal?: AbortSignal
    eventBus?: EventBus
}

const DEFAULT_MAX_RETRIES = 2
const DEFAULT_BASE_DELAY_MS = 500
const DEFAULT_TIMEOUT_MS = 300_000

/**
 * One unit of work. Subclasses implement {@link process}; callers go
 * through {@link run}, which owns the state machine
 * (`initialized → running → completed | failed`) and local retries.
 */
export abstract class AgentUnit<TOutcome = unknown> {
    public readonly name: string
    protected readonly maxRetries: number
    protected readonly baseDelayMs: number
    protected readonly timeoutMs: number
    private descriptor: UnitDescriptor

    constructor(name: string, options: AgentUnitOptions = {}) {
        if (!name.trim()) {
            throw new ValidationError("Unit name must not be empty")
        }
        this.name = name
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
        this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
        this.descriptor = {
            name,
            state: "initialized",
            startedAt: null,
            completedAt: null,
            error: null,
            retryCount: 0,
        }
    }

    protected abstract process(
        ctx: SharedContext,
        signal: AbortSignal
    ): Promise<TOutcome>

    public get state(): UnitState {
        return this.descriptor.state
    }

    public getDescriptor(): UnitDescriptor {
        return { ...this.descriptor }
    }

    public async run(
        ctx: SharedContext,
        options: RunOptions = {}
    ): Promise<TOutcome> {
        if (this.descriptor.state !== "initialized") {
            throw new UnitStateError(
                `Unit "${this.name}" is ${this.descriptor.state}; run() may only be called once`
            )
        }

        const scoped = ctx.asWriter(this.name)
        this.descriptor = {
            ...this.descriptor,
            state: "running",
            startedAt: new Date().toISOString(),
        }
        try {
            this.publishState(scoped)
            scoped.setCurrentUnit(this.name)
            scoped.appendEvent({ unit: this.name, kind: "unit_started" })
        } catch (error) {
            // The context is expired or archived: nothing may run against it.
            const cause = toError(error)
            this.fail(scoped, cause)
            throw new UnitExecutionFailed(this.name, 0, cause)
        }
        log.unit("Unit %s started", this.name)

        let attempt = 0
        let lastError: Error = new Error("no attempt made")
        for (;;) {
            try {
                const outcome = await withTimeout(
                    (signal) => this.process(scoped, signal),
                    this.timeoutMs,
                    `Unit "${this.name}"`,
                    options.signal
                )
                this.complete(scoped)
                return outcome
            } catch (error) {
                lastError = toError(error)
            }

            attempt++
            if (!this.shouldRetry(lastError, attempt, options.signal)) break

            const delay = exponentialDelay(this.baseDelayMs, attempt - 1)
            this.descriptor.retryCount = attempt
            log.unit(
                "Unit %s attempt %d/%d failed, retrying in %dms: %s",
                this.name,
                attempt,
                this.maxRetries + 1,
                delay,
                lastError.message
            )
            this.bookkeep(() => {
                this.publishState(scoped)
                scoped.appendEvent({
                    unit: this.name,
                    kind: "unit_retry",
                    detail: lastError.message,
                })
            })
            options.eventBus?.emit({
                type: "unit:retry",
                unit: this.name,
                attempt,
                maxRetries: this.maxRetries,
                delayMs: delay,
                reason: lastError.message,
            })
            await sleep(delay, options.signal)
            if (options.signal?.aborted) break
        }

        this.fail(scoped, lastError)
        throw new UnitExecutionFailed(this.name, attempt, lastError)
    }

    private shouldRetry(
        error: Error,
        attemptsMade: number,
        signal?: AbortSignal
    ): boolean {
        if (attemptsMade > this.maxRetries) return false
        if (signal?.aborted) return false
        if (error instanceof FailsafeError && !error.retryable) return false
        return true
    }

    private complete(ctx: SharedContext): void {
        this.descriptor = {
            ...this.descriptor,
            state: "completed",
            completedAt: new Date().toISOString(),
        }
        log.unit("Unit %s completed", this.name)
        this.bookkeep(() => {
            this.publishState(ctx)
            ctx.markUnitCompleted(this.name)
            ctx.appendEvent({ unit: this.name, kind: "unit_completed" })
        })
    }

    private fail(ctx: SharedContext, error: Error): void {
        this.descriptor = {
            ...this.descriptor,
            state: "failed",
            completedAt: new Date().toISOString(),
            error: error.message,
        }
        log.unit("Unit %s failed: %s", this.name, error.message)
        this.bookkeep(() => {
            this.publishState(ctx)
            ctx.appendEvent({
                unit: this.name,
                kind: "unit_failed",
                detail: error.message,
            })
        })
    }

    /** The context may turn read-only mid-run (TTL, archival); the unit's own state still advances. */
    private bookkeep(action: () => void): void {
        try {
            action()
        } catch (error) {
            log.unit(
                "Could not record state of %s: %s",
                this.name,
                toError(error).message
            )
        }
    }

    private publishState(ctx: SharedContext): void {
        ctx.recordUnitState(this.descriptor)
    }
}
