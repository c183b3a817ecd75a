import { randomUUID } from "node:crypto"

import type { AgentUnit } from "../agents/AgentUnit.js"
import type { ContextStore } from "../context/ContextStore.js"
import type { SharedContext } from "../context/SharedContext.js"
import { ORCHESTRATOR_WRITER } from "../context/SharedContext.js"
import {
    ConfigError,
    ContextArchivedError,
    ContextExpiredError,
    errorMessage,
    UnitExecutionFailed,
    ValidationError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type {
    CreateContextOptions,
    UnitResult,
    WorkflowResult,
    WorkflowStatus,
    WorkflowStrategy,
} from "../types.js"

/** Decides, just before a unit would start, whether it runs at all. */
export type UnitCondition = (ctx: SharedContext) => boolean

export interface WorkflowEntry {
    name: string
    unit: AgentUnit
    /** Honored by the conditional strategy only. */
    when?: UnitCondition
}

export interface ExecuteOptions {
    strategy: WorkflowStrategy
    /** Lets the caller know the id to cancel before the run starts. */
    runId?: string
    maxParallel?: number
}

export interface RunWorkflowOptions extends ExecuteOptions {
    /** Archive the Context when every unit completed. */
    archiveOnComplete?: boolean
}

export interface WorkflowOrchestratorOptions {
    store: ContextStore
    eventBus?: EventBus
    maxParallel?: number
}

const DEFAULT_MAX_PARALLEL = 5

const STRATEGIES: WorkflowStrategy[] = ["sequential", "parallel", "conditional"]

/** Mutable tallies for one run; folded into a {@link WorkflowResult} at the end. */
class RunTally {
    public readonly agentsRun: string[] = []
    public readonly agentsCompleted: string[] = []
    public readonly agentsFailed: string[] = []
    public readonly agentsSkipped: string[] = []
    public readonly results: Record<string, UnitResult> = {}
    public firstError: string | null = null

    public completed(name: string, outcome: unknown): void {
        this.agentsCompleted.push(name)
        this.results[name] = { ok: true, outcome }
    }

    public failed(name: string, error: string): void {
        this.agentsFailed.push(name)
        this.results[name] = { ok: false, error }
        this.firstError ??= error
    }
}

type UnitOutcome =
    | { ok: true; outcome: unknown }
    | { ok: false; error: string }

/**
 * Runs an ordered list of units over one shared Context using one of
 * three strategies, and owns the Context lifecycle around a run.
 */
export class WorkflowOrchestrator {
    private readonly store: ContextStore
    private readonly eventBus?: EventBus
    private readonly maxParallel: number
    private readonly activeRuns = new Map<string, AbortController>()

    constructor(options: WorkflowOrchestratorOptions) {
        this.store = options.store
        this.eventBus = options.eventBus
        this.maxParallel = options.maxParallel ?? DEFAULT_MAX_PARALLEL
        if (!Number.isInteger(this.maxParallel) || this.maxParallel < 1) {
            throw new ConfigError("maxParallel must be a positive integer")
        }
    }

    public createContext(options: CreateContextOptions): SharedContext {
        return this.store.create(options)
    }

    public async loadContext(id: string): Promise<SharedContext> {
        return this.store.load(id)
    }

    public async archiveWorkflow(
        target: SharedContext | string
    ): Promise<SharedContext> {
        const ctx =
            typeof target === "string"
                ? await this.store.archiveById(target)
                : target
        if (typeof target !== "string" && !ctx.archived) {
            await this.store.archive(ctx)
        }
        this.eventBus?.emit({ type: "context:archived", contextId: ctx.id })
        log.workflow("Archived workflow context %s", ctx.id)
        return ctx
    }

    /**
     * Stop dispatching units for `runId`. Units already running finish, but
     * their results stay out of the aggregate.
     * @returns false when no such run is active
     */
    public cancelWorkflow(runId: string): boolean {
        const controller = this.activeRuns.get(runId)
        if (!controller) return false
        if (!controller.signal.aborted) {
            log.workflow("Cancelling run %s", runId)
            controller.abort()
            this.eventBus?.emit({ type: "workflow:cancelled", runId })
        }
        return true
    }

    public get runningWorkflows(): string[] {
        return [...this.activeRuns.keys()]
    }

    /** Archives every persisted Context past its TTL. */
    public async cleanupExpiredWorkflows(now?: Date): Promise<string[]> {
        const expired = await this.store.listExpired(now)
        const archived: string[] = []
        for (const id of expired) {
            try {
                await this.archiveWorkflow(id)
                archived.push(id)
            } catch (error) {
                log.workflow(
                    "Could not archive expired context %s: %s",
                    id,
                    errorMessage(error)
                )
            }
        }
        log.workflow(
            "Cleanup archived %d of %d expired context(s)",
            archived.length,
            expired.length
        )
        return archived
    }

    /**
     * Create a Context, run `entries` over it, save it and, when asked and
     * every unit completed, archive it.
     */
    public async runWorkflow(
        entries: WorkflowEntry[],
        context: CreateContextOptions,
        options: RunWorkflowOptions
    ): Promise<{ context: SharedContext; result: WorkflowResult }> {
        const ctx = this.createContext(context)
        const result = await this.execute(entries, ctx, options)
        if (!ctx.archived) {
            await this.store.save(ctx)
            if (options.archiveOnComplete && result.status === "completed") {
                await this.archiveWorkflow(ctx)
            }
        }
        return { context: ctx, result }
    }

    public async execute(
        entries: WorkflowEntry[],
        ctx: SharedContext,
        options: ExecuteOptions
    ): Promise<WorkflowResult> {
        const runId = options.runId ?? randomUUID()
        const startTime = Date.now()
        const tally = new RunTally()
        const finish = (status: WorkflowStatus, cancelled = false): WorkflowResult => {
            const result: WorkflowResult = {
                runId,
                contextId: ctx.id,
                strategy: options.strategy,
                status,
                agentsRun: tally.agentsRun,
                agentsCompleted: tally.agentsCompleted,
                agentsFailed: tally.agentsFailed,
                agentsSkipped: tally.agentsSkipped,
                results: tally.results,
                error: tally.firstError,
                cancelled,
                durationMs: Date.now() - startTime,
            }
            this.eventBus?.emit({
                type: "workflow:complete",
                runId,
                status,
                cancelled,
                duration: result.durationMs,
            })
            log.workflow(
                "Run %s finished %s (%d completed, %d failed, %d skipped)",
                runId,
                status,
                tally.agentsCompleted.length,
                tally.agentsFailed.length,
                tally.agentsSkipped.length
            )
            return result
        }

        if (this.activeRuns.has(runId)) {
            tally.firstError = `Run ${runId} is already active`
            return finish("failed")
        }
        try {
            this.validate(entries, ctx, options)
            ctx.setPhase(`running:${options.strategy}`)
            ctx.appendEvent({
                unit: ORCHESTRATOR_WRITER,
                kind: "workflow_started",
                detail: options.strategy,
            })
        } catch (error) {
            tally.firstError = errorMessage(error)
            log.workflow("Run %s rejected: %s", runId, tally.firstError)
            return finish("failed")
        }

        const controller = new AbortController()
        this.activeRuns.set(runId, controller)
        this.eventBus?.emit({
            type: "workflow:start",
            runId,
            contextId: ctx.id,
            strategy: options.strategy,
            task: ctx.task,
            units: entries.map((entry) => entry.name),
        })
        log.workflow(
            "Run %s: %s over %d unit(s)",
            runId,
            options.strategy,
            entries.length
        )

        try {
            if (options.strategy === "parallel") {
                await this.runParallel(
                    runId,
                    entries,
                    ctx,
                    tally,
                    controller.signal,
                    options.maxParallel ?? this.maxParallel
                )
            } else {
                await this.runInOrder(
                    runId,
                    entries,
                    ctx,
                    tally,
                    controller.signal,
                    options.strategy === "conditional"
                )
            }
        } finally {
            this.activeRuns.delete(runId)
        }

        const cancelled = controller.signal.aborted
        const status: WorkflowStatus =
            cancelled || tally.agentsFailed.length > 0 ? "partial" : "completed"
        this.closeRun(ctx, status, cancelled)
        return finish(status, cancelled)
    }

    /** Sequential and conditional: list order, first failure stops the run. */
    private async runInOrder(
        runId: string,
        entries: WorkflowEntry[],
        ctx: SharedContext,
        tally: RunTally,
        signal: AbortSignal,
        conditional: boolean
    ): Promise<void> {
        for (const [index, entry] of entries.entries()) {
            if (signal.aborted) {
                for (const rest of entries.slice(index)) {
                    this.skip(runId, rest.name, ctx, tally, "cancelled")
                }
                return
            }

            if (conditional && entry.when) {
                let shouldRun: boolean
                try {
                    shouldRun = entry.when(ctx)
                } catch (error) {
                    const message = `Condition for "${entry.name}" threw: ${errorMessage(error)}`
                    log.workflow("%s", message)
                    tally.failed(entry.name, message)
                    return
                }
                if (!shouldRun) {
                    this.skip(runId, entry.name, ctx, tally, "condition")
                    continue
                }
            }

            const outcome = await this.runUnit(runId, entry, ctx, tally)
            if (signal.aborted) continue
            if (outcome.ok) {
                tally.completed(entry.name, outcome.outcome)
            } else {
                tally.failed(entry.name, outcome.error)
                return
            }
        }
    }

    /** A pool of `maxParallel` workers pulling from one queue; failures stay local. */
    private async runParallel(
        runId: string,
        entries: WorkflowEntry[],
        ctx: SharedContext,
        tally: RunTally,
        signal: AbortSignal,
        maxParallel: number
    ): Promise<void> {
        const queue = [...entries]
        const worker = async (): Promise<void> => {
            for (;;) {
                if (signal.aborted) return
                const entry = queue.shift()
                if (!entry) return
                const outcome = await this.runUnit(runId, entry, ctx, tally)
                if (signal.aborted) continue
                if (outcome.ok) tally.completed(entry.name, outcome.outcome)
                else tally.failed(entry.name, outcome.error)
            }
        }

        ctx.beginConcurrentSection()
        try {
            const workers = Math.min(maxParallel, queue.length)
            await Promise.all(Array.from({ length: workers }, () => worker()))
        } finally {
            ctx.endConcurrentSection()
        }

        for (const entry of queue) {
            this.skip(runId, entry.name, ctx, tally, "cancelled")
        }
    }

    private async runUnit(
        runId: string,
        entry: WorkflowEntry,
        ctx: SharedContext,
        tally: RunTally
    ): Promise<UnitOutcome> {
        tally.agentsRun.push(entry.name)
        this.eventBus?.emit({ type: "unit:start", runId, unit: entry.name })
        const started = Date.now()
        try {
            const outcome = await entry.unit.run(ctx, {
                eventBus: this.eventBus,
            })
            this.eventBus?.emit({
                type: "unit:complete",
                runId,
                unit: entry.name,
                status: "completed",
                duration: Date.now() - started,
            })
            return { ok: true, outcome }
        } catch (error) {
            const message =
                error instanceof UnitExecutionFailed
                    ? error.lastError.message
                    : errorMessage(error)
            this.eventBus?.emit({
                type: "unit:complete",
                runId,
                unit: entry.name,
                status: "failed",
                duration: Date.now() - started,
                error: message,
            })
            return { ok: false, error: message }
        }
    }

    private skip(
        runId: string,
        name: string,
        ctx: SharedContext,
        tally: RunTally,
        reason: "condition" | "cancelled"
    ): void {
        tally.agentsSkipped.push(name)
        this.eventBus?.emit({ type: "unit:skipped", runId, unit: name, reason })
        this.bookkeep(ctx, () =>
            ctx.appendEvent({ unit: name, kind: "unit_skipped", detail: reason })
        )
    }

    private closeRun(
        ctx: SharedContext,
        status: WorkflowStatus,
        cancelled: boolean
    ): void {
        this.bookkeep(ctx, () => {
            ctx.setPhase(cancelled ? "cancelled" : status)
            ctx.appendEvent({
                unit: ORCHESTRATOR_WRITER,
                kind: cancelled ? "workflow_cancelled" : "workflow_completed",
                detail: status,
            })
        })
    }

    /** The Context may have expired during the run; the result still stands. */
    private bookkeep(ctx: SharedContext, action: () => void): void {
        try {
            action()
        } catch (error) {
            log.workflow(
                "Could not update context %s: %s",
                ctx.id,
                errorMessage(error)
            )
        }
    }

    private validate(
        entries: WorkflowEntry[],
        ctx: SharedContext,
        options: ExecuteOptions
    ): void {
        if (!STRATEGIES.includes(options.strategy)) {
            throw new ValidationError(
                `Unknown strategy: ${String(options.strategy)}`
            )
        }
        if (
            options.maxParallel !== undefined &&
            (!Number.isInteger(options.maxParallel) || options.maxParallel < 1)
        ) {
            throw new ValidationError("maxParallel must be a positive integer")
        }
        const seen = new Set<string>()
        for (const entry of entries) {
            if (!entry.name.trim()) {
                throw new ValidationError("Workflow entry names must not be empty")
            }
            if (seen.has(entry.name)) {
                throw new ValidationError(
                    `Duplicate unit name in workflow: ${entry.name}`
                )
            }
            seen.add(entry.name)
            if (entry.unit.name !== entry.name) {
                throw new ValidationError(
                    `Entry "${entry.name}" wraps unit "${entry.unit.name}"`
                )
            }
            if (entry.unit.state !== "initialized") {
                throw new ValidationError(
                    `Unit "${entry.name}" has already run (${entry.unit.state})`
                )
            }
            if (entry.when && options.strategy !== "conditional") {
                throw new ValidationError(
                    `"${entry.name}" has a condition, which only the conditional strategy honors`
                )
            }
        }
        if (ctx.archived) throw new ContextArchivedError(ctx.id)
        if (ctx.isExpired()) throw new ContextExpiredError(ctx.id)
    }
}
