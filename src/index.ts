import { InvocationUnit } from "./agents/InvocationUnit.js"
import type { InvocationUnitOptions } from "./agents/InvocationUnit.js"
import { createPrimaryBackend, createSecondaryBackend } from "./backends/index.js"
import type {
    PrimaryBackend,
    SecondaryBackend,
    StructuredResult,
} from "./backends/types.js"
import { ContextStore } from "./context/ContextStore.js"
import type { SharedContext } from "./context/SharedContext.js"
import { resolveConfig } from "./core/Config.js"
import type { ResolvedConfig } from "./core/Config.js"
import { log } from "./core/Logger.js"
import { EventBus } from "./events/EventBus.js"
import { createDefaultChecks } from "./health/checks.js"
import { HealthEvaluator } from "./health/HealthEvaluator.js"
import type { HealthCheck, HealthReportOptions } from "./health/HealthEvaluator.js"
import { InvocationController } from "./invocation/InvocationController.js"
import { FileStore } from "./persistence/FileStore.js"
import type { ContextPersistence } from "./persistence/types.js"
import { createRenderer } from "./renderer/index.js"
import type { Renderer } from "./renderer/types.js"
import type {
    CreateContextOptions,
    FailsafeConfig,
    HealthReport,
    RepeatedFailureAlert,
    StatisticsSnapshot,
    WorkflowResult,
} from "./types.js"
import {
    DEFAULT_PLANNER_NAME,
    parsePlan,
    PLAN_KEY,
    planningTask,
} from "./workflow/planning.js"
import { WorkflowOrchestrator } from "./workflow/WorkflowOrchestrator.js"
import type {
    RunWorkflowOptions,
    WorkflowEntry,
} from "./workflow/WorkflowOrchestrator.js"
import type { UnitSpec } from "./workflow/workflowFile.js"

/** Replacements for the pieces the config would otherwise build. */
export interface FailsafeOverrides {
    primary?: PrimaryBackend
    secondary?: SecondaryBackend
    persistence?: ContextPersistence
    healthChecks?: HealthCheck[]
    onAlert?: (alert: RepeatedFailureAlert) => void
    clock?: () => Date
}

export interface PlannedRunOptions {
    plannerName?: string
}

export interface PlannedRun {
    context: SharedContext
    /** The planner's own run. */
    planning: WorkflowResult
    steps: UnitSpec[]
    /** The sequential run over the planned steps; null when planning failed. */
    result: WorkflowResult | null
}

export class Failsafe {
    public readonly config: ResolvedConfig
    public readonly eventBus: EventBus
    public readonly store: ContextStore
    public readonly health: HealthEvaluator
    public readonly controller: InvocationController
    public readonly orchestrator: WorkflowOrchestrator
    private readonly renderer: Renderer | null

    constructor(config: FailsafeConfig, overrides: FailsafeOverrides = {}) {
        this.config = resolveConfig(config)
        this.eventBus = new EventBus()

        const primary = overrides.primary ?? createPrimaryBackend(this.config)
        const secondary =
            overrides.secondary ?? createSecondaryBackend(this.config)
        const persistence =
            overrides.persistence ?? new FileStore(this.config.persistencePath)

        this.store = new ContextStore(persistence, {
            conflictPolicy: this.config.conflictPolicy,
            defaultTtlMs: this.config.ttlMs,
            clock: overrides.clock,
        })
        this.health = new HealthEvaluator({
            checks:
                overrides.healthChecks ??
                createDefaultChecks({
                    primary,
                    storageDirectory: this.config.persistencePath,
                }),
            cacheTtlMs: this.config.healthCacheTtlMs,
            eventBus: this.eventBus,
        })
        this.controller = new InvocationController({
            primary,
            secondary,
            health: this.health,
            eventBus: this.eventBus,
            maxRetries: this.config.maxRetries,
            baseDelayMs: this.config.baseDelayMs,
            primaryTimeoutMs: this.config.primaryTimeoutMs,
            alertThreshold: this.config.alertThreshold,
            toolPermissions: this.config.toolPermissions,
            onAlert: overrides.onAlert,
        })
        this.orchestrator = new WorkflowOrchestrator({
            store: this.store,
            eventBus: this.eventBus,
            maxParallel: this.config.maxParallel,
        })

        this.renderer = createRenderer(this.config.renderer, {
            verbose: this.config.verbose,
            runLogPath: this.config.runLogPath,
        })
        if (this.renderer) {
            this.renderer.attach(this.eventBus)
        }
    }

    /** A unit that runs `task` through the invocation controller. */
    public invocationUnit(
        name: string,
        task: string,
        options: InvocationUnitOptions = {}
    ): InvocationUnit {
        return new InvocationUnit(name, task, this.controller, {
            timeoutMs: this.config.unitTimeoutMs,
            ...options,
        })
    }

    public async runWorkflow(
        entries: WorkflowEntry[],
        context: CreateContextOptions,
        options: RunWorkflowOptions
    ): Promise<{ context: SharedContext; result: WorkflowResult }> {
        return this.orchestrator.runWorkflow(entries, context, options)
    }

    /**
     * Ask a planner unit to break `goal` into steps, then run those steps
     * sequentially over the same Context. An unusable plan raises
     * {@link ValidationError} after the Context is saved.
     */
    public async runPlanned(
        goal: string,
        context: CreateContextOptions,
        options: PlannedRunOptions = {}
    ): Promise<PlannedRun> {
        const plannerName = options.plannerName ?? DEFAULT_PLANNER_NAME
        const ctx = this.orchestrator.createContext(context)
        try {
            const planning = await this.orchestrator.execute(
                [
                    {
                        name: plannerName,
                        unit: this.invocationUnit(plannerName, planningTask(goal), {
                            outputKey: PLAN_KEY,
                        }),
                    },
                ],
                ctx,
                { strategy: "sequential" }
            )
            if (planning.status !== "completed") {
                return { context: ctx, planning, steps: [], result: null }
            }

            const steps = parsePlan(ctx.get(PLAN_KEY), plannerName)
            log.workflow(
                "Plan for %s: %s",
                ctx.id,
                steps.map((step) => step.name).join(" → ")
            )
            const result = await this.orchestrator.execute(
                steps.map((step) => ({
                    name: step.name,
                    unit: this.invocationUnit(step.name, step.task, {
                        outputKey: step.outputKey,
                    }),
                })),
                ctx,
                { strategy: "sequential" }
            )
            return { context: ctx, planning, steps, result }
        } finally {
            if (!ctx.archived) await this.store.save(ctx)
        }
    }

    public async invoke(
        unitName: string,
        ctx: SharedContext,
        task: string
    ): Promise<StructuredResult> {
        return this.controller.invoke(unitName, ctx, task)
    }

    public async getHealthReport(
        options?: HealthReportOptions
    ): Promise<HealthReport> {
        return this.health.getHealthReport(options)
    }

    public getStatistics(): StatisticsSnapshot {
        return this.controller.getStatistics()
    }

    public resetStatistics(): void {
        this.controller.resetStatistics()
    }

    public cancelWorkflow(runId: string): boolean {
        return this.orchestrator.cancelWorkflow(runId)
    }

    public async cleanupExpiredWorkflows(): Promise<string[]> {
        return this.orchestrator.cleanupExpiredWorkflows()
    }

    /** Cancels active runs and releases the terminal. */
    public close(): void {
        for (const runId of this.orchestrator.runningWorkflows) {
            this.orchestrator.cancelWorkflow(runId)
        }
        this.renderer?.detach()
    }
}

export { AgentUnit } from "./agents/AgentUnit.js"
export type { AgentUnitOptions, RunOptions } from "./agents/AgentUnit.js"
export { defineUnit, FunctionUnit } from "./agents/FunctionUnit.js"
export { InvocationUnit } from "./agents/InvocationUnit.js"
export type { InvocationUnitOptions } from "./agents/InvocationUnit.js"
export {
    AnthropicBackend,
    CliBackend,
    OpenAIBackend,
} from "./backends/index.js"
export type {
    Backend,
    PrimaryBackend,
    SecondaryBackend,
    StructuredResult,
} from "./backends/index.js"
export { ContextStore } from "./context/ContextStore.js"
export { SharedContext } from "./context/SharedContext.js"
export { resolveConfig } from "./core/Config.js"
export type { ResolvedConfig } from "./core/Config.js"
export * from "./core/errors.js"
export { EventBus } from "./events/EventBus.js"
export type { FailsafeEvent } from "./events/types.js"
export { createDefaultChecks } from "./health/checks.js"
export { HealthEvaluator } from "./health/HealthEvaluator.js"
export type { CheckScope, HealthCheck } from "./health/HealthEvaluator.js"
export { classifyFailure } from "./invocation/FailureClassifier.js"
export { decide, FAILURE_POLICY } from "./invocation/DecisionTable.js"
export { InvocationController } from "./invocation/InvocationController.js"
export type { InvocationControllerOptions } from "./invocation/InvocationController.js"
export { FileStore } from "./persistence/FileStore.js"
export { MemoryStore } from "./persistence/MemoryStore.js"
export type { ContextPersistence } from "./persistence/types.js"
export { parsePlan, planningTask } from "./workflow/planning.js"
export {
    artifactCondition,
    loadWorkflowFile,
    parseWorkflowFile,
} from "./workflow/workflowFile.js"
export type {
    ArtifactCondition,
    UnitSpec,
    WorkflowFile,
} from "./workflow/workflowFile.js"
export { WorkflowOrchestrator } from "./workflow/WorkflowOrchestrator.js"
export type {
    RunWorkflowOptions,
    UnitCondition,
    WorkflowEntry,
} from "./workflow/WorkflowOrchestrator.js"
export type * from "./types.js"
