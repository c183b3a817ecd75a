import { interpolate } from "../context/interpolate.js"
import type { SharedContext } from "../context/SharedContext.js"
import type { InvocationController } from "../invocation/InvocationController.js"
import type { AgentUnitOptions } from "./AgentUnit.js"
import { AgentUnit } from "./AgentUnit.js"

export interface InvocationUnitOptions extends AgentUnitOptions {
    /**
     * Bounds the primary backend's attempts rather than the whole unit, so a
     * hanging primary still leaves room to degrade. 0 leaves it unbounded.
     */
    timeoutMs?: number
    /** Artifact key for the result; defaults to the unit name. */
    outputKey?: string
}

/**
 * A unit whose work is one call through the resilient invocation path.
 * Retry and degrade decisions belong to the controller, so local retries
 * default to zero. `${key}` placeholders in the task are filled from the
 * context's artifacts when the unit runs.
 */
export class InvocationUnit extends AgentUnit<unknown> {
    private readonly task: string
    private readonly controller: InvocationController
    private readonly outputKey: string
    private readonly primaryBudgetMs: number

    constructor(
        name: string,
        task: string,
        controller: InvocationController,
        options: InvocationUnitOptions = {}
    ) {
        super(name, { maxRetries: 0, ...options, timeoutMs: 0 })
        this.task = task
        this.controller = controller
        this.outputKey = options.outputKey ?? name
        this.primaryBudgetMs = options.timeoutMs ?? 0
    }

    protected async process(
        ctx: SharedContext,
        signal: AbortSignal
    ): Promise<unknown> {
        const result = await this.controller.invoke(
            this.name,
            ctx,
            interpolate(this.task, ctx),
            { signal, primaryBudgetMs: this.primaryBudgetMs }
        )
        ctx.set(this.outputKey, result)
        return result
    }
}
