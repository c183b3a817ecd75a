import type { SharedContext } from "../context/SharedContext.js"
import type { AgentUnitOptions } from "./AgentUnit.js"
import { AgentUnit } from "./AgentUnit.js"

export type UnitFunction<TOutcome> = (
    ctx: SharedContext,
    signal: AbortSignal
) => Promise<TOutcome> | TOutcome

export class FunctionUnit<TOutcome = unknown> extends AgentUnit<TOutcome> {
    private readonly fn: UnitFunction<TOutcome>

    constructor(
        name: string,
        fn: UnitFunction<TOutcome>,
        options?: AgentUnitOptions
    ) {
        super(name, options)
        this.fn = fn
    }

    protected async process(
        ctx: SharedContext,
        signal: AbortSignal
    ): Promise<TOutcome> {
        return this.fn(ctx, signal)
    }
}

export function defineUnit<TOutcome>(
    name: string,
    fn: UnitFunction<TOutcome>,
    options?: AgentUnitOptions
): FunctionUnit<TOutcome> {
    return new FunctionUnit(name, fn, options)
}
