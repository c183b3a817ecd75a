import { z } from "zod"

import { ValidationError } from "../core/errors.js"
import { describeIssue } from "../core/validation.js"
import { unitSpecSchema } from "./workflowFile.js"
import type { UnitSpec } from "./workflowFile.js"

/** Artifact the planner's answer is stored under. */
export const PLAN_KEY = "plan"

export const DEFAULT_PLANNER_NAME = "planner"

const planSchema = z.object({
    steps: z.array(unitSpecSchema).min(1, "must list at least one step"),
})

export function planningTask(goal: string): string {
    return [
        "Break the goal below into an ordered list of steps. Each step is carried out by a separate agent, one after another, over a shared context.",
        "",
        `Goal: ${goal}`,
        "",
        'Reply with JSON only, shaped as {"steps": [{"name": "<short-id>", "task": "<instruction>", "outputKey": "<artifact key, optional>"}]}.',
        "A step can use an earlier step's output by writing ${<outputKey>} in its task; without an outputKey the output is stored under the step name.",
    ].join("\n")
}

/** The planner's answer as steps; names must be unique and differ from `plannerName`. */
export function parsePlan(value: unknown, plannerName: string): UnitSpec[] {
    const parsed = planSchema.safeParse(value)
    if (!parsed.success) {
        throw new ValidationError(
            `Planner returned an unusable plan: ${describeIssue(parsed.error)}`
        )
    }

    const seen = new Set<string>([plannerName])
    for (const step of parsed.data.steps) {
        if (seen.has(step.name)) {
            throw new ValidationError(
                `Planner returned an unusable plan: step name "${step.name}" is taken`
            )
        }
        seen.add(step.name)
    }
    return parsed.data.steps
}
