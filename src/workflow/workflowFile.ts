import { readFile } from "node:fs/promises"
import { isDeepStrictEqual } from "node:util"

import { z } from "zod"

import { PRIORITIES } from "../context/contextSchema.js"
import type { SharedContext } from "../context/SharedContext.js"
import { errorMessage, ValidationError } from "../core/errors.js"
import { describeIssue } from "../core/validation.js"

const nonBlank = z.string().regex(/\S/, "must be a non-empty string")

/**
 * Gate on one artifact. With no comparison it tests presence (`exists`
 * defaults to true); `equals`, `notEquals` and `oneOf` compare the stored
 * value structurally.
 */
export const artifactConditionSchema = z
    .object({
        artifact: nonBlank,
        exists: z.boolean().optional(),
        equals: z.unknown().optional(),
        notEquals: z.unknown().optional(),
        oneOf: z.array(z.unknown()).min(1).optional(),
    })
    .strict()

export const unitSpecSchema = z.object({
    name: nonBlank,
    task: nonBlank,
    outputKey: nonBlank.optional(),
})

const workflowUnitSchema = unitSpecSchema.extend({
    when: artifactConditionSchema.optional(),
})

export const workflowFileSchema = z.object({
    task: nonBlank,
    strategy: z
        .enum(["sequential", "parallel", "conditional"])
        .default("sequential"),
    owner: z.string().optional(),
    priority: z.enum(PRIORITIES).optional(),
    ttlMs: z.number().positive().optional(),
    maxParallel: z.number().int().positive().optional(),
    archiveOnComplete: z.boolean().default(false),
    artifacts: z.record(z.string(), z.unknown()).default({}),
    units: z.array(workflowUnitSchema).min(1, "must be a non-empty array"),
})

export type ArtifactCondition = z.infer<typeof artifactConditionSchema>
export type UnitSpec = z.infer<typeof unitSpecSchema>
export type WorkflowFile = z.infer<typeof workflowFileSchema>

export function parseWorkflowFile(text: string, source: string): WorkflowFile {
    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (error) {
        throw new ValidationError(
            `${source} is not valid JSON: ${errorMessage(error)}`
        )
    }
    const parsed = workflowFileSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ValidationError(`${source}: ${describeIssue(parsed.error)}`)
    }
    return parsed.data
}

export async function loadWorkflowFile(path: string): Promise<WorkflowFile> {
    return parseWorkflowFile(await readFile(path, "utf-8"), path)
}

export function artifactCondition(
    condition: ArtifactCondition
): (ctx: SharedContext) => boolean {
    const compares =
        condition.equals !== undefined ||
        condition.notEquals !== undefined ||
        condition.oneOf !== undefined

    return (ctx) => {
        const present = ctx.has(condition.artifact)
        if (!compares) return present === (condition.exists ?? true)
        if (condition.exists !== undefined && present !== condition.exists) {
            return false
        }

        const value = ctx.get(condition.artifact)
        const matches = (expected: unknown): boolean =>
            present && isDeepStrictEqual(value, expected)

        if (condition.equals !== undefined && !matches(condition.equals)) {
            return false
        }
        if (condition.notEquals !== undefined && matches(condition.notEquals)) {
            return false
        }
        if (condition.oneOf && !condition.oneOf.some(matches)) return false
        return true
    }
}
