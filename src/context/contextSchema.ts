import { z } from "zod"

import { ContextFormatError, errorMessage, toError } from "../core/errors.js"
import { describeIssue } from "../core/validation.js"
import type { ContextData } from "../types.js"

export const PRIORITIES = ["low", "normal", "high", "critical"] as const

export const FAILURE_KINDS = [
    "backend_unavailable",
    "credentials_absent",
    "network_failure",
    "timeout",
    "backend_crash",
    "context_conversion_failure",
    "rate_limited",
    "validation_failure",
    "both_failed",
] as const

const unitDescriptorSchema = z.object({
    name: z.string(),
    state: z.enum(["initialized", "running", "completed", "failed"]),
    startedAt: z.string().nullable(),
    completedAt: z.string().nullable(),
    error: z.string().nullable(),
    retryCount: z.number().int().nonnegative(),
})

const contextEventSchema = z.object({
    timestamp: z.string(),
    unit: z.string(),
    kind: z.enum([
        "workflow_started",
        "workflow_completed",
        "workflow_cancelled",
        "unit_started",
        "unit_retry",
        "unit_completed",
        "unit_failed",
        "unit_skipped",
    ]),
    detail: z.string().optional(),
})

const degradationRecordSchema = z.object({
    unit: z.string(),
    failureKind: z.enum(FAILURE_KINDS),
    degradedTo: z.string(),
    timestamp: z.string(),
})

export const contextDataSchema = z.object({
    id: z.string(),
    metadata: z.object({
        createdAt: z.string(),
        updatedAt: z.string(),
        version: z.number().int().nonnegative(),
        ttlMs: z.number().positive(),
        owner: z.string(),
        priority: z.enum(PRIORITIES),
    }),
    task: z.string(),
    phase: z.string(),
    currentUnit: z.string().nullable(),
    completedUnits: z.array(z.string()),
    artifacts: z.record(z.string(), z.unknown()),
    unitStates: z.record(z.string(), unitDescriptorSchema),
    eventLog: z.array(contextEventSchema),
    degradationLog: z.array(degradationRecordSchema),
    archived: z.boolean(),
})

export function toContextData(raw: unknown): ContextData {
    const parsed = contextDataSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ContextFormatError(
            `Invalid context: ${describeIssue(parsed.error)}`,
            parsed.error
        )
    }
    return parsed.data
}

export function parseContextData(text: string): ContextData {
    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (error) {
        throw new ContextFormatError(
            `Context payload is not valid JSON: ${errorMessage(error)}`,
            toError(error)
        )
    }
    return toContextData(raw)
}
