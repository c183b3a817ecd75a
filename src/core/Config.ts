import { join } from "node:path"

import { z } from "zod"

import type {
    ConflictPolicy,
    FailsafeConfig,
    RendererType,
    SecondaryProviderType,
} from "../types.js"
import { ConfigError, errorMessage } from "./errors.js"
import { describeIssue } from "./validation.js"

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000

export const DEFAULT_PRIMARY_MODEL = "claude-sonnet-4-20250514"

const DEFAULT_SECONDARY_MODELS: Record<SecondaryProviderType, string> = {
    openai: "gpt-4o-mini",
    cli: "",
}

export interface ResolvedConfig {
    workingDirectory: string
    persistencePath: string
    anthropicApiKey?: string
    openaiApiKey?: string
    primaryModel: string
    secondaryProvider: SecondaryProviderType
    secondaryModel: string
    secondaryCommand: string[]
    maxRetries: number
    baseDelayMs: number
    maxParallel: number
    alertThreshold: number
    ttlMs: number
    unitTimeoutMs: number
    primaryTimeoutMs: number
    healthCacheTtlMs: number
    conflictPolicy: ConflictPolicy
    toolPermissions: string[]
    renderer: RendererType
    runLogPath?: string
    verbose: boolean
}

const NUMERIC_LIMITS: {
    key: keyof ResolvedConfig
    min: number
    integer: boolean
}[] = [
    { key: "maxRetries", min: 0, integer: true },
    { key: "baseDelayMs", min: 0, integer: false },
    { key: "maxParallel", min: 1, integer: true },
    { key: "alertThreshold", min: 1, integer: true },
    { key: "ttlMs", min: 1, integer: false },
    { key: "unitTimeoutMs", min: 0, integer: false },
    { key: "primaryTimeoutMs", min: 0, integer: false },
    { key: "healthCacheTtlMs", min: 0, integer: false },
]

export function resolveConfig(config: FailsafeConfig): ResolvedConfig {
    const secondaryProvider = config.secondaryProvider ?? "openai"
    const resolved: ResolvedConfig = {
        workingDirectory: config.workingDirectory,
        persistencePath:
            config.persistencePath ??
            join(config.workingDirectory, ".failsafe"),
        anthropicApiKey: config.anthropicApiKey,
        openaiApiKey: config.openaiApiKey,
        primaryModel: config.primaryModel ?? DEFAULT_PRIMARY_MODEL,
        secondaryProvider,
        secondaryModel:
            config.secondaryModel ?? DEFAULT_SECONDARY_MODELS[secondaryProvider],
        secondaryCommand: config.secondaryCommand ?? [],
        maxRetries: config.maxRetries ?? 3,
        baseDelayMs: config.baseDelayMs ?? 1000,
        maxParallel: config.maxParallel ?? 5,
        alertThreshold: config.alertThreshold ?? 3,
        ttlMs: config.ttlMs ?? DEFAULT_TTL_MS,
        unitTimeoutMs: config.unitTimeoutMs ?? 300_000,
        primaryTimeoutMs: config.primaryTimeoutMs ?? 120_000,
        healthCacheTtlMs: config.healthCacheTtlMs ?? 30_000,
        conflictPolicy: config.conflictPolicy ?? "last_write_wins",
        toolPermissions: config.toolPermissions ?? [],
        renderer: config.renderer ?? "terminal",
        runLogPath: config.runLogPath,
        verbose: config.verbose ?? false,
    }

    for (const { key, min, integer } of NUMERIC_LIMITS) {
        const value = resolved[key]
        if (
            typeof value !== "number" ||
            !Number.isFinite(value) ||
            value < min ||
            (integer && !Number.isInteger(value))
        ) {
            throw new ConfigError(
                `${key} must be ${integer ? "an integer" : "a number"} >= ${min}, got ${String(value)}`
            )
        }
    }

    if (!oneOf(CONFLICT_POLICIES, resolved.conflictPolicy)) {
        throw new ConfigError(
            `conflictPolicy must be "last_write_wins" or "reject", got ${String(resolved.conflictPolicy)}`
        )
    }

    if (
        resolved.secondaryProvider === "cli" &&
        resolved.secondaryCommand.length === 0
    ) {
        throw new ConfigError(
            "secondaryCommand is required when secondaryProvider is \"cli\""
        )
    }

    return resolved
}

const RENDERERS = ["terminal", "log", "none"] as const
const SECONDARY_PROVIDERS = ["openai", "cli"] as const
const CONFLICT_POLICIES: readonly ConflictPolicy[] = ["last_write_wins", "reject"]

function oneOf<T extends string>(
    allowed: readonly T[],
    value: unknown
): value is T {
    return allowed.some((candidate) => candidate === value)
}

/** Keys `.failsaferc.json` may set; anything else is dropped. */
const rcConfigSchema = z
    .object({
        persistencePath: z.string(),
        anthropicApiKey: z.string(),
        openaiApiKey: z.string(),
        primaryModel: z.string(),
        secondaryProvider: z.enum(SECONDARY_PROVIDERS),
        secondaryModel: z.string(),
        secondaryCommand: z.array(z.string()),
        maxRetries: z.number(),
        baseDelayMs: z.number(),
        maxParallel: z.number(),
        alertThreshold: z.number(),
        ttlMs: z.number(),
        unitTimeoutMs: z.number(),
        primaryTimeoutMs: z.number(),
        healthCacheTtlMs: z.number(),
        conflictPolicy: z.enum(["last_write_wins", "reject"]),
        toolPermissions: z.array(z.string()),
        renderer: z.enum(RENDERERS),
        runLogPath: z.string(),
        verbose: z.boolean(),
    })
    .partial()

/**
 * Parse a `.failsaferc.json` body. Unknown keys are ignored; known keys
 * with the wrong type raise {@link ConfigError}. Range checks happen in
 * {@link resolveConfig}.
 */
export function parseRcConfig(
    text: string,
    source: string
): Partial<FailsafeConfig> {
    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (error) {
        throw new ConfigError(`Invalid JSON in ${source}: ${errorMessage(error)}`)
    }
    const parsed = rcConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`${source}: ${describeIssue(parsed.error)}`)
    }
    return parsed.data
}
