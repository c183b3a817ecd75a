import type { CheckResult, ContextData } from "../types.js"

export type StructuredResult = Record<string, unknown>

/**
 * The capability-rich backend attempted first. Failures are thrown;
 * throwing a `BackendError` with a kind skips classification.
 */
export interface PrimaryBackend {
    readonly kind: "primary"
    readonly name: string
    /** Host the backend talks to, for the network check. */
    readonly endpointHost?: string
    call(
        task: string,
        snapshot: ContextData,
        toolPermissions: string[],
        signal?: AbortSignal
    ): Promise<StructuredResult>
    hasCredentials?(): boolean
    probe?(signal?: AbortSignal): Promise<CheckResult>
}

/** The textual fallback: prompt in, free text out. */
export interface SecondaryBackend {
    readonly kind: "secondary"
    readonly name: string
    call(prompt: string, signal?: AbortSignal): Promise<string>
}

export type Backend = PrimaryBackend | SecondaryBackend

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}
