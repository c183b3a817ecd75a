import { exponentialDelay } from "../core/timing.js"
import type { FailureKind } from "../types.js"

export type FailurePolicy =
    /** Static misconfiguration: retrying cannot help. */
    | "degrade"
    | "retry_then_degrade"
    /** Caller bug: neither retry nor degrade. */
    | "surface"
    | "fatal"

export const FAILURE_POLICY: Readonly<Record<FailureKind, FailurePolicy>> = {
    credentials_absent: "degrade",
    backend_unavailable: "degrade",
    context_conversion_failure: "degrade",
    timeout: "retry_then_degrade",
    network_failure: "retry_then_degrade",
    backend_crash: "retry_then_degrade",
    rate_limited: "retry_then_degrade",
    validation_failure: "surface",
    both_failed: "fatal",
}

export type Decision =
    | { action: "retry"; delayMs: number }
    | { action: "degrade" }
    | { action: "surface" }

/**
 * What to do after the primary failed with `kind` on attempt `attempt`
 * (0-based). A pure function of its arguments.
 */
export function decide(
    kind: FailureKind,
    attempt: number,
    maxRetries: number,
    baseDelayMs: number
): Decision {
    switch (FAILURE_POLICY[kind]) {
        case "degrade":
            return { action: "degrade" }
        case "retry_then_degrade":
            if (attempt < maxRetries) {
                return {
                    action: "retry",
                    delayMs: exponentialDelay(baseDelayMs, attempt),
                }
            }
            return { action: "degrade" }
        case "surface":
        case "fatal":
            return { action: "surface" }
    }
}
