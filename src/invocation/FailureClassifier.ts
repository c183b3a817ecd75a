import {
    BackendError,
    InvocationFailedError,
    TimeoutError,
    ValidationError,
} from "../core/errors.js"
import type { FailureKind } from "../types.js"

const NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNREFUSED",
    "ENOTFOUND",
    "EAI_AGAIN",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "EPIPE",
])

function errorCode(error: Error): string | undefined {
    if ("code" in error && typeof error.code === "string") return error.code
    return undefined
}

function httpStatus(error: Error): number | undefined {
    if ("status" in error && typeof error.status === "number") {
        return error.status
    }
    return undefined
}

function fromStatus(status: number): FailureKind | null {
    if (status === 401 || status === 403) return "credentials_absent"
    if (status === 404) return "backend_unavailable"
    if (status === 408) return "timeout"
    if (status === 429) return "rate_limited"
    if (status === 400 || status === 422) return "validation_failure"
    if (status >= 500) return "backend_crash"
    return null
}

function fromMessage(message: string): FailureKind | null {
    const msg = message.toLowerCase()
    if (msg.includes("429") || msg.includes("rate limit")) return "rate_limited"
    if (msg.includes("timed out") || msg.includes("timeout")) return "timeout"
    if (
        msg.includes("api key") ||
        msg.includes("unauthorized") ||
        msg.includes("401") ||
        msg.includes("credential")
    ) {
        return "credentials_absent"
    }
    if (
        msg.includes("econnreset") ||
        msg.includes("socket hang up") ||
        msg.includes("network")
    ) {
        return "network_failure"
    }
    if (msg.includes("not installed") || msg.includes("command not found")) {
        return "backend_unavailable"
    }
    return null
}

/** Map any thrown value onto the fixed failure taxonomy. */
export function classifyFailure(error: unknown): FailureKind {
    if (!(error instanceof Error)) {
        return fromMessage(String(error)) ?? "backend_crash"
    }
    if (error instanceof BackendError) return error.kind
    if (error instanceof InvocationFailedError) return "both_failed"
    if (error instanceof TimeoutError) return "timeout"
    if (error instanceof ValidationError) return "validation_failure"
    if (error.name === "AbortError") return "timeout"

    const code = errorCode(error)
    if (code === "ENOENT") return "backend_unavailable"
    if (code === "ETIMEDOUT") return "timeout"
    if (code !== undefined && NETWORK_CODES.has(code)) return "network_failure"

    const status = httpStatus(error)
    if (status !== undefined) {
        const kind = fromStatus(status)
        if (kind) return kind
    }

    return fromMessage(error.message) ?? "backend_crash"
}
