import type { FailureKind } from "../types.js"

export class FailsafeError extends Error {
    public readonly code: string
    public override readonly cause?: Error
    /** False when retrying cannot change the outcome. */
    public readonly retryable: boolean

    constructor(
        message: string,
        code: string,
        cause?: Error,
        retryable = true
    ) {
        super(message)
        this.name = "FailsafeError"
        this.code = code
        this.cause = cause
        this.retryable = retryable
    }
}

export class ConfigError extends FailsafeError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR", undefined, false)
        this.name = "ConfigError"
    }
}

export class ValidationError extends FailsafeError {
    constructor(message: string, cause?: Error) {
        super(message, "VALIDATION_ERROR", cause, false)
        this.name = "ValidationError"
    }
}

export class NotFoundError extends FailsafeError {
    public readonly id: string

    constructor(id: string) {
        super(`Context not found: ${id}`, "NOT_FOUND", undefined, false)
        this.name = "NotFoundError"
        this.id = id
    }
}

export class ContextExpiredError extends FailsafeError {
    public readonly contextId: string

    constructor(contextId: string) {
        super(
            `Context ${contextId} is past its TTL and cannot be modified`,
            "CONTEXT_EXPIRED",
            undefined,
            false
        )
        this.name = "ContextExpiredError"
        this.contextId = contextId
    }
}

export class ContextArchivedError extends FailsafeError {
    public readonly contextId: string

    constructor(contextId: string) {
        super(
            `Context ${contextId} is archived and read-only`,
            "CONTEXT_ARCHIVED",
            undefined,
            false
        )
        this.name = "ContextArchivedError"
        this.contextId = contextId
    }
}

export class ContextFormatError extends FailsafeError {
    constructor(message: string, cause?: Error) {
        super(message, "CONTEXT_FORMAT", cause, false)
        this.name = "ContextFormatError"
    }
}

export class WriteConflictError extends FailsafeError {
    public readonly key: string
    public readonly writer: string
    public readonly previousWriter: string

    constructor(key: string, writer: string, previousWriter: string) {
        super(
            `"${writer}" cannot overwrite "${key}": already written by "${previousWriter}" in this parallel run`,
            "WRITE_CONFLICT",
            undefined,
            false
        )
        this.name = "WriteConflictError"
        this.key = key
        this.writer = writer
        this.previousWriter = previousWriter
    }
}

export class UnitStateError extends FailsafeError {
    constructor(message: string) {
        super(message, "UNIT_STATE", undefined, false)
        this.name = "UnitStateError"
    }
}

export class UnitExecutionFailed extends FailsafeError {
    public readonly unit: string
    public readonly attempts: number
    public readonly lastError: Error

    constructor(unit: string, attempts: number, lastError: Error) {
        super(
            `Unit "${unit}" failed after ${attempts} attempt(s): ${lastError.message}`,
            "UNIT_FAILED",
            lastError,
            false
        )
        this.name = "UnitExecutionFailed"
        this.unit = unit
        this.attempts = attempts
        this.lastError = lastError
    }
}

export class TimeoutError extends FailsafeError {
    public readonly timeoutMs: number

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT")
        this.name = "TimeoutError"
        this.timeoutMs = timeoutMs
    }
}

/** A backend failure that already knows its place in the taxonomy. */
export class BackendError extends FailsafeError {
    public readonly kind: FailureKind
    public readonly backend: string

    constructor(
        backend: string,
        kind: FailureKind,
        message: string,
        cause?: Error
    ) {
        super(message, "BACKEND_ERROR", cause)
        this.name = "BackendError"
        this.kind = kind
        this.backend = backend
    }
}

export class InvocationFailedError extends FailsafeError {
    public readonly kind: FailureKind = "both_failed"
    public readonly unit: string
    public readonly primaryFailure: FailureKind

    constructor(
        unit: string,
        primaryFailure: FailureKind,
        secondaryError: Error
    ) {
        super(
            `Both backends failed for "${unit}" (primary: ${primaryFailure}; secondary: ${secondaryError.message})`,
            "BOTH_FAILED",
            secondaryError,
            false
        )
        this.name = "InvocationFailedError"
        this.unit = unit
        this.primaryFailure = primaryFailure
    }
}

export class PersistenceError extends FailsafeError {
    constructor(message: string, cause?: Error) {
        super(message, "PERSISTENCE_ERROR", cause)
        this.name = "PersistenceError"
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
