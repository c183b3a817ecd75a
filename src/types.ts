export type Priority = "low" | "normal" | "high" | "critical"

export type UnitState = "initialized" | "running" | "completed" | "failed"

export type FailureKind =
    | "backend_unavailable"
    | "credentials_absent"
    | "network_failure"
    | "timeout"
    | "backend_crash"
    | "context_conversion_failure"
    | "rate_limited"
    | "validation_failure"
    | "both_failed"

export type BackendRole = "primary" | "secondary"

export type HealthStatus = "healthy" | "warning" | "critical"

export type WorkflowStrategy = "sequential" | "parallel" | "conditional"

export type WorkflowStatus = "completed" | "partial" | "failed"

/** Same-key writes from concurrently running units. */
export type ConflictPolicy = "last_write_wins" | "reject"

export type ContextEventKind =
    | "workflow_started"
    | "workflow_completed"
    | "workflow_cancelled"
    | "unit_started"
    | "unit_retry"
    | "unit_completed"
    | "unit_failed"
    | "unit_skipped"

export interface ContextMetadata {
    createdAt: string
    updatedAt: string
    /** Incremented once per successful `set`/`update`; never written by callers. */
    version: number
    ttlMs: number
    owner: string
    priority: Priority
}

export interface ContextEvent {
    timestamp: string
    unit: string
    kind: ContextEventKind
    detail?: string
}

export interface DegradationRecord {
    unit: string
    failureKind: FailureKind
    degradedTo: string
    timestamp: string
}

export interface UnitDescriptor {
    name: string
    state: UnitState
    startedAt: string | null
    completedAt: string | null
    error: string | null
    retryCount: number
}

export interface ContextData {
    id: string
    metadata: ContextMetadata
    task: string
    phase: string
    currentUnit: string | null
    completedUnits: string[]
    artifacts: Record<string, unknown>
    unitStates: Record<string, UnitDescriptor>
    eventLog: ContextEvent[]
    degradationLog: DegradationRecord[]
    archived: boolean
}

export interface CreateContextOptions {
    task: string
    owner?: string
    priority?: Priority
    ttlMs?: number
    artifacts?: Record<string, unknown>
}

export interface SaveHandle {
    id: string
    version: number
    savedAt: string
}

export interface InvocationRecord {
    unit: string
    backendAttempted: BackendRole
    backendName: string
    failureKind: FailureKind | null
    retriesUsed: number
    degraded: boolean
    durationMs: number
    startedAt: string
}

export interface StatisticsCounters {
    totalInvocations: number
    primarySuccesses: number
    primaryFailures: number
    degradedInvocations: number
    failureKindCounts: Partial<Record<FailureKind, number>>
    unitFailureCounts: Record<string, number>
}

export interface StatisticsSnapshot extends StatisticsCounters {
    fallbackRate: number
    primarySuccessRate: number
}

export interface RepeatedFailureAlert {
    unit: string
    degradeCount: number
    threshold: number
    lastFailureKind: FailureKind
    timestamp: string
}

export interface CheckResult {
    status: HealthStatus
    message: string
}

export interface HealthReport {
    checks: Record<string, CheckResult>
    overall: HealthStatus
    readyForPrimary: boolean
    readyForSecondary: boolean
    generatedAt: string
}

export type UnitResult =
    | { ok: true; outcome: unknown }
    | { ok: false; error: string }

export interface WorkflowResult {
    runId: string
    contextId: string
    strategy: WorkflowStrategy
    status: WorkflowStatus
    agentsRun: string[]
    agentsCompleted: string[]
    agentsFailed: string[]
    agentsSkipped: string[]
    results: Record<string, UnitResult>
    error: string | null
    cancelled: boolean
    durationMs: number
}

export type RendererType = "terminal" | "log" | "none"

export type SecondaryProviderType = "openai" | "cli"

export interface FailsafeConfig {
    workingDirectory: string
    persistencePath?: string
    anthropicApiKey?: string
    openaiApiKey?: string
    primaryModel?: string
    secondaryProvider?: SecondaryProviderType
    secondaryModel?: string
    /** Command line for the `cli` secondary provider, e.g. `["cursor-agent", "-p"]`. */
    secondaryCommand?: string[]
    maxRetries?: number
    baseDelayMs?: number
    maxParallel?: number
    alertThreshold?: number
    ttlMs?: number
    unitTimeoutMs?: number
    primaryTimeoutMs?: number
    healthCacheTtlMs?: number
    conflictPolicy?: ConflictPolicy
    toolPermissions?: string[]
    renderer?: RendererType
    /** Where the terminal renderer leaves a copy of its final frame. */
    runLogPath?: string
    verbose?: boolean
}
