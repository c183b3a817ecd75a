import { ConfigError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { withTimeout } from "../core/timing.js"
import type { EventBus } from "../events/EventBus.js"
import type { CheckResult, HealthReport, HealthStatus } from "../types.js"

/**
 * `primary` checks gate only the primary backend; `shared` checks gate
 * both backends.
 */
export type CheckScope = "primary" | "shared"

export interface HealthCheck {
    name: string
    scope: CheckScope
    run(signal: AbortSignal): Promise<CheckResult>
}

export interface HealthEvaluatorOptions {
    checks: HealthCheck[]
    /** How long a report is reused; 0 re-runs the checks on every call. */
    cacheTtlMs?: number
    checkTimeoutMs?: number
    eventBus?: EventBus
    clock?: () => number
}

export interface HealthReportOptions {
    /** Ignore the cached report. */
    fresh?: boolean
}

const DEFAULT_CACHE_TTL_MS = 30_000
const DEFAULT_CHECK_TIMEOUT_MS = 5_000

const SEVERITY: Record<HealthStatus, number> = {
    healthy: 0,
    warning: 1,
    critical: 2,
}

export function worstStatus(statuses: HealthStatus[]): HealthStatus {
    let worst: HealthStatus = "healthy"
    for (const status of statuses) {
        if (SEVERITY[status] > SEVERITY[worst]) worst = status
    }
    return worst
}

/**
 * Runs a fixed, ordered battery of checks and condenses them into a
 * {@link HealthReport}. Concurrent callers share one evaluation.
 */
export class HealthEvaluator {
    private readonly checks: HealthCheck[]
    private readonly cacheTtlMs: number
    private readonly checkTimeoutMs: number
    private readonly eventBus?: EventBus
    private readonly clock: () => number
    private cached: { report: HealthReport; at: number } | null = null
    private inFlight: Promise<HealthReport> | null = null

    constructor(options: HealthEvaluatorOptions) {
        const names = new Set<string>()
        for (const check of options.checks) {
            if (names.has(check.name)) {
                throw new ConfigError(`Duplicate health check: ${check.name}`)
            }
            names.add(check.name)
        }
        this.checks = [...options.checks]
        this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS
        this.checkTimeoutMs = options.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS
        this.eventBus = options.eventBus
        this.clock = options.clock ?? Date.now
    }

    public get checkNames(): string[] {
        return this.checks.map((check) => check.name)
    }

    public async getHealthReport(
        options: HealthReportOptions = {}
    ): Promise<HealthReport> {
        if (!options.fresh && this.cached) {
            if (this.clock() - this.cached.at < this.cacheTtlMs) {
                return this.cached.report
            }
        }
        if (!this.inFlight) {
            this.inFlight = this.evaluate().finally(() => {
                this.inFlight = null
            })
        }
        return this.inFlight
    }

    public invalidate(): void {
        this.cached = null
    }

    private async evaluate(): Promise<HealthReport> {
        const checks: Record<string, CheckResult> = {}
        for (const check of this.checks) {
            checks[check.name] = await this.runCheck(check)
        }

        const statusesIn = (scopes: CheckScope[]): HealthStatus[] =>
            this.checks
                .filter((check) => scopes.includes(check.scope))
                .map((check) => checks[check.name]?.status ?? "critical")

        const report: HealthReport = {
            checks,
            overall: worstStatus(Object.values(checks).map((c) => c.status)),
            readyForPrimary:
                worstStatus(statusesIn(["primary", "shared"])) !== "critical",
            readyForSecondary: worstStatus(statusesIn(["shared"])) !== "critical",
            generatedAt: new Date(this.clock()).toISOString(),
        }

        this.cached = { report, at: this.clock() }
        log.health(
            "Health %s (primary ready: %s, secondary ready: %s)",
            report.overall,
            report.readyForPrimary,
            report.readyForSecondary
        )
        this.eventBus?.emit({ type: "health:report", report })
        return report
    }

    private async runCheck(check: HealthCheck): Promise<CheckResult> {
        try {
            return await withTimeout(
                (signal) => check.run(signal),
                this.checkTimeoutMs,
                `Health check "${check.name}"`
            )
        } catch (error) {
            const message = errorMessage(error)
            log.health("Check %s threw: %s", check.name, message)
            return { status: "critical", message }
        }
    }
}
