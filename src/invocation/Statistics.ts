import type {
    FailureKind,
    StatisticsCounters,
    StatisticsSnapshot,
} from "../types.js"

function emptyCounters(): StatisticsCounters {
    return {
        totalInvocations: 0,
        primarySuccesses: 0,
        primaryFailures: 0,
        degradedInvocations: 0,
        failureKindCounts: {},
        unitFailureCounts: {},
    }
}

function rate(part: number, total: number): number {
    return total === 0 ? 0 : part / total
}

/**
 * Aggregate counters over every invocation since the last reset.
 * Updates are synchronous, so concurrent invocations never lose a count.
 */
export class StatisticsTracker {
    private counters: StatisticsCounters = emptyCounters()
    private degradeCounts = new Map<string, number>()

    public recordPrimarySuccess(): void {
        this.counters.totalInvocations++
        this.counters.primarySuccesses++
    }

    /**
     * An invocation answered by the secondary. `primaryAttempted` is false
     * when health readiness sent it there without trying the primary.
     * @returns how often `unit` has degraded in this window, this one included
     */
    public recordDegraded(
        unit: string,
        kind: FailureKind,
        primaryAttempted: boolean
    ): number {
        this.counters.totalInvocations++
        if (primaryAttempted) this.counters.primaryFailures++
        this.counters.degradedInvocations++
        this.countKind(kind)
        this.countUnitFailure(unit)

        const count = (this.degradeCounts.get(unit) ?? 0) + 1
        this.degradeCounts.set(unit, count)
        return count
    }

    /** An invocation that produced no result; `primaryFailed` is false when the primary was never reached. */
    public recordFailure(
        unit: string,
        kinds: FailureKind[],
        primaryFailed: boolean
    ): void {
        this.counters.totalInvocations++
        if (primaryFailed) this.counters.primaryFailures++
        for (const kind of kinds) this.countKind(kind)
        this.countUnitFailure(unit)
    }

    /** A failure noticed on the way that did not end the invocation. */
    public recordKind(kind: FailureKind): void {
        this.countKind(kind)
    }

    public getCounters(): StatisticsCounters {
        return {
            ...this.counters,
            failureKindCounts: { ...this.counters.failureKindCounts },
            unitFailureCounts: { ...this.counters.unitFailureCounts },
        }
    }

    public snapshot(): StatisticsSnapshot {
        const counters = this.getCounters()
        return {
            ...counters,
            fallbackRate: rate(
                counters.degradedInvocations,
                counters.totalInvocations
            ),
            primarySuccessRate: rate(
                counters.primarySuccesses,
                counters.totalInvocations
            ),
        }
    }

    public reset(): void {
        this.counters = emptyCounters()
        this.degradeCounts.clear()
    }

    private countKind(kind: FailureKind): void {
        const counts = this.counters.failureKindCounts
        counts[kind] = (counts[kind] ?? 0) + 1
    }

    private countUnitFailure(unit: string): void {
        const counts = this.counters.unitFailureCounts
        counts[unit] = (counts[unit] ?? 0) + 1
    }
}
