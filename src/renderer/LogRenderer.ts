import type { EventBus } from "../events/EventBus.js"
import type { FailsafeEvent } from "../events/types.js"
import { formatDuration, truncate } from "./format.js"
import type { Renderer } from "./types.js"

type LineWriter = (line: string) => void

const writeStdout: LineWriter = (line) => {
    process.stdout.write(line)
}

export class LogRenderer implements Renderer {
    private readonly write: LineWriter
    private readonly now: () => number
    private bus: EventBus | null = null
    private handler: ((event: FailsafeEvent) => void) | null = null
    private startedAt = 0

    constructor(options: { write?: LineWriter; now?: () => number } = {}) {
        this.write = options.write ?? writeStdout
        this.now = options.now ?? Date.now
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: FailsafeEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.bus = null
        this.handler = null
    }

    private handleEvent(event: FailsafeEvent): void {
        const line = formatEvent(event)
        if (line) {
            const elapsed = this.formatElapsed()
            this.write(`[${elapsed}] ${line}\n`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = this.now()
        const seconds = (this.now() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }
}

export function formatEvent(event: FailsafeEvent): string | null {
    switch (event.type) {
        case "workflow:start":
            return `workflow:start  ${event.strategy}  ${event.runId.slice(0, 8)}  "${truncate(event.task, 60)}"  [${event.units.join(", ")}]`
        case "workflow:complete":
            return `workflow:done   ${event.status}${event.cancelled ? " (cancelled)" : ""}  ${formatDuration(event.duration)}`
        case "workflow:cancelled":
            return `workflow:cancel ${event.runId.slice(0, 8)}`
        case "unit:start":
            return `unit:start      ${pad(event.unit)}`
        case "unit:complete":
            return `unit:complete   ${pad(event.unit)}  ${event.status}  ${formatDuration(event.duration)}${event.error ? `  "${truncate(event.error, 60)}"` : ""}`
        case "unit:retry":
            return `unit:retry      ${pad(event.unit)}  attempt ${event.attempt}/${event.maxRetries}  "${truncate(event.reason, 60)}"`
        case "unit:skipped":
            return `unit:skipped    ${pad(event.unit)}  ${event.reason}`
        case "invoke:failure":
            return `invoke:failure  ${pad(event.unit)}  ${event.backend}  ${event.kind}`
        case "invoke:degrade":
            return `invoke:degrade  ${pad(event.unit)}  ${event.kind} → ${event.degradedTo}`
        case "alert:repeated_failure":
            return `alert           ${pad(event.unit)}  degraded ${event.degradeCount}x (threshold ${event.threshold}, last ${event.lastFailureKind})`
        case "health:report":
            return `health          ${event.report.overall}  primary ${event.report.readyForPrimary ? "ready" : "not ready"}`
        case "context:archived":
            return `context:archive ${event.contextId}`
        case "invoke:attempt":
        case "invoke:complete":
            return null
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}
