import { writeFileSync } from "node:fs"

import chalk from "chalk"
import logUpdate from "log-update"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { FailsafeEvent } from "../events/types.js"
import type { WorkflowStatus } from "../types.js"
import { formatDuration, truncate } from "./format.js"
import type { Renderer, RenderNode, RenderNodeStatus } from "./types.js"

const STATUS_GLYPHS: Record<RenderNodeStatus, string> = {
    pending: chalk.dim("·"),
    running: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    failed: chalk.red("✗"),
    retrying: chalk.yellow("↻"),
    skipped: chalk.dim("–"),
}

const MAX_NOTES = 6

export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly runLogPath: string | undefined
    private bus: EventBus | null = null
    private handler: ((event: FailsafeEvent) => void) | null = null
    private nodes: RenderNode[] = []
    private unitToNode: Map<string, RenderNode> = new Map()
    private taskDescription = ""
    private strategy = ""
    private workflowStartedAt = 0
    private tickInterval: ReturnType<typeof setInterval> | null = null
    private finalStatus: WorkflowStatus | null = null
    private cancelled = false
    private alerts: string[] = []
    private lastRenderedOutput = ""

    constructor(options?: { verbose?: boolean; runLogPath?: string }) {
        this.verbose = options?.verbose ?? false
        this.runLogPath = options?.runLogPath
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
        this.stopTick()
        logUpdate.done()
        this.bus = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: FailsafeEvent): void {
        switch (event.type) {
            case "workflow:start":
                this.taskDescription = event.task
                this.strategy = event.strategy
                this.workflowStartedAt = Date.now()
                this.nodes = event.units.map((unit) => ({
                    id: unit,
                    label: unit,
                    status: "pending",
                    notes: [],
                }))
                this.unitToNode = new Map(
                    this.nodes.map((node) => [node.id, node])
                )
                this.startTick()
                break
            case "workflow:complete":
                this.finalStatus = event.status
                this.cancelled = event.cancelled
                this.stopTick()
                this.render()
                this.flushRunLog()
                return
            case "unit:start":
                this.updateNode(event.unit, (node) => {
                    node.status = "running"
                    node.startedAt = Date.now()
                })
                break
            case "unit:retry":
                this.updateNode(event.unit, (node) => {
                    node.status = "retrying"
                    node.retryInfo = {
                        attempt: event.attempt,
                        max: event.maxRetries,
                    }
                    this.addNote(node, `retry: ${event.reason}`)
                })
                break
            case "unit:complete":
                this.updateNode(event.unit, (node) => {
                    node.status = event.status
                    node.completedAt = Date.now()
                    node.error = event.error
                })
                break
            case "unit:skipped":
                this.updateNode(event.unit, (node) => {
                    node.status = "skipped"
                    this.addNote(node, `skipped (${event.reason})`)
                })
                break
            case "invoke:failure":
                this.updateNode(event.unit, (node) =>
                    this.addNote(node, `${event.backend} ${event.kind}`)
                )
                break
            case "invoke:degrade":
                this.updateNode(event.unit, (node) => {
                    node.degradedTo = event.degradedTo
                })
                break
            case "alert:repeated_failure":
                this.alerts.push(
                    `${event.unit} degraded ${event.degradeCount}x (last: ${event.lastFailureKind})`
                )
                break
            case "workflow:cancelled":
            case "invoke:attempt":
            case "invoke:complete":
            case "health:report":
            case "context:archived":
                break
        }
        this.render()
    }

    private updateNode(unit: string, apply: (node: RenderNode) => void): void {
        const node = this.unitToNode.get(unit)
        if (node) apply(node)
    }

    private addNote(node: RenderNode, note: string): void {
        node.notes.push(note)
        if (node.notes.length > MAX_NOTES) node.notes.shift()
    }

    private render(): void {
        const lines: string[] = []

        lines.push(
            `${chalk.bold.cyan("failsafe")}  ${chalk.dim(this.strategy)}  ${chalk.dim(this.taskDescription)}`
        )
        lines.push(chalk.dim("│"))

        for (let i = 0; i < this.nodes.length; i++) {
            const node = this.nodes[i]
            if (!node) continue
            const isLast = i === this.nodes.length - 1
            this.renderNode(node, lines, isLast ? "└" : "├", isLast ? " " : "│")
        }

        const done = this.nodes.filter(
            (node) => node.status === "completed"
        ).length
        const degraded = this.nodes.filter((node) => node.degradedTo).length
        const elapsedStr = this.workflowStartedAt
            ? formatDuration(Date.now() - this.workflowStartedAt)
            : ""

        lines.push(chalk.dim("│"))
        lines.push(
            chalk.dim(
                `${this.finalStatus ? "├" : "└"}─ ${done}/${this.nodes.length} units  ·  ${degraded} degraded${elapsedStr ? `  ·  ${elapsedStr}` : ""}`
            )
        )
        for (const alert of this.alerts) {
            lines.push(chalk.yellow(`│  ⚠ ${alert}`))
        }

        if (this.finalStatus) {
            lines.push(chalk.dim("│"))
            if (this.cancelled) {
                lines.push(chalk.yellow("╰─ Cancelled"))
            } else if (this.finalStatus === "completed") {
                lines.push(chalk.green("╰─ Completed"))
            } else if (this.finalStatus === "partial") {
                lines.push(chalk.yellow("╰─ Partially completed"))
            } else {
                lines.push(chalk.red("╰─ Failed"))
            }
        }

        const output = lines.join("\n")
        this.lastRenderedOutput = output
        logUpdate(output)
    }

    private flushRunLog(): void {
        if (!this.runLogPath) return
        try {
            const header = `Input: ${this.taskDescription}\n\n---\n\n`
            writeFileSync(
                this.runLogPath,
                header + this.lastRenderedOutput,
                "utf-8"
            )
        } catch (error) {
            log.app("Could not write run log: %s", errorMessage(error))
        }
    }

    private renderNode(
        node: RenderNode,
        lines: string[],
        connector: string,
        childPrefix: string
    ): void {
        const glyph = STATUS_GLYPHS[node.status]
        const elapsed = formatNodeElapsed(node)
        const retryTag = node.retryInfo
            ? chalk.yellow(`retry ${node.retryInfo.attempt}/${node.retryInfo.max}`)
            : ""
        const degradeTag = node.degradedTo
            ? chalk.magenta(`↓ ${node.degradedTo}`)
            : ""

        lines.push(
            [
                chalk.dim(`${connector}─`),
                glyph,
                node.label,
                elapsed ? chalk.dim(elapsed) : "",
                retryTag,
                degradeTag,
            ]
                .filter(Boolean)
                .join("  ")
        )

        const details: string[] = []
        if (this.verbose) details.push(...node.notes)
        if (node.error && node.status === "failed") {
            details.push(truncate(node.error, 100))
        }

        for (let i = 0; i < details.length; i++) {
            const detailConnector = i === details.length - 1 ? "└─" : "├─"
            lines.push(
                chalk.dim(`${childPrefix}  ${detailConnector} ${details[i]}`)
            )
        }
    }
}

function formatNodeElapsed(node: RenderNode): string {
    if (!node.startedAt) return ""
    const end = node.completedAt ?? Date.now()
    return formatDuration(end - node.startedAt)
}
