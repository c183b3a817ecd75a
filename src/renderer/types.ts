import type { EventBus } from "../events/EventBus.js"

export type RenderNodeStatus =
    | "pending"
    | "running"
    | "completed"
    | "failed"
    | "retrying"
    | "skipped"

export interface RenderNode {
    id: string
    label: string
    status: RenderNodeStatus
    startedAt?: number
    completedAt?: number
    retryInfo?: { attempt: number; max: number }
    /** Set once the unit fell back to the secondary backend. */
    degradedTo?: string
    error?: string
    notes: string[]
}

export interface CreateRendererOptions {
    verbose?: boolean
    runLogPath?: string
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
