import { EventEmitter } from "node:events"

import type { FailsafeEvent } from "./types.js"

type EventHandler = (event: FailsafeEvent) => void

export class EventBus {
    private emitter: EventEmitter = new EventEmitter()

    public on(handler: EventHandler): void {
        this.emitter.on("event", handler)
    }

    public emit(event: FailsafeEvent): void {
        this.emitter.emit("event", event)
    }

    public off(handler: EventHandler): void {
        this.emitter.off("event", handler)
    }

    public removeAllListeners(): void {
        this.emitter.removeAllListeners("event")
    }
}
