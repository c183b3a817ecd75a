import {
    ContextArchivedError,
    ContextExpiredError,
    errorMessage,
    toError,
    ValidationError,
    WriteConflictError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    ConflictPolicy,
    ContextData,
    ContextEvent,
    ContextMetadata,
    DegradationRecord,
    UnitDescriptor,
} from "../types.js"

export const ORCHESTRATOR_WRITER = "orchestrator"

export interface SharedContextOptions {
    conflictPolicy?: ConflictPolicy
    clock?: () => Date
}

export type NewContextEvent = Omit<ContextEvent, "timestamp"> & {
    timestamp?: string
}

export type NewDegradationRecord = Omit<DegradationRecord, "timestamp"> & {
    timestamp?: string
}

/** Artifacts are stored and handed out as copies, so only `set`/`update` change them. */
export function cloneArtifact(key: string, value: unknown): unknown {
    try {
        return structuredClone(value)
    } catch (error) {
        throw new ValidationError(
            `Artifact "${key}" cannot be stored: ${errorMessage(error)}`,
            toError(error)
        )
    }
}

/**
 * State shared by every view of one context. Views differ only in the
 * writer name they stamp on artifact writes.
 */
class ContextCore {
    public readonly data: ContextData
    public readonly conflictPolicy: ConflictPolicy
    public readonly clock: () => Date
    /** key → writer, populated only while a concurrent section is open. */
    public sectionWriters: Map<string, string> | null = null
    public sectionDepth = 0

    constructor(data: ContextData, options: SharedContextOptions) {
        this.data = data
        this.conflictPolicy = options.conflictPolicy ?? "last_write_wins"
        this.clock = options.clock ?? ((): Date => new Date())
    }
}

/**
 * The live, versioned document one workflow run shares between its units.
 *
 * Every mutation is synchronous, so a `set` or `update` completes within a
 * single turn of the event loop and is atomic with respect to other units.
 * Only artifact writes (`set`, `update`) move the version; bookkeeping
 * (unit states, logs, phase) refreshes `updatedAt` alone.
 */
export class SharedContext {
    private readonly core: ContextCore
    private readonly writer: string

    private constructor(core: ContextCore, writer: string) {
        this.core = core
        this.writer = writer
    }

    public static fromData(
        data: ContextData,
        options: SharedContextOptions = {}
    ): SharedContext {
        return new SharedContext(
            new ContextCore(data, options),
            ORCHESTRATOR_WRITER
        )
    }

    /** A view of the same document whose artifact writes are attributed to `writer`. */
    public asWriter(writer: string): SharedContext {
        if (writer === this.writer) return this
        return new SharedContext(this.core, writer)
    }

    public get id(): string {
        return this.core.data.id
    }

    public get version(): number {
        return this.core.data.metadata.version
    }

    public get metadata(): ContextMetadata {
        return { ...this.core.data.metadata }
    }

    public get task(): string {
        return this.core.data.task
    }

    public get phase(): string {
        return this.core.data.phase
    }

    public get currentUnit(): string | null {
        return this.core.data.currentUnit
    }

    public get completedUnits(): string[] {
        return [...this.core.data.completedUnits]
    }

    public get artifacts(): Record<string, unknown> {
        return structuredClone(this.core.data.artifacts)
    }

    public get unitStates(): Record<string, UnitDescriptor> {
        const copy: Record<string, UnitDescriptor> = {}
        for (const [name, state] of Object.entries(this.core.data.unitStates)) {
            copy[name] = { ...state }
        }
        return copy
    }

    public get eventLog(): ContextEvent[] {
        return this.core.data.eventLog.map((event) => ({ ...event }))
    }

    public get degradationLog(): DegradationRecord[] {
        return this.core.data.degradationLog.map((record) => ({ ...record }))
    }

    public get archived(): boolean {
        return this.core.data.archived
    }

    public get conflictPolicy(): ConflictPolicy {
        return this.core.conflictPolicy
    }

    public get expiresAt(): string {
        const created = Date.parse(this.core.data.metadata.createdAt)
        return new Date(created + this.core.data.metadata.ttlMs).toISOString()
    }

    public isExpired(now: Date = this.core.clock()): boolean {
        const created = Date.parse(this.core.data.metadata.createdAt)
        return now.getTime() > created + this.core.data.metadata.ttlMs
    }

    public has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(
            this.core.data.artifacts,
            key
        )
    }

    /** A copy of the stored value; changing it leaves the document alone. */
    public get(key: string, defaultValue?: unknown): unknown {
        return this.has(key)
            ? structuredClone(this.core.data.artifacts[key])
            : defaultValue
    }

    public set(key: string, value: unknown): void {
        this.assertMutable()
        const stored = cloneArtifact(key, value)
        this.claimKeys([key])
        this.core.data.artifacts[key] = stored
        this.bumpVersion()
        log.context(
            "%s set %s on %s (v%d)",
            this.writer,
            key,
            this.id,
            this.version
        )
    }

    /** All keys land together under one version bump, or none do. */
    public update(partial: Record<string, unknown>): void {
        const keys = Object.keys(partial)
        if (keys.length === 0) {
            throw new ValidationError("update() needs at least one key")
        }
        this.assertMutable()
        const stored = keys.map((key) => cloneArtifact(key, partial[key]))
        this.claimKeys(keys)
        keys.forEach((key, i) => {
            this.core.data.artifacts[key] = stored[i]
        })
        this.bumpVersion()
        log.context(
            "%s updated %d key(s) on %s (v%d)",
            this.writer,
            keys.length,
            this.id,
            this.version
        )
    }

    public appendEvent(event: NewContextEvent): void {
        this.assertMutable()
        this.core.data.eventLog.push({
            timestamp: event.timestamp ?? this.now(),
            unit: event.unit,
            kind: event.kind,
            ...(event.detail !== undefined ? { detail: event.detail } : {}),
        })
        this.touch()
    }

    public appendDegradation(record: NewDegradationRecord): void {
        this.assertMutable()
        this.core.data.degradationLog.push({
            unit: record.unit,
            failureKind: record.failureKind,
            degradedTo: record.degradedTo,
            timestamp: record.timestamp ?? this.now(),
        })
        this.touch()
    }

    public setPhase(phase: string): void {
        this.assertMutable()
        this.core.data.phase = phase
        this.touch()
    }

    public setCurrentUnit(name: string | null): void {
        this.assertMutable()
        this.core.data.currentUnit = name
        this.touch()
    }

    public recordUnitState(descriptor: UnitDescriptor): void {
        this.assertMutable()
        this.core.data.unitStates[descriptor.name] = { ...descriptor }
        this.touch()
    }

    public markUnitCompleted(name: string): void {
        this.assertMutable()
        this.core.data.completedUnits.push(name)
        if (this.core.data.currentUnit === name) {
            this.core.data.currentUnit = null
        }
        this.touch()
    }

    /**
     * Open a section in which units run concurrently. Under the `reject`
     * policy a key may then be written by one unit only.
     * Sections nest; writers are tracked until the outermost one closes.
     */
    public beginConcurrentSection(): void {
        if (this.core.sectionDepth === 0) {
            this.core.sectionWriters = new Map()
        }
        this.core.sectionDepth++
    }

    public endConcurrentSection(): void {
        if (this.core.sectionDepth === 0) return
        this.core.sectionDepth--
        if (this.core.sectionDepth === 0) {
            this.core.sectionWriters = null
        }
    }

    /** Marks the document archived; it is read-only from then on. */
    public markArchived(): void {
        if (this.core.data.archived) return
        this.core.data.archived = true
        this.touch()
    }

    /** A detached copy of the document, safe to hand to other components. */
    public snapshot(): ContextData {
        const data = this.core.data
        return {
            id: data.id,
            metadata: { ...data.metadata },
            task: data.task,
            phase: data.phase,
            currentUnit: data.currentUnit,
            completedUnits: [...data.completedUnits],
            artifacts: structuredClone(data.artifacts),
            unitStates: this.unitStates,
            eventLog: this.eventLog,
            degradationLog: this.degradationLog,
            archived: data.archived,
        }
    }

    public toJSON(): ContextData {
        return this.snapshot()
    }

    private claimKeys(keys: string[]): void {
        const writers = this.core.sectionWriters
        if (!writers) return

        for (const key of keys) {
            const previous = writers.get(key)
            if (previous === undefined || previous === this.writer) continue
            if (this.core.conflictPolicy === "reject") {
                throw new WriteConflictError(key, this.writer, previous)
            }
            log.context(
                "Concurrent write to %s: %s replaces %s (last write wins)",
                key,
                this.writer,
                previous
            )
        }
        for (const key of keys) {
            writers.set(key, this.writer)
        }
    }

    private assertMutable(): void {
        if (this.core.data.archived) {
            throw new ContextArchivedError(this.id)
        }
        if (this.isExpired()) {
            throw new ContextExpiredError(this.id)
        }
    }

    private bumpVersion(): void {
        this.core.data.metadata.version++
        this.touch()
    }

    private touch(): void {
        this.core.data.metadata.updatedAt = this.now()
    }

    private now(): string {
        return this.core.clock().toISOString()
    }
}
