import { randomUUID } from "node:crypto"

import { DEFAULT_TTL_MS } from "../core/Config.js"
import {
    ContextArchivedError,
    ContextFormatError,
    NotFoundError,
    ValidationError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { ContextPersistence } from "../persistence/types.js"
import type {
    ConflictPolicy,
    ContextData,
    CreateContextOptions,
    SaveHandle,
} from "../types.js"
import { parseContextData, PRIORITIES } from "./contextSchema.js"
import { cloneArtifact, SharedContext } from "./SharedContext.js"

export interface ContextStoreOptions {
    conflictPolicy?: ConflictPolicy
    defaultTtlMs?: number
    defaultOwner?: string
    clock?: () => Date
}


export class ContextStore {
    private readonly persistence: ContextPersistence
    private readonly conflictPolicy: ConflictPolicy
    private readonly defaultTtlMs: number
    private readonly defaultOwner: string
    private readonly clock: () => Date

    constructor(
        persistence: ContextPersistence,
        options: ContextStoreOptions = {}
    ) {
        this.persistence = persistence
        this.conflictPolicy = options.conflictPolicy ?? "last_write_wins"
        this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS
        this.defaultOwner = options.defaultOwner ?? "failsafe"
        this.clock = options.clock ?? ((): Date => new Date())
    }

    public get location(): string | undefined {
        return this.persistence.location
    }

    /** Initial artifacts are part of the starting state and leave the version at 0. */
    public create(options: CreateContextOptions): SharedContext {
        const ttlMs = options.ttlMs ?? this.defaultTtlMs
        if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
            throw new ValidationError(`ttlMs must be positive, got ${ttlMs}`)
        }
        const priority = options.priority ?? "normal"
        if (!PRIORITIES.includes(priority)) {
            throw new ValidationError(`Unknown priority: ${String(priority)}`)
        }

        const now = this.clock().toISOString()
        const data: ContextData = {
            id: randomUUID(),
            metadata: {
                createdAt: now,
                updatedAt: now,
                version: 0,
                ttlMs,
                owner: options.owner ?? this.defaultOwner,
                priority,
            },
            task: options.task,
            phase: "created",
            currentUnit: null,
            completedUnits: [],
            artifacts: copyArtifacts(options.artifacts ?? {}),
            unitStates: {},
            eventLog: [],
            degradationLog: [],
            archived: false,
        }
        log.context("Created context %s for %s", data.id, data.metadata.owner)
        return this.wrap(data)
    }

    public serialize(ctx: SharedContext): string {
        try {
            return JSON.stringify(ctx.snapshot())
        } catch (error) {
            throw new ContextFormatError(
                `Context ${ctx.id} holds artifacts that cannot be serialized: ${error instanceof Error ? error.message : String(error)}`,
                error instanceof Error ? error : undefined
            )
        }
    }

    public deserialize(text: string): SharedContext {
        return this.wrap(parseContextData(text))
    }

    public async save(ctx: SharedContext): Promise<SaveHandle> {
        if (ctx.archived) {
            throw new ContextArchivedError(ctx.id)
        }
        const payload = this.serialize(ctx)
        await this.persistence.write(ctx.id, payload, ctx.expiresAt)
        log.persistence("Saved context %s at v%d", ctx.id, ctx.version)
        return {
            id: ctx.id,
            version: ctx.version,
            savedAt: this.clock().toISOString(),
        }
    }

    /** Live copies win; an archived copy loads read-only. */
    public async load(id: string): Promise<SharedContext> {
        const live = await this.persistence.read(id)
        if (live !== null) return this.deserialize(live)

        const archived = await this.persistence.readArchived(id)
        if (archived !== null) return this.deserialize(archived)

        throw new NotFoundError(id)
    }

    public async archive(ctx: SharedContext): Promise<void> {
        ctx.markArchived()
        await this.persistence.write(ctx.id, this.serialize(ctx), ctx.expiresAt)
        await this.persistence.archive(ctx.id)
        log.persistence("Archived context %s", ctx.id)
    }

    public async archiveById(id: string): Promise<SharedContext> {
        const ctx = await this.load(id)
        if (!ctx.archived) {
            await this.archive(ctx)
        }
        return ctx
    }

    public async delete(id: string): Promise<boolean> {
        return this.persistence.delete(id)
    }

    public async listExpired(now: Date = this.clock()): Promise<string[]> {
        return this.persistence.listExpired(now)
    }

    private wrap(data: ContextData): SharedContext {
        return SharedContext.fromData(data, {
            conflictPolicy: this.conflictPolicy,
            clock: this.clock,
        })
    }
}

function copyArtifacts(artifacts: Record<string, unknown>): Record<string, unknown> {
    const copy: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(artifacts)) {
        copy[key] = cloneArtifact(key, value)
    }
    return copy
}
