import { describe, expect, it } from "vitest"

import { ContextStore } from "../context/ContextStore.js"
import {
    ContextArchivedError,
    ContextExpiredError,
    ContextFormatError,
    NotFoundError,
    ValidationError,
    WriteConflictError,
} from "../core/errors.js"
import { MemoryStore } from "../persistence/MemoryStore.js"

function fixedClock(start: string) {
    let now = Date.parse(start)
    return {
        clock: (): Date => new Date(now),
        advance(ms: number): void {
            now += ms
        },
    }
}

describe("ContextStore", () => {
    it("should create a context at version 0 with defaults", () => {
        const { clock } = fixedClock("2026-01-01T00:00:00.000Z")
        const store = new ContextStore(new MemoryStore(), { clock })
        const ctx = store.create({ task: "summarize", artifacts: { seed: 1 } })

        expect(ctx.version).toBe(0)
        expect(ctx.task).toBe("summarize")
        expect(ctx.phase).toBe("created")
        expect(ctx.get("seed")).toBe(1)
        expect(ctx.metadata).toEqual({
            createdAt: "2026-01-01T00:00:00.000Z",
            updatedAt: "2026-01-01T00:00:00.000Z",
            version: 0,
            ttlMs: 24 * 60 * 60 * 1000,
            owner: "failsafe",
            priority: "normal",
        })
    })

    it("should reject a non-positive TTL", () => {
        const store = new ContextStore(new MemoryStore())
        expect(() => store.create({ task: "t", ttlMs: 0 })).toThrow(
            ValidationError
        )
    })

    it("should bump the version once per set or update", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })

        ctx.set("a", 1)
        ctx.update({ b: 2, c: 3 })
        ctx.setPhase("working")
        ctx.appendEvent({ unit: "x", kind: "unit_started" })

        expect(ctx.version).toBe(2)
        expect(ctx.artifacts).toEqual({ a: 1, b: 2, c: 3 })
    })

    it("should refuse an empty update", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        expect(() => ctx.update({})).toThrow(ValidationError)
        expect(ctx.version).toBe(0)
    })

    it("should return the default for a missing key", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        expect(ctx.get("missing")).toBeUndefined()
        expect(ctx.get("missing", "fallback")).toBe("fallback")
        expect(ctx.has("missing")).toBe(false)
    })

    it("should hand out snapshots detached from the live document", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        ctx.set("list", [1])

        const snapshot = ctx.snapshot()
        snapshot.artifacts.extra = true
        snapshot.completedUnits.push("ghost")

        expect(ctx.has("extra")).toBe(false)
        expect(ctx.completedUnits).toEqual([])
    })

    it("should keep nested artifact values out of reach of callers", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t", artifacts: { seed: { n: 1 } } })
        const written = { table: "users" }
        ctx.set("schema", written)

        written.table = "changed-after-set"
        const fromSnapshot = ctx.snapshot().artifacts.schema
        if (typeof fromSnapshot === "object" && fromSnapshot !== null) {
            Object.assign(fromSnapshot, { table: "changed-via-snapshot" })
        }
        const fromGet = ctx.get("schema")
        if (typeof fromGet === "object" && fromGet !== null) {
            Object.assign(fromGet, { table: "changed-via-get" })
        }
        const seed = ctx.get("seed")
        if (typeof seed === "object" && seed !== null) {
            Object.assign(seed, { n: 2 })
        }

        expect(ctx.get("schema")).toEqual({ table: "users" })
        expect(ctx.get("seed")).toEqual({ n: 1 })
        expect(ctx.version).toBe(1)
    })

    it("should refuse artifacts that cannot be copied", () => {
        const ctx = new ContextStore(new MemoryStore()).create({ task: "t" })

        expect(() => ctx.set("fn", () => 1)).toThrow(ValidationError)
        expect(ctx.has("fn")).toBe(false)
        expect(ctx.version).toBe(0)
    })

    it("should refuse writes once the TTL has passed", () => {
        const { clock, advance } = fixedClock("2026-01-01T00:00:00.000Z")
        const store = new ContextStore(new MemoryStore(), { clock })
        const ctx = store.create({ task: "t", ttlMs: 1000 })

        advance(1000)
        expect(ctx.isExpired()).toBe(false)
        ctx.set("a", 1)

        advance(1)
        expect(ctx.isExpired()).toBe(true)
        expect(() => ctx.set("b", 2)).toThrow(ContextExpiredError)
        expect(ctx.get("a")).toBe(1)
        expect(ctx.version).toBe(1)
    })

    it("should round-trip through serialize and deserialize", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t", owner: "ops", priority: "high" })
        ctx.set("report", { score: 7, tags: ["a", "b"] })
        ctx.appendDegradation({
            unit: "writer",
            failureKind: "timeout",
            degradedTo: "fake-secondary",
        })

        const restored = store.deserialize(store.serialize(ctx))

        expect(restored.snapshot()).toEqual(ctx.snapshot())
    })

    it("should fail to serialize artifacts JSON cannot hold", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        ctx.set("big", 10n)
        expect(() => store.serialize(ctx)).toThrow(ContextFormatError)
    })

    it("should reject malformed documents on deserialize", () => {
        const store = new ContextStore(new MemoryStore())
        expect(() => store.deserialize("{not json")).toThrow(ContextFormatError)
        expect(() => store.deserialize(JSON.stringify({ id: 1 }))).toThrow(
            ContextFormatError
        )
    })

    it("should save and load by id", async () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        ctx.set("a", 1)

        const handle = await store.save(ctx)
        const loaded = await store.load(ctx.id)

        expect(handle.version).toBe(1)
        expect(loaded.get("a")).toBe(1)
        expect(loaded.version).toBe(1)
    })

    it("should throw NotFoundError for an unknown id", async () => {
        const store = new ContextStore(new MemoryStore())
        await expect(store.load("nope")).rejects.toBeInstanceOf(NotFoundError)
    })

    it("should load archived contexts read-only", async () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })
        await store.save(ctx)
        await store.archive(ctx)

        const loaded = await store.load(ctx.id)

        expect(loaded.archived).toBe(true)
        expect(() => loaded.set("a", 1)).toThrow(ContextArchivedError)
        await expect(store.save(loaded)).rejects.toBeInstanceOf(
            ContextArchivedError
        )
    })

    it("should list expired contexts against the given time", async () => {
        const { clock } = fixedClock("2026-01-01T00:00:00.000Z")
        const store = new ContextStore(new MemoryStore(), { clock })
        const short = store.create({ task: "short", ttlMs: 1000 })
        const long = store.create({ task: "long", ttlMs: 60_000 })
        await store.save(short)
        await store.save(long)

        const expired = await store.listExpired(
            new Date("2026-01-01T00:00:05.000Z")
        )

        expect(expired).toEqual([short.id])
    })
})

describe("SharedContext concurrent writes", () => {
    it("should let the last writer win by default", () => {
        const store = new ContextStore(new MemoryStore())
        const ctx = store.create({ task: "t" })

        ctx.beginConcurrentSection()
        ctx.asWriter("a").set("shared", 1)
        ctx.asWriter("b").set("shared", 2)
        ctx.endConcurrentSection()

        expect(ctx.get("shared")).toBe(2)
        expect(ctx.version).toBe(2)
    })

    it("should reject a second writer under the reject policy", () => {
        const store = new ContextStore(new MemoryStore(), {
            conflictPolicy: "reject",
        })
        const ctx = store.create({ task: "t" })

        ctx.beginConcurrentSection()
        ctx.asWriter("a").set("shared", 1)
        ctx.asWriter("a").set("shared", 3)
        expect(() => ctx.asWriter("b").set("shared", 2)).toThrow(
            WriteConflictError
        )
        ctx.endConcurrentSection()

        expect(ctx.get("shared")).toBe(3)
        expect(ctx.version).toBe(2)
    })

    it("should stop tracking writers once the section closes", () => {
        const store = new ContextStore(new MemoryStore(), {
            conflictPolicy: "reject",
        })
        const ctx = store.create({ task: "t" })

        ctx.beginConcurrentSection()
        ctx.asWriter("a").set("shared", 1)
        ctx.endConcurrentSection()
        ctx.asWriter("b").set("shared", 2)

        expect(ctx.get("shared")).toBe(2)
    })
})
