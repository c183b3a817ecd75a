import type { ContextPersistence } from "./types.js"

interface Entry {
    payload: string
    expiresAt: string
}

/** Process-local persistence for tests and short-lived embedding. */
export class MemoryStore implements ContextPersistence {
    private readonly live: Map<string, Entry> = new Map()
    private readonly archived: Map<string, string> = new Map()

    public write(id: string, payload: string, expiresAt: string): Promise<void> {
        this.live.set(id, { payload, expiresAt })
        return Promise.resolve()
    }

    public read(id: string): Promise<string | null> {
        return Promise.resolve(this.live.get(id)?.payload ?? null)
    }

    public delete(id: string): Promise<boolean> {
        return Promise.resolve(this.live.delete(id))
    }

    public listExpired(now: Date): Promise<string[]> {
        const expired: string[] = []
        for (const [id, entry] of this.live) {
            if (Date.parse(entry.expiresAt) < now.getTime()) expired.push(id)
        }
        return Promise.resolve(expired.sort())
    }

    public archive(id: string): Promise<boolean> {
        const entry = this.live.get(id)
        if (!entry) return Promise.resolve(false)
        this.archived.set(id, entry.payload)
        this.live.delete(id)
        return Promise.resolve(true)
    }

    public readArchived(id: string): Promise<string | null> {
        return Promise.resolve(this.archived.get(id) ?? null)
    }
}
