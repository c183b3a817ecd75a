import {
    mkdir,
    readdir,
    readFile,
    rename,
    rm,
    writeFile,
} from "node:fs/promises"
import { dirname, join } from "node:path"

import { PersistenceError, ValidationError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { ContextPersistence } from "./types.js"
import { isValidStoreId } from "./types.js"

const LIVE_DIR = "contexts"
const ARCHIVE_DIR = "archive"
const META_SUFFIX = ".meta.json"

interface EntryMeta {
    expiresAt: string
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

/**
 * Contexts live under `<base>/contexts/<id>.json` with a `<id>.meta.json`
 * sidecar holding the expiry; archived ones move to `<base>/archive/`.
 * Every write goes through a temp file and a rename.
 */
export class FileStore implements ContextPersistence {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public get location(): string {
        return this.basePath
    }

    public async write(
        id: string,
        payload: string,
        expiresAt: string
    ): Promise<void> {
        this.assertId(id)
        const meta: EntryMeta = { expiresAt }
        await this.writeAtomic(this.livePath(id), payload)
        await this.writeAtomic(
            this.metaPath(id),
            JSON.stringify(meta, null, 2)
        )
    }

    public async read(id: string): Promise<string | null> {
        this.assertId(id)
        return this.readOptional(this.livePath(id))
    }

    public async delete(id: string): Promise<boolean> {
        this.assertId(id)
        const existed = (await this.readOptional(this.livePath(id))) !== null
        await rm(this.livePath(id), { force: true })
        await rm(this.metaPath(id), { force: true })
        return existed
    }

    public async listExpired(now: Date): Promise<string[]> {
        let entries: string[]
        try {
            entries = await readdir(join(this.basePath, LIVE_DIR))
        } catch (error) {
            if (isErrnoException(error) && error.code === "ENOENT") return []
            throw new PersistenceError(
                `Failed to list contexts: ${describe(error)}`,
                error instanceof Error ? error : undefined
            )
        }

        const expired: string[] = []
        for (const entry of entries) {
            if (!entry.endsWith(META_SUFFIX)) continue
            const id = entry.slice(0, -META_SUFFIX.length)
            const raw = await this.readOptional(this.metaPath(id))
            if (raw === null) continue
            const expiresAt = parseExpiry(raw)
            if (expiresAt === null) {
                log.persistence("Ignoring unreadable metadata for %s", id)
                continue
            }
            if (expiresAt < now.getTime()) expired.push(id)
        }
        return expired.sort()
    }

    public async archive(id: string): Promise<boolean> {
        this.assertId(id)
        const payload = await this.readOptional(this.livePath(id))
        if (payload === null) return false
        await mkdir(join(this.basePath, ARCHIVE_DIR), { recursive: true })
        try {
            await rename(this.livePath(id), this.archivePath(id))
        } catch (error) {
            log.persistence("Failed to archive %s: %s", id, describe(error))
            throw new PersistenceError(
                `Failed to archive ${id}: ${describe(error)}`,
                error instanceof Error ? error : undefined
            )
        }
        await rm(this.metaPath(id), { force: true })
        return true
    }

    public async readArchived(id: string): Promise<string | null> {
        this.assertId(id)
        return this.readOptional(this.archivePath(id))
    }

    private async writeAtomic(filePath: string, content: string): Promise<void> {
        const tempPath = `${filePath}.tmp.${Date.now()}`
        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence("Failed to write %s: %s", filePath, describe(error))
            throw new PersistenceError(
                `Failed to write ${filePath}: ${describe(error)}`,
                error instanceof Error ? error : undefined
            )
        }
    }

    private async readOptional(filePath: string): Promise<string | null> {
        try {
            return await readFile(filePath, "utf-8")
        } catch (error) {
            if (isErrnoException(error) && error.code === "ENOENT") {
                return null
            }
            log.persistence("Failed to read %s: %s", filePath, describe(error))
            throw new PersistenceError(
                `Failed to read ${filePath}: ${describe(error)}`,
                error instanceof Error ? error : undefined
            )
        }
    }

    private assertId(id: string): void {
        if (!isValidStoreId(id)) {
            throw new ValidationError(`Invalid context id: "${id}"`)
        }
    }

    private livePath(id: string): string {
        return join(this.basePath, LIVE_DIR, `${id}.json`)
    }

    private metaPath(id: string): string {
        return join(this.basePath, LIVE_DIR, `${id}${META_SUFFIX}`)
    }

    private archivePath(id: string): string {
        return join(this.basePath, ARCHIVE_DIR, `${id}.json`)
    }
}

function parseExpiry(raw: string): number | null {
    try {
        const parsed: unknown = JSON.parse(raw)
        if (
            typeof parsed === "object" &&
            parsed !== null &&
            "expiresAt" in parsed &&
            typeof parsed.expiresAt === "string"
        ) {
            const time = Date.parse(parsed.expiresAt)
            return Number.isNaN(time) ? null : time
        }
        return null
    } catch {
        return null
    }
}
