/**
 * Durable key/value storage for serialized contexts, addressed by context id.
 * Payloads are opaque strings; `expiresAt` is kept beside each payload so
 * expired entries can be listed without parsing them.
 */
export interface ContextPersistence {
    /** Directory or URI the store writes to, when it has one. */
    readonly location?: string
    write(id: string, payload: string, expiresAt: string): Promise<void>
    read(id: string): Promise<string | null>
    delete(id: string): Promise<boolean>
    listExpired(now: Date): Promise<string[]>
    /** Move a live entry to cold storage. Returns false when the id is unknown. */
    archive(id: string): Promise<boolean>
    readArchived(id: string): Promise<string | null>
}

const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/

export function isValidStoreId(id: string): boolean {
    return ID_PATTERN.test(id)
}
