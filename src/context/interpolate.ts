import type { SharedContext } from "./SharedContext.js"

const PLACEHOLDER = /\$\{([^{}\s]+)\}/g

function render(value: unknown): string {
    if (typeof value === "string") return value
    try {
        return JSON.stringify(value) ?? String(value)
    } catch {
        return String(value)
    }
}

/**
 * Replace `${key}` with the artifact stored under `key`. Strings go in as
 * they are, other values as JSON. Placeholders naming a missing artifact
 * are left in place.
 */
export function interpolate(template: string, ctx: SharedContext): string {
    return template.replace(PLACEHOLDER, (placeholder, key: string) =>
        ctx.has(key) ? render(ctx.get(key)) : placeholder
    )
}
