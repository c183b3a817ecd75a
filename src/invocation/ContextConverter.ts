import type { ContextData } from "../types.js"

/** Longest artifact rendering kept in a fallback prompt. */
export const MAX_ARTIFACT_CHARS = 8_000

export interface ConvertedContext {
    prompt: string
    /** True when any artifact was truncated or summarized. */
    lossy: boolean
    /** Artifact keys that could not be rendered as JSON. */
    unconvertible: string[]
}

function renderJson(value: unknown): string | null {
    try {
        const json = JSON.stringify(value, null, 2)
        return typeof json === "string" ? json : null
    } catch {
        return null
    }
}

/** A short description of a value JSON cannot carry. */
export function describeValue(value: unknown): string {
    if (value === undefined) return "undefined"
    if (typeof value === "function") {
        return `function ${value.name || "(anonymous)"}`
    }
    if (typeof value === "bigint") return `bigint ${value.toString()}`
    if (typeof value === "symbol") return value.toString()
    if (Array.isArray(value)) return `array of ${value.length} item(s)`
    if (typeof value === "object" && value !== null) {
        const keys = Object.keys(value)
        const type = value.constructor?.name ?? "object"
        return keys.length > 0
            ? `${type} with keys: ${keys.join(", ")}`
            : `${type} with no keys`
    }
    return String(value)
}

/**
 * Flatten a context snapshot into one prompt for a text-only backend.
 * Artifacts JSON cannot carry are replaced by a description and reported
 * in `unconvertible`; long renderings are cut at {@link MAX_ARTIFACT_CHARS}.
 */
export function convertContext(
    snapshot: ContextData,
    unitName: string,
    task: string
): ConvertedContext {
    const unconvertible: string[] = []
    let lossy = false
    const sections: string[] = []

    for (const [key, value] of Object.entries(snapshot.artifacts)) {
        const json = renderJson(value)
        if (json === null) {
            unconvertible.push(key)
            lossy = true
            sections.push(`## ${key} (summary)\n${describeValue(value)}`)
            continue
        }
        let body = json
        if (body.length > MAX_ARTIFACT_CHARS) {
            const dropped = body.length - MAX_ARTIFACT_CHARS
            body = `${body.slice(0, MAX_ARTIFACT_CHARS)}\n... [truncated ${dropped} chars]`
            lossy = true
        }
        sections.push(`## ${key}\n\`\`\`json\n${body}\n\`\`\``)
    }

    const completed =
        snapshot.completedUnits.length > 0
            ? snapshot.completedUnits.join(", ")
            : "(none)"

    const prompt = [
        `# Task\n${task}`,
        `# Agent\n${unitName}`,
        `# Workflow goal\n${snapshot.task}`,
        `# Progress\nPhase: ${snapshot.phase}\nCompleted agents: ${completed}`,
        `# Artifacts\n${sections.length > 0 ? sections.join("\n\n") : "(none)"}`,
        "# Response format\nReturn your result as a JSON object inside a ```json fenced block. Add a short explanation outside the block if needed.",
    ].join("\n\n")

    return { prompt, lossy, unconvertible }
}
