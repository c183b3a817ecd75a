import { log } from "../core/Logger.js"
import { isRecord } from "../backends/types.js"
import type { StructuredResult } from "../backends/types.js"

const FENCE = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/gi

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text)
    } catch {
        return undefined
    }
}

function asStructured(value: unknown): StructuredResult | null {
    if (isRecord(value)) return value
    if (Array.isArray(value)) return { items: value }
    return null
}

/** Index just past the bracket that closes the one at `start`, or -1. */
function matchingClose(text: string, start: number): number {
    const stack: string[] = []
    let inString = false
    let escaped = false

    for (let i = start; i < text.length; i++) {
        const ch = text[i]
        if (inString) {
            if (escaped) escaped = false
            else if (ch === "\\") escaped = true
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === "{") stack.push("}")
        else if (ch === "[") stack.push("]")
        else if (ch === "}" || ch === "]") {
            if (stack.pop() !== ch) return -1
            if (stack.length === 0) return i + 1
        }
    }
    return -1
}

function firstBalancedIsland(text: string): StructuredResult | null {
    for (let i = 0; i < text.length; i++) {
        const ch = text[i]
        if (ch !== "{" && ch !== "[") continue
        const end = matchingClose(text, i)
        if (end === -1) continue
        const structured = asStructured(parseJson(text.slice(i, end)))
        if (structured) return structured
    }
    return null
}

/**
 * Pull structured data out of a free-text answer: a fenced JSON block
 * first, then the first balanced object or array that parses. Anything
 * else comes back whole as `{ text }`. A top-level array is wrapped as
 * `{ items }`.
 */
export function extractStructured(text: string): StructuredResult {
    for (const match of text.matchAll(FENCE)) {
        const structured = asStructured(parseJson((match[1] ?? "").trim()))
        if (structured) return structured
    }

    const island = firstBalancedIsland(text)
    if (island) return island

    log.invoke("No structured data in fallback output; keeping raw text")
    return { text: text.trim() }
}
