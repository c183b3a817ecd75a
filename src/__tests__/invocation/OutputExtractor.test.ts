import { describe, expect, it } from "vitest"

import { extractStructured } from "../../invocation/OutputExtractor.js"

describe("extractStructured", () => {
    it("should prefer a fenced JSON block", () => {
        const text = 'Here you go:\n```json\n{"verdict": "approve"}\n```\nThanks!'
        expect(extractStructured(text)).toEqual({ verdict: "approve" })
    })

    it("should skip fences that do not parse", () => {
        const text = '```json\n{broken\n```\n```\n{"second": true}\n```'
        expect(extractStructured(text)).toEqual({ second: true })
    })

    it("should wrap a top-level array", () => {
        expect(extractStructured("```json\n[1, 2]\n```")).toEqual({
            items: [1, 2],
        })
    })

    it("should find a bare object, braces inside strings included", () => {
        const text = 'Result {"ok": true, "note": "a } inside"} end'
        expect(extractStructured(text)).toEqual({
            ok: true,
            note: "a } inside",
        })
    })

    it("should move past brackets that are not JSON", () => {
        expect(extractStructured('[note] result {"x": 1}')).toEqual({ x: 1 })
    })

    it("should keep plain text as is", () => {
        expect(extractStructured("  just words  ")).toEqual({
            text: "just words",
        })
    })
})
