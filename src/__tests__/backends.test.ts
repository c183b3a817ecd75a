import { describe, expect, it } from "vitest"

import { AnthropicBackend } from "../backends/AnthropicBackend.js"
import { CliBackend } from "../backends/CliBackend.js"
import { createSecondaryBackend } from "../backends/index.js"
import { OpenAIBackend } from "../backends/OpenAIBackend.js"
import { resolveConfig } from "../core/Config.js"
import { BackendError, ConfigError } from "../core/errors.js"
import { ContextStore } from "../context/ContextStore.js"
import { MemoryStore } from "../persistence/MemoryStore.js"

const snapshot = new ContextStore(new MemoryStore())
    .create({ task: "t" })
    .snapshot()

describe("AnthropicBackend", () => {
    it("should report missing credentials without calling out", async () => {
        const backend = new AnthropicBackend()

        expect(backend.hasCredentials()).toBe(false)
        await expect(backend.call("task", snapshot, [])).rejects.toMatchObject({
            kind: "credentials_absent",
            backend: "anthropic",
        })
        expect(await backend.probe()).toEqual({
            status: "critical",
            message: "No Anthropic API key",
        })
    })

    it("should count a key as credentials", () => {
        expect(new AnthropicBackend({ apiKey: "test-secret" }).hasCredentials()).toBe(
            true
        )
    })
})

describe("OpenAIBackend", () => {
    it("should refuse to run without a key", async () => {
        await expect(new OpenAIBackend().call("prompt")).rejects.toBeInstanceOf(
            BackendError
        )
    })
})

describe("CliBackend", () => {
    it("should pipe the prompt through the command", async () => {
        const backend = new CliBackend({
            command: [process.execPath, "-e", "process.stdin.pipe(process.stdout)"],
        })

        expect(await backend.call("hello from stdin")).toBe("hello from stdin")
    })

    it("should pass the prompt as an argument when asked", async () => {
        const backend = new CliBackend({
            command: [
                process.execPath,
                "-e",
                "process.stdout.write(process.argv.at(-1))",
            ],
            promptVia: "argument",
        })

        expect(await backend.call("as argument")).toBe("as argument")
    })

    it("should call a missing executable unavailable", async () => {
        const backend = new CliBackend({ command: ["failsafe-no-such-binary"] })

        await expect(backend.call("x")).rejects.toMatchObject({
            kind: "backend_unavailable",
            message: "failsafe-no-such-binary is not installed or not on PATH",
        })
    })

    it("should call empty output a crash", async () => {
        const backend = new CliBackend({
            command: [process.execPath, "-e", ""],
        })

        await expect(backend.call("x")).rejects.toMatchObject({
            kind: "backend_crash",
        })
    })

    it("should need a command", () => {
        expect(() => new CliBackend({ command: [] })).toThrow(ConfigError)
    })
})

describe("createSecondaryBackend", () => {
    it("should build the configured fallback", () => {
        const cli = createSecondaryBackend(
            resolveConfig({
                workingDirectory: "/tmp",
                secondaryProvider: "cli",
                secondaryCommand: ["agent-cli", "-p"],
            })
        )
        const openai = createSecondaryBackend(
            resolveConfig({ workingDirectory: "/tmp" })
        )

        expect(cli.name).toBe("cli:agent-cli")
        expect(openai.name).toBe("openai")
    })
})
