import { execa, ExecaError } from "execa"

import { BackendError, ConfigError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { SecondaryBackend } from "./types.js"

const OUTPUT_LIMIT = 200_000

export interface CliBackendOptions {
    /** Executable followed by its fixed arguments. */
    command: string[]
    /** `argument` appends the prompt as the last argument; `stdin` pipes it. */
    promptVia?: "argument" | "stdin"
    cwd?: string
    timeoutMs?: number
}

/**
 * Runs an external command-line agent and treats its stdout as the
 * free-text answer.
 */
export class CliBackend implements SecondaryBackend {
    public readonly kind = "secondary" as const
    public readonly name: string
    private readonly file: string
    private readonly args: string[]
    private readonly promptVia: "argument" | "stdin"
    private readonly cwd?: string
    private readonly timeoutMs: number

    constructor(options: CliBackendOptions) {
        const [file, ...args] = options.command
        if (!file) {
            throw new ConfigError("CliBackend needs a command to run")
        }
        this.file = file
        this.args = args
        this.name = `cli:${file}`
        this.promptVia = options.promptVia ?? "stdin"
        this.cwd = options.cwd
        this.timeoutMs = options.timeoutMs ?? 300_000
    }

    public async call(prompt: string, signal?: AbortSignal): Promise<string> {
        const args =
            this.promptVia === "argument" ? [...this.args, prompt] : this.args
        try {
            const result = await execa(this.file, args, {
                cwd: this.cwd,
                input: this.promptVia === "stdin" ? prompt : undefined,
                timeout: this.timeoutMs,
                cancelSignal: signal,
                stripFinalNewline: true,
            })
            const output = result.stdout.trim()
            if (!output) {
                throw new BackendError(
                    this.name,
                    "backend_crash",
                    `${this.file} produced no output`
                )
            }
            return output.length > OUTPUT_LIMIT
                ? output.slice(0, OUTPUT_LIMIT)
                : output
        } catch (error) {
            throw this.toBackendError(error)
        }
    }

    private toBackendError(error: unknown): BackendError {
        if (error instanceof BackendError) return error
        if (error instanceof ExecaError) {
            log.backend("%s failed: %s", this.file, error.shortMessage)
            if (error.timedOut) {
                return new BackendError(
                    this.name,
                    "timeout",
                    error.shortMessage,
                    error
                )
            }
            if (error.code === "ENOENT") {
                return new BackendError(
                    this.name,
                    "backend_unavailable",
                    `${this.file} is not installed or not on PATH`,
                    error
                )
            }
            const stderr =
                typeof error.stderr === "string" ? error.stderr.trim() : ""
            return new BackendError(
                this.name,
                "backend_crash",
                stderr ? `${error.shortMessage}: ${stderr}` : error.shortMessage,
                error
            )
        }
        const message = error instanceof Error ? error.message : String(error)
        return new BackendError(
            this.name,
            "backend_crash",
            message,
            error instanceof Error ? error : undefined
        )
    }
}
