import Anthropic from "@anthropic-ai/sdk"

import { DEFAULT_PRIMARY_MODEL } from "../core/Config.js"
import { BackendError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { CheckResult, ContextData, FailureKind } from "../types.js"
import type { PrimaryBackend, StructuredResult } from "./types.js"
import { isRecord } from "./types.js"

const BACKEND_NAME = "anthropic"
const SUBMIT_TOOL = "submit_result"

const SYSTEM_PROMPT = `You are one agent in a multi-agent workflow. You receive a task and the shared workflow context (artifacts produced by earlier agents).
Do the task, then call ${SUBMIT_TOOL} exactly once with your structured result.
Only use the capabilities listed as permitted.`

export interface AnthropicBackendOptions {
    apiKey?: string
    model?: string
    maxTokens?: number
    temperature?: number
    /** Injected client, for tests and custom transports. */
    client?: Anthropic
}

export class AnthropicBackend implements PrimaryBackend {
    public readonly kind = "primary" as const
    public readonly name = BACKEND_NAME
    public readonly endpointHost = "api.anthropic.com"
    private readonly apiKey?: string
    private readonly model: string
    private readonly maxTokens: number
    private readonly temperature: number
    private readonly client: Anthropic | null

    constructor(options: AnthropicBackendOptions = {}) {
        this.apiKey = options.apiKey
        this.model = options.model ?? DEFAULT_PRIMARY_MODEL
        this.maxTokens = options.maxTokens ?? 8192
        this.temperature = options.temperature ?? 0.2
        this.client =
            options.client ??
            (options.apiKey ? new Anthropic({ apiKey: options.apiKey }) : null)
    }

    public hasCredentials(): boolean {
        return this.client !== null
    }

    public async call(
        task: string,
        snapshot: ContextData,
        toolPermissions: string[],
        signal?: AbortSignal
    ): Promise<StructuredResult> {
        const client = this.requireClient()
        try {
            const response = await client.messages.create(
                {
                    model: this.model,
                    system: SYSTEM_PROMPT,
                    max_tokens: this.maxTokens,
                    temperature: this.temperature,
                    messages: [
                        {
                            role: "user",
                            content: buildUserMessage(
                                task,
                                snapshot,
                                toolPermissions
                            ),
                        },
                    ],
                    tools: [SUBMIT_RESULT_TOOL],
                    tool_choice: { type: "tool", name: SUBMIT_TOOL },
                },
                { signal }
            )

            for (const block of response.content) {
                if (block.type === "tool_use" && block.name === SUBMIT_TOOL) {
                    if (isRecord(block.input)) return block.input
                }
            }

            throw new BackendError(
                BACKEND_NAME,
                "backend_crash",
                `Anthropic response carried no ${SUBMIT_TOOL} call (stop reason: ${response.stop_reason ?? "none"})`
            )
        } catch (error) {
            throw toBackendError(error)
        }
    }

    public async probe(signal?: AbortSignal): Promise<CheckResult> {
        if (!this.client) {
            return { status: "critical", message: "No Anthropic API key" }
        }
        try {
            await this.client.models.list({ limit: 1 }, { signal })
            return { status: "healthy", message: "Anthropic API reachable" }
        } catch (error) {
            const backendError = toBackendError(error)
            log.backend("Anthropic probe failed: %s", backendError.message)
            return {
                status:
                    backendError.kind === "rate_limited" ? "warning" : "critical",
                message: `${backendError.kind}: ${backendError.message}`,
            }
        }
    }

    private requireClient(): Anthropic {
        if (!this.client) {
            throw new BackendError(
                BACKEND_NAME,
                "credentials_absent",
                "ANTHROPIC_API_KEY is not configured"
            )
        }
        return this.client
    }
}

const SUBMIT_RESULT_TOOL: Anthropic.Tool = {
    name: SUBMIT_TOOL,
    description: "Submit the structured result of the task.",
    input_schema: {
        type: "object",
        properties: {
            status: {
                type: "string",
                enum: ["completed", "needs_review"],
                description: "Whether the task is done",
            },
            summary: {
                type: "string",
                description: "One-paragraph summary of what was done",
            },
            result: {
                type: "object",
                description: "Structured output of the task",
            },
        },
        required: ["status", "summary"],
    },
}

function buildUserMessage(
    task: string,
    snapshot: ContextData,
    toolPermissions: string[]
): string {
    const permissions =
        toolPermissions.length > 0 ? toolPermissions.join(", ") : "(none)"
    return [
        `## Task\n${task}`,
        `## Workflow goal\n${snapshot.task}`,
        `## Completed agents\n${snapshot.completedUnits.join(", ") || "(none)"}`,
        `## Artifacts\n${safeJson(snapshot.artifacts)}`,
        `## Permitted capabilities\n${permissions}`,
    ].join("\n\n")
}

function safeJson(value: unknown): string {
    try {
        return JSON.stringify(value, null, 2)
    } catch {
        return "(artifacts could not be serialized)"
    }
}

function kindFor(error: unknown): FailureKind | null {
    if (
        error instanceof Anthropic.AuthenticationError ||
        error instanceof Anthropic.PermissionDeniedError
    ) {
        return "credentials_absent"
    }
    if (error instanceof Anthropic.RateLimitError) return "rate_limited"
    if (error instanceof Anthropic.APIConnectionTimeoutError) return "timeout"
    if (error instanceof Anthropic.APIConnectionError) return "network_failure"
    if (error instanceof Anthropic.InternalServerError) return "backend_crash"
    if (error instanceof Anthropic.NotFoundError) return "backend_unavailable"
    if (
        error instanceof Anthropic.BadRequestError ||
        error instanceof Anthropic.UnprocessableEntityError
    ) {
        return "validation_failure"
    }
    return null
}

function toBackendError(error: unknown): BackendError {
    if (error instanceof BackendError) return error
    const message = error instanceof Error ? error.message : String(error)
    return new BackendError(
        BACKEND_NAME,
        kindFor(error) ?? "backend_crash",
        `Anthropic API error: ${message}`,
        error instanceof Error ? error : undefined
    )
}
