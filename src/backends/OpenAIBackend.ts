import OpenAI from "openai"

import { BackendError } from "../core/errors.js"
import type { FailureKind } from "../types.js"
import type { SecondaryBackend } from "./types.js"

const BACKEND_NAME = "openai"

const SYSTEM_PROMPT =
    "You are a fallback agent in a multi-agent workflow. Answer the task using the context given. When you can, include your result as a JSON object in a ```json fenced block."

export interface OpenAIBackendOptions {
    apiKey?: string
    model?: string
    maxTokens?: number
    temperature?: number
    client?: OpenAI
}

export class OpenAIBackend implements SecondaryBackend {
    public readonly kind = "secondary" as const
    public readonly name = BACKEND_NAME
    private readonly model: string
    private readonly maxTokens: number
    private readonly temperature: number
    private readonly client: OpenAI | null

    constructor(options: OpenAIBackendOptions = {}) {
        this.model = options.model ?? "gpt-4o-mini"
        this.maxTokens = options.maxTokens ?? 4096
        this.temperature = options.temperature ?? 0.2
        this.client =
            options.client ??
            (options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null)
    }

    public async call(prompt: string, signal?: AbortSignal): Promise<string> {
        if (!this.client) {
            throw new BackendError(
                BACKEND_NAME,
                "credentials_absent",
                "OPENAI_API_KEY is not configured"
            )
        }
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: "system", content: SYSTEM_PROMPT },
                        { role: "user", content: prompt },
                    ],
                    temperature: this.temperature,
                    max_completion_tokens: this.maxTokens,
                },
                { signal }
            )

            const content = response.choices[0]?.message.content
            if (!content) {
                throw new BackendError(
                    BACKEND_NAME,
                    "backend_crash",
                    "OpenAI returned an empty completion"
                )
            }
            return content
        } catch (error) {
            throw toBackendError(error)
        }
    }
}

function kindFor(error: unknown): FailureKind | null {
    if (
        error instanceof OpenAI.AuthenticationError ||
        error instanceof OpenAI.PermissionDeniedError
    ) {
        return "credentials_absent"
    }
    if (error instanceof OpenAI.RateLimitError) return "rate_limited"
    if (error instanceof OpenAI.APIConnectionTimeoutError) return "timeout"
    if (error instanceof OpenAI.APIConnectionError) return "network_failure"
    if (error instanceof OpenAI.InternalServerError) return "backend_crash"
    if (error instanceof OpenAI.NotFoundError) return "backend_unavailable"
    if (error instanceof OpenAI.BadRequestError) return "validation_failure"
    return null
}

function toBackendError(error: unknown): BackendError {
    if (error instanceof BackendError) return error
    const message = error instanceof Error ? error.message : String(error)
    return new BackendError(
        BACKEND_NAME,
        kindFor(error) ?? "backend_crash",
        `OpenAI API error: ${message}`,
        error instanceof Error ? error : undefined
    )
}
