import type { ResolvedConfig } from "../core/Config.js"
import { AnthropicBackend } from "./AnthropicBackend.js"
import { CliBackend } from "./CliBackend.js"
import { OpenAIBackend } from "./OpenAIBackend.js"
import type { PrimaryBackend, SecondaryBackend } from "./types.js"

/** A missing key is not an error here: the health battery reports it and the controller degrades. */
export function createPrimaryBackend(config: ResolvedConfig): PrimaryBackend {
    return new AnthropicBackend({
        apiKey: config.anthropicApiKey,
        model: config.primaryModel,
    })
}

export function createSecondaryBackend(config: ResolvedConfig): SecondaryBackend {
    switch (config.secondaryProvider) {
        case "openai":
            return new OpenAIBackend({
                apiKey: config.openaiApiKey,
                model: config.secondaryModel,
            })
        case "cli":
            return new CliBackend({
                command: config.secondaryCommand,
                cwd: config.workingDirectory,
                timeoutMs: config.unitTimeoutMs || undefined,
            })
    }
}

export { AnthropicBackend } from "./AnthropicBackend.js"
export { CliBackend } from "./CliBackend.js"
export { OpenAIBackend } from "./OpenAIBackend.js"
export type {
    Backend,
    PrimaryBackend,
    SecondaryBackend,
    StructuredResult,
} from "./types.js"
