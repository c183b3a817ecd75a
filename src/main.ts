#!/usr/bin/env node

import { readFile } from "node:fs/promises"
import { join, resolve } from "node:path"

import chalk from "chalk"
import { Command } from "commander"

import { parseRcConfig } from "./core/Config.js"
import { ConfigError, errorMessage, ValidationError } from "./core/errors.js"
import { Failsafe } from "./index.js"
import { formatPercent } from "./renderer/format.js"
import type {
    FailsafeConfig,
    HealthReport,
    RendererType,
    SecondaryProviderType,
    WorkflowResult,
} from "./types.js"
import type { WorkflowEntry } from "./workflow/WorkflowOrchestrator.js"
import { artifactCondition, loadWorkflowFile } from "./workflow/workflowFile.js"

const RC_FILE = ".failsaferc.json"

function isMissingFile(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    )
}

async function loadEnvFile(cwd: string): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch (error) {
        if (isMissingFile(error)) return
        throw error
    }
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex).trim()
        const value = trimmed
            .slice(eqIndex + 1)
            .trim()
            .replace(/^(["'])(.*)\1$/, "$2")
        process.env[key] ??= value
    }
}

async function loadRcConfig(cwd: string): Promise<Partial<FailsafeConfig>> {
    const rcPath = join(cwd, RC_FILE)
    try {
        return parseRcConfig(await readFile(rcPath, "utf-8"), rcPath)
    } catch (error) {
        if (isMissingFile(error)) return {}
        throw error
    }
}

type CommonOptions = {
    cwd?: string
    renderer?: string
    secondary?: string
    secondaryCommand?: string
    verbose?: boolean
}

function parseChoice<T extends string>(
    flag: string,
    allowed: readonly T[],
    value: string | undefined
): T | undefined {
    if (value === undefined) return undefined
    const match = allowed.find((candidate) => candidate === value)
    if (!match) {
        throw new ConfigError(`${flag} must be one of ${allowed.join(", ")}`)
    }
    return match
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (Number.isNaN(parsed)) {
        throw new ConfigError(`Expected an integer, got "${value}"`)
    }
    return parsed
}

/** Flags over environment over rc file over defaults. */
async function buildConfig(
    options: CommonOptions,
    overrides: Partial<FailsafeConfig> = {}
): Promise<FailsafeConfig> {
    const workingDirectory = options.cwd ? resolve(options.cwd) : process.cwd()
    await loadEnvFile(workingDirectory)
    const rc = await loadRcConfig(workingDirectory)

    const renderer = parseChoice<RendererType>(
        "--renderer",
        ["terminal", "log", "none"],
        options.renderer
    )
    const secondaryProvider = parseChoice<SecondaryProviderType>(
        "--secondary",
        ["openai", "cli"],
        options.secondary
    )
    const secondaryCommand = options.secondaryCommand
        ?.split(/\s+/)
        .filter(Boolean)

    return {
        ...rc,
        workingDirectory,
        anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? rc.anthropicApiKey,
        openaiApiKey: process.env.OPENAI_API_KEY ?? rc.openaiApiKey,
        renderer: renderer ?? rc.renderer,
        secondaryProvider: secondaryProvider ?? rc.secondaryProvider,
        secondaryCommand: secondaryCommand ?? rc.secondaryCommand,
        verbose: options.verbose ?? rc.verbose,
        ...overrides,
    }
}

function printResult(result: WorkflowResult, renderer: RendererType): void {
    if (renderer === "none") {
        console.log(JSON.stringify(result, null, 2))
        return
    }
    console.log(`\nStatus: ${result.status}${result.cancelled ? " (cancelled)" : ""}`)
    console.log(`Context: ${result.contextId}`)
    console.log(`Duration: ${(result.durationMs / 1000).toFixed(1)}s`)
    if (result.agentsFailed.length > 0) {
        console.log(`Failed: ${result.agentsFailed.join(", ")}`)
    }
    if (result.agentsSkipped.length > 0) {
        console.log(`Skipped: ${result.agentsSkipped.join(", ")}`)
    }
    if (result.error) {
        console.error(`\nReason: ${result.error}`)
    }
}

function printHealth(report: HealthReport): void {
    const colour = {
        healthy: chalk.green,
        warning: chalk.yellow,
        critical: chalk.red,
    }
    for (const [name, check] of Object.entries(report.checks)) {
        console.log(
            `${colour[check.status](check.status.padEnd(8))}  ${name.padEnd(16)}  ${check.message}`
        )
    }
    console.log(
        `\nOverall: ${colour[report.overall](report.overall)}  ·  primary ${report.readyForPrimary ? "ready" : "not ready"}  ·  secondary ${report.readyForSecondary ? "ready" : "not ready"}`
    )
}

const program = new Command()

program
    .name("failsafe")
    .description("Run agent workflows with automatic fallback between backends")
    .version("1.0.0")
    .option("--cwd <path>", "Working directory (defaults to current directory)")
    .option("--secondary <provider>", "Fallback backend (openai or cli)")
    .option(
        "--secondary-command <command>",
        "Command line for the cli fallback, e.g. \"cursor-agent -p\""
    )

program
    .command("run")
    .description("Run a workflow described by a JSON file")
    .argument("<workflow>", "Path to the workflow JSON file")
    .option("--strategy <strategy>", "sequential, parallel or conditional")
    .option("--renderer <type>", "Output renderer (terminal, log, none)")
    .option("--max-parallel <n>", "Units in flight for the parallel strategy", parseInteger)
    .option("--max-retries <n>", "Primary retries before degrading", parseInteger)
    .option("--archive", "Archive the context when every unit completed")
    .option("--verbose", "Show retries and backend failures per unit")
    .action(
        async (
            workflowPath: string,
            options: {
                strategy?: string
                renderer?: string
                maxParallel?: number
                maxRetries?: number
                archive?: boolean
                verbose?: boolean
            }
        ) => {
            const common: CommonOptions = {
                ...program.opts<CommonOptions>(),
                ...options,
            }
            const workflow = await loadWorkflowFile(
                resolve(common.cwd ?? process.cwd(), workflowPath)
            )
            const strategy =
                parseChoice(
                    "--strategy",
                    ["sequential", "parallel", "conditional"],
                    options.strategy
                ) ?? workflow.strategy

            const config = await buildConfig(common, {
                ...(options.maxParallel !== undefined
                    ? { maxParallel: options.maxParallel }
                    : {}),
                ...(options.maxRetries !== undefined
                    ? { maxRetries: options.maxRetries }
                    : {}),
            })
            const failsafe = new Failsafe(config)

            process.on("SIGINT", () => {
                failsafe.close()
            })

            const entries: WorkflowEntry[] = workflow.units.map((unit) => ({
                name: unit.name,
                unit: failsafe.invocationUnit(unit.name, unit.task, {
                    outputKey: unit.outputKey,
                }),
                when: unit.when ? artifactCondition(unit.when) : undefined,
            }))
            if (strategy !== "conditional" && entries.some((e) => e.when)) {
                throw new ValidationError(
                    "Unit conditions need --strategy conditional"
                )
            }

            try {
                const { result } = await failsafe.runWorkflow(
                    entries,
                    {
                        task: workflow.task,
                        owner: workflow.owner,
                        priority: workflow.priority,
                        ttlMs: workflow.ttlMs,
                        artifacts: workflow.artifacts,
                    },
                    {
                        strategy,
                        maxParallel: workflow.maxParallel,
                        archiveOnComplete:
                            options.archive ?? workflow.archiveOnComplete,
                    }
                )
                failsafe.close()
                printResult(result, failsafe.config.renderer)
                const stats = failsafe.getStatistics()
                if (stats.degradedInvocations > 0) {
                    console.error(
                        chalk.yellow(
                            `${stats.degradedInvocations} of ${stats.totalInvocations} invocation(s) fell back to the secondary backend (${formatPercent(stats.fallbackRate)})`
                        )
                    )
                }
                process.exit(result.status === "completed" ? 0 : 1)
            } catch (error) {
                failsafe.close()
                throw error
            }
        }
    )

program
    .command("plan")
    .description("Have a planner break a goal into steps, then run them in order")
    .argument("<goal>", "What the steps should achieve")
    .option("--renderer <type>", "Output renderer (terminal, log, none)")
    .option("--verbose", "Show retries and backend failures per unit")
    .action(
        async (goal: string, options: { renderer?: string; verbose?: boolean }) => {
            const config = await buildConfig({
                ...program.opts<CommonOptions>(),
                ...options,
            })
            const failsafe = new Failsafe(config)
            process.on("SIGINT", () => {
                failsafe.close()
            })

            try {
                const run = await failsafe.runPlanned(goal, { task: goal })
                failsafe.close()
                if (run.steps.length > 0) {
                    console.log(
                        `Plan: ${run.steps.map((step) => step.name).join(" → ")}`
                    )
                }
                const result = run.result ?? run.planning
                printResult(result, failsafe.config.renderer)
                process.exit(result.status === "completed" ? 0 : 1)
            } catch (error) {
                failsafe.close()
                throw error
            }
        }
    )

program
    .command("health")
    .description("Run the health battery and print the report")
    .option("--json", "Print the report as JSON")
    .action(async (options: { json?: boolean }) => {
        const config = await buildConfig(program.opts<CommonOptions>(), { renderer: "none" })
        const failsafe = new Failsafe(config)
        const report = await failsafe.getHealthReport({ fresh: true })
        if (options.json) console.log(JSON.stringify(report, null, 2))
        else printHealth(report)
        process.exit(report.readyForPrimary || report.readyForSecondary ? 0 : 1)
    })

program
    .command("show")
    .description("Print a persisted context")
    .argument("<id>", "Context id")
    .action(async (id: string) => {
        const config = await buildConfig(program.opts<CommonOptions>(), { renderer: "none" })
        const failsafe = new Failsafe(config)
        const ctx = await failsafe.orchestrator.loadContext(id)
        console.log(failsafe.store.serialize(ctx))
    })

program
    .command("cleanup")
    .description("Archive every persisted context past its TTL")
    .action(async () => {
        const config = await buildConfig(program.opts<CommonOptions>(), { renderer: "none" })
        const failsafe = new Failsafe(config)
        const archived = await failsafe.cleanupExpiredWorkflows()
        if (archived.length === 0) {
            console.log("No expired contexts")
            return
        }
        for (const id of archived) console.log(`archived ${id}`)
    })

program.parseAsync().catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error))
    process.exit(1)
})
