import { lookup } from "node:dns/promises"
import { mkdir, readFile, rm, writeFile } from "node:fs/promises"
import { cpus, freemem, loadavg, totalmem } from "node:os"
import { join } from "node:path"

import { errorMessage } from "../core/errors.js"
import type { PrimaryBackend } from "../backends/types.js"
import type { CheckResult } from "../types.js"
import type { HealthCheck } from "./HealthEvaluator.js"

export function primaryBackendCheck(primary: PrimaryBackend): HealthCheck {
    return {
        name: "primary_backend",
        scope: "primary",
        run: async (signal) => {
            if (!primary.probe) {
                return {
                    status: "healthy",
                    message: `${primary.name} has no probe; assumed reachable`,
                }
            }
            return primary.probe(signal)
        },
    }
}

export function credentialsCheck(primary: PrimaryBackend): HealthCheck {
    return {
        name: "credentials",
        scope: "primary",
        run: async () => {
            if (!primary.hasCredentials) {
                return { status: "healthy", message: "No credentials required" }
            }
            return primary.hasCredentials()
                ? { status: "healthy", message: "Credentials present" }
                : {
                      status: "critical",
                      message: `No credentials configured for ${primary.name}`,
                  }
        },
    }
}

/** Round-trips a probe file through the persistence directory. */
export function storageCheck(directory: string): HealthCheck {
    return {
        name: "storage",
        scope: "shared",
        run: async () => {
            const probe = join(directory, `.health-${process.pid}-${Date.now()}`)
            try {
                await mkdir(directory, { recursive: true })
                await writeFile(probe, "ok", "utf-8")
                const back = await readFile(probe, "utf-8")
                if (back !== "ok") {
                    return {
                        status: "critical",
                        message: `Storage at ${directory} returned corrupt data`,
                    }
                }
                return { status: "healthy", message: `${directory} writable` }
            } catch (error) {
                return {
                    status: "critical",
                    message: `Storage at ${directory} unusable: ${errorMessage(error)}`,
                }
            } finally {
                await rm(probe, { force: true })
            }
        },
    }
}

export interface ResourceThresholds {
    /** Free memory fraction below which the check warns. */
    memoryWarning: number
    memoryCritical: number
    /** One-minute load average per CPU above which the check warns. */
    loadWarning: number
    loadCritical: number
}

export const DEFAULT_RESOURCE_THRESHOLDS: ResourceThresholds = {
    memoryWarning: 0.1,
    memoryCritical: 0.03,
    loadWarning: 2,
    loadCritical: 4,
}

export interface ResourceSample {
    freeMemoryRatio: number
    loadPerCpu: number
}

export function sampleResources(): ResourceSample {
    const cpuCount = Math.max(cpus().length, 1)
    return {
        freeMemoryRatio: freemem() / totalmem(),
        loadPerCpu: (loadavg()[0] ?? 0) / cpuCount,
    }
}

export function assessResources(
    sample: ResourceSample,
    thresholds: ResourceThresholds = DEFAULT_RESOURCE_THRESHOLDS
): CheckResult {
    const memory = `${(sample.freeMemoryRatio * 100).toFixed(1)}% memory free`
    const load = `load ${sample.loadPerCpu.toFixed(2)}/cpu`
    const message = `${memory}, ${load}`
    if (
        sample.freeMemoryRatio < thresholds.memoryCritical ||
        sample.loadPerCpu > thresholds.loadCritical
    ) {
        return { status: "critical", message }
    }
    if (
        sample.freeMemoryRatio < thresholds.memoryWarning ||
        sample.loadPerCpu > thresholds.loadWarning
    ) {
        return { status: "warning", message }
    }
    return { status: "healthy", message }
}

export function resourcesCheck(
    sample: () => ResourceSample = sampleResources,
    thresholds?: ResourceThresholds
): HealthCheck {
    return {
        name: "resources",
        scope: "shared",
        run: async () => assessResources(sample(), thresholds),
    }
}

/** Resolves the primary's host; a backend without one has nothing to check. */
export function networkCheck(host: string | undefined): HealthCheck {
    return {
        name: "network",
        scope: "shared",
        run: async () => {
            if (!host) {
                return { status: "healthy", message: "No remote endpoint" }
            }
            try {
                const { address } = await lookup(host)
                return { status: "healthy", message: `${host} → ${address}` }
            } catch (error) {
                return {
                    status: "critical",
                    message: `Cannot resolve ${host}: ${errorMessage(error)}`,
                }
            }
        },
    }
}

export interface DefaultChecksOptions {
    primary: PrimaryBackend
    storageDirectory: string
}

/** The standard battery, in evaluation order. */
export function createDefaultChecks(options: DefaultChecksOptions): HealthCheck[] {
    return [
        primaryBackendCheck(options.primary),
        credentialsCheck(options.primary),
        storageCheck(options.storageDirectory),
        resourcesCheck(),
        networkCheck(options.primary.endpointHost),
    ]
}
