import createDebug from "debug"

const APP_PREFIX = "failsafe"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "invoke", "workflow")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Pre-defined loggers for each subsystem.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.invoke("Primary failed for %s: %s", unit, kind)
 * ```
 *
 * Enable via env: `DEBUG=failsafe:*`
 * Enable specific: `DEBUG=failsafe:invoke,failsafe:workflow`
 */
export const log = {
    app: createLogger("app"),
    context: createLogger("context"),
    persistence: createLogger("persistence"),
    unit: createLogger("unit"),
    workflow: createLogger("workflow"),
    invoke: createLogger("invoke"),
    health: createLogger("health"),
    backend: createLogger("backend"),
    alert: createLogger("alert"),
}
