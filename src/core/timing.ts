import { TimeoutError } from "./errors.js"

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()
    return new Promise((resolve) => {
        const done = (): void => {
            clearTimeout(timer)
            signal?.removeEventListener("abort", done)
            resolve()
        }
        const timer = setTimeout(done, ms)
        signal?.addEventListener("abort", done, { once: true })
    })
}

/** `base * 2^attempt`, attempt counted from zero. */
export function exponentialDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * Math.pow(2, attempt)
}

/**
 * Run `operation` with a deadline. When the deadline passes, the signal
 * handed to the operation is aborted and the returned promise rejects with
 * {@link TimeoutError}. A `parent` abort is only forwarded to that signal;
 * the operation decides how it ends. A `timeoutMs` of 0 disables the deadline.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController()
    const onParentAbort = (): void => controller.abort(parent?.reason)
    if (parent?.aborted) controller.abort(parent.reason)
    parent?.addEventListener("abort", onParentAbort, { once: true })

    if (timeoutMs <= 0) {
        try {
            return await operation(controller.signal)
        } finally {
            parent?.removeEventListener("abort", onParentAbort)
        }
    }

    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs)
            controller.abort(error)
            reject(error)
        }, timeoutMs)
    })

    try {
        return await Promise.race([operation(controller.signal), deadline])
    } finally {
        clearTimeout(timer)
        parent?.removeEventListener("abort", onParentAbort)
    }
}
