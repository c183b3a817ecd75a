import type { ZodError } from "zod"

/** `path: message` for the first issue, or just the message at the root. */
export function describeIssue(error: ZodError): string {
    const issue = error.issues[0]
    if (!issue) return "invalid document"
    const path = issue.path.join(".")
    return path ? `${path}: ${issue.message}` : issue.message
}
