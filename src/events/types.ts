import type {
    BackendRole,
    FailureKind,
    HealthReport,
    RepeatedFailureAlert,
    WorkflowStatus,
    WorkflowStrategy,
} from "../types.js"

export type FailsafeEvent =
    | {
          type: "workflow:start"
          runId: string
          contextId: string
          strategy: WorkflowStrategy
          task: string
          units: string[]
      }
    | {
          type: "workflow:complete"
          runId: string
          status: WorkflowStatus
          cancelled: boolean
          duration: number
      }
    | {
          type: "workflow:cancelled"
          runId: string
      }
    | {
          type: "unit:start"
          runId: string
          unit: string
      }
    | {
          type: "unit:retry"
          unit: string
          attempt: number
          maxRetries: number
          delayMs: number
          reason: string
      }
    | {
          type: "unit:complete"
          runId: string
          unit: string
          status: "completed" | "failed"
          duration: number
          error?: string
      }
    | {
          type: "unit:skipped"
          runId: string
          unit: string
          reason: "condition" | "cancelled"
      }
    | {
          type: "invoke:attempt"
          unit: string
          backend: BackendRole
          attempt: number
      }
    | {
          type: "invoke:failure"
          unit: string
          backend: BackendRole
          kind: FailureKind
          message: string
      }
    | {
          type: "invoke:degrade"
          unit: string
          kind: FailureKind
          degradedTo: string
      }
    | {
          type: "invoke:complete"
          unit: string
          degraded: boolean
          duration: number
      }
    | ({ type: "alert:repeated_failure" } & RepeatedFailureAlert)
    | {
          type: "health:report"
          report: HealthReport
      }
    | {
          type: "context:archived"
          contextId: string
      }
