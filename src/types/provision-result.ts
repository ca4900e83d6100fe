import type { StepRecord } from './step-outcome'

export interface EndpointUrls {
  readonly frontend: string
  readonly api: string
  readonly widget: string
}

export interface ProvisionResult {
  readonly ok: boolean
  /** 0 on success, otherwise the exit code of the failing step. */
  readonly exitCode: number
  readonly steps: readonly StepRecord[]
  readonly cmdPlan: readonly string[]
  readonly urls?: EndpointUrls
  readonly durationMs: number
}
