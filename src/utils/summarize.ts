import Ajv2020 from 'ajv/dist/2020'
import { provisionSummarySchema } from '../schemas/provision-summary.schema'
import type { ProvisionResult } from '../types/provision-result'
import type { StepOutcome } from '../types/step-outcome'

export interface StepSummary {
  readonly name: string
  readonly status: StepOutcome['kind']
  readonly detail?: string
}

export interface ProvisionSummary {
  readonly ok: boolean
  readonly action: 'provision'
  readonly domain?: string
  readonly exitCode: number
  readonly dryRun?: boolean
  readonly steps: readonly StepSummary[]
  readonly urls?: ProvisionResult['urls']
  readonly cmdPlan?: readonly string[]
  readonly durationMs?: number
  readonly code?: string
  readonly message?: string
  readonly final: true
  readonly schemaOk?: boolean
  readonly schemaErrors?: readonly string[]
}

function detailOf(out: StepOutcome): string | undefined {
  return out.kind === 'ok' ? out.detail : out.reason
}

export function summarizeResult(domain: string, dryRun: boolean, result: ProvisionResult): ProvisionSummary {
  return {
    ok: result.ok,
    action: 'provision',
    domain,
    exitCode: result.exitCode,
    dryRun,
    steps: result.steps.map((s) => {
      const detail = detailOf(s.outcome)
      return detail === undefined ? { name: s.name, status: s.outcome.kind } : { name: s.name, status: s.outcome.kind, detail }
    }),
    urls: result.urls,
    cmdPlan: result.cmdPlan,
    durationMs: result.durationMs,
    final: true
  }
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validate = ajv.compile(provisionSummarySchema)

/** Attach schema validation results, the way CI consumers expect them. */
export function withSchemaCheck(summary: ProvisionSummary): ProvisionSummary {
  const ok = validate(summary)
  const errs = ok ? [] : (validate.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'invalid'}`)
  return { ...summary, schemaOk: ok, schemaErrors: errs }
}
