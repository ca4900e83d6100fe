import type { ProvisionConfig } from '../../types/config'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import type { ExecResult } from '../../utils/process'
import type { Host } from '../host'

export interface StepContext {
  readonly config: ProvisionConfig
  readonly host: Host
}

export type StepFn = (ctx: StepContext) => Promise<StepOutcome>

/** Fatal outcome carrying the failing tool's own exit code. */
export function failed(what: string, res: ExecResult): StepOutcome {
  const code = res.code ?? 1
  return outcome.fatal(`${what} failed (exit ${res.code === null ? 'signal' : code})`, code)
}

export const APT_ENV: Readonly<Record<string, string>> = { DEBIAN_FRONTEND: 'noninteractive' }
