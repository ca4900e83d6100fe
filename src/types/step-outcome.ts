export type StepName =
  | 'preflight'
  | 'base-packages'
  | 'database'
  | 'runtime'
  | 'prepare-dirs'
  | 'mirror'
  | 'build-api'
  | 'materialize-secrets'
  | 'api-root-rewrite'
  | 'build-frontend'
  | 'build-widget'
  | 'services'
  | 'proxy'
  | 'certificate'

export type StepOutcome =
  | { readonly kind: 'ok'; readonly detail?: string }
  | { readonly kind: 'skipped'; readonly reason: string }
  | { readonly kind: 'tolerated'; readonly reason: string }
  | { readonly kind: 'fatal'; readonly reason: string; readonly exitCode: number }

export interface StepRecord {
  readonly name: StepName
  readonly outcome: StepOutcome
}

export const outcome = {
  ok: (detail?: string): StepOutcome => (detail === undefined ? { kind: 'ok' } : { kind: 'ok', detail }),
  skipped: (reason: string): StepOutcome => ({ kind: 'skipped', reason }),
  tolerated: (reason: string): StepOutcome => ({ kind: 'tolerated', reason }),
  fatal: (reason: string, exitCode = 1): StepOutcome => ({ kind: 'fatal', reason, exitCode: exitCode === 0 ? 1 : exitCode })
} as const
