export type ErrorCode =
  | 'NOT_ROOT'
  | 'DOMAIN_REQUIRED'
  | 'PROJECT_DIR_MISSING'

export interface ErrorInfo {
  readonly code: ErrorCode
  readonly message: string
  readonly remedy?: string
}

/**
 * Precondition failure detected before anything on the host changes.
 */
export class ProvisionError extends Error {
  public readonly code: ErrorCode
  public readonly exitCode: number
  public readonly remedy?: string

  public constructor(info: ErrorInfo, exitCode = 1) {
    super(info.message)
    this.name = 'ProvisionError'
    this.code = info.code
    this.exitCode = exitCode
    this.remedy = info.remedy
  }
}

export function notRoot(): ProvisionError {
  return new ProvisionError({ code: 'NOT_ROOT', message: 'Please run as root (use sudo).', remedy: 'Re-run with sudo, or pass --dry-run to preview the plan.' })
}

export function domainRequired(): ProvisionError {
  return new ProvisionError({ code: 'DOMAIN_REQUIRED', message: '--domain is required' })
}

export function projectDirMissing(path: string): ProvisionError {
  return new ProvisionError({ code: 'PROJECT_DIR_MISSING', message: `Missing directory: ${path}`, remedy: 'Point --src at the directory holding mevo-api, mevo-v2 and mevobot_v2.' })
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
