import { parse } from 'dotenv'
import { join } from 'node:path'
import { API_LOCAL_ENV, API_PRODUCTION_ENV, PROJECT_DIRS } from '../../constants'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'
import type { StepContext } from '../steps/context'
import { renderDefaultProductionEnv, toProductionMode } from '../templates/production-env'

const SECRET_KEY = /SECRET|TOKEN|PASSWORD|PASSWD|KEY|URI|URL|DSN/i

/** Values of secret-looking keys, for log redaction. */
export function secretValues(content: string): readonly string[] {
  const parsed: Record<string, string> = parse(content)
  const out: string[] = []
  for (const [k, v] of Object.entries(parsed)) {
    const tv = v.trim()
    if (SECRET_KEY.test(k) && tv.length > 0) out.push(tv)
  }
  return out
}

export function productionEnvPath(baseDir: string): string {
  return join(baseDir, PROJECT_DIRS.api, API_PRODUCTION_ENV)
}

/**
 * Create the api's production.env once. An existing file is never
 * rewritten: it holds operator-supplied secrets.
 */
export async function materializeProductionEnv(ctx: StepContext): Promise<StepOutcome> {
  const { paths, ports } = ctx.config
  const target = productionEnvPath(paths.baseDir)
  const existing = await fsx.readText(target)
  if (existing !== null) {
    ctx.host.addSecrets(secretValues(existing))
    return outcome.skipped('production.env already present')
  }
  const local = await fsx.readText(join(paths.baseDir, PROJECT_DIRS.api, API_LOCAL_ENV))
  const content = local !== null ? toProductionMode(local) : renderDefaultProductionEnv(ports.api)
  const source = local !== null ? 'local.env' : 'defaults'
  logger.warn(`Creating production.env from ${source} (please update secrets!)`)
  ctx.host.addSecrets(secretValues(content))
  await ctx.host.writeFile(target, content)
  return outcome.ok(`from ${source}`)
}
