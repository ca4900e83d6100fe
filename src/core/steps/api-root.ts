import { join } from 'node:path'
import { FRONTEND_REQUEST_FILE, PROJECT_DIRS } from '../../constants'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { fsx } from '../../utils/fs'
import { rewriteApiRoot } from '../patches/api-root'
import type { StepContext } from './context'

/** Never fails: a missing file or an unmatched line is a no-op. */
export async function applyApiRootRewrite(ctx: StepContext): Promise<StepOutcome> {
  const file = join(ctx.config.paths.baseDir, PROJECT_DIRS.frontend, FRONTEND_REQUEST_FILE)
  const source = await fsx.readText(file)
  if (source === null) return outcome.skipped(`${FRONTEND_REQUEST_FILE} not found`)
  const patched = rewriteApiRoot(source)
  if (!patched.changed) return outcome.skipped('development API root not present')
  await ctx.host.writeFile(file, patched.text)
  return outcome.ok('API_ROOT set to /api')
}
