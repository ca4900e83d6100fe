import { join } from 'node:path'
import { API_PRODUCTION_ENV, BUILD_ORDER, PROJECT_DIRS } from '../../constants'
import type { ProjectRole } from '../../types/config'
import { fsx } from '../../utils/fs'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { failed, type StepContext } from './context'

async function chownBase(ctx: StepContext): Promise<StepOutcome | undefined> {
  const { deployUser, paths } = ctx.config
  const res = await ctx.host.run('chown', ['-R', `${deployUser}:${deployUser}`, paths.baseDir])
  return res.ok ? undefined : failed('chown', res)
}

export async function prepareDirs(ctx: StepContext): Promise<StepOutcome> {
  await ctx.host.mkdirp(ctx.config.paths.baseDir)
  const chown = await chownBase(ctx)
  if (chown !== undefined) return chown
  return outcome.ok(ctx.config.paths.baseDir)
}

/**
 * An existing production.env in the api tree is excluded, which keeps rsync
 * from both deleting and replacing it.
 */
async function rsyncArgs(ctx: StepContext, role: ProjectRole): Promise<readonly string[]> {
  const dir = PROJECT_DIRS[role]
  const { sourceDir, paths } = ctx.config
  const protect = role === 'api' && (await fsx.exists(join(paths.baseDir, dir, API_PRODUCTION_ENV)))
  return [
    '-a',
    '--delete',
    ...(protect ? [`--exclude=/${API_PRODUCTION_ENV}`] : []),
    `${join(sourceDir, dir)}/`,
    `${join(paths.baseDir, dir)}/`
  ]
}

/**
 * `rsync -a --delete` each project into the base dir. The base dir is fully
 * derived from the source; edits made there directly are lost.
 */
export async function mirrorProjects(ctx: StepContext): Promise<StepOutcome> {
  for (const role of BUILD_ORDER) {
    const res = await ctx.host.run('rsync', await rsyncArgs(ctx, role))
    if (!res.ok) return failed(`rsync ${PROJECT_DIRS[role]}`, res)
  }
  const chown = await chownBase(ctx)
  if (chown !== undefined) return chown
  return outcome.ok(BUILD_ORDER.map((r) => PROJECT_DIRS[r]).join(', '))
}
