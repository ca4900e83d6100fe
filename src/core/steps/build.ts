import { join } from 'node:path'
import { PROJECT_DIRS } from '../../constants'
import type { ProjectRole } from '../../types/config'
import { outcome } from '../../types/step-outcome'
import { failed, type StepFn } from './context'

/** `npm ci && npm run build` inside the mirrored project. */
export function buildProject(role: ProjectRole): StepFn {
  return async (ctx) => {
    const dir = PROJECT_DIRS[role]
    const cwd = join(ctx.config.paths.baseDir, dir)
    const install = await ctx.host.run('npm', ['ci'], { cwd })
    if (!install.ok) return failed(`npm ci (${dir})`, install)
    const build = await ctx.host.run('npm', ['run', 'build'], { cwd })
    if (!build.ok) return failed(`npm run build (${dir})`, build)
    return outcome.ok(dir)
  }
}
