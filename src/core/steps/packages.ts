import { BASE_PACKAGES, DATABASE_PACKAGE, NODESOURCE_SETUP_URL } from '../../constants'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { formatCommand } from '../../utils/process'
import { logger } from '../../utils/logger'
import { APT_ENV, failed, type StepContext } from './context'

export async function installBasePackages(ctx: StepContext): Promise<StepOutcome> {
  const update = await ctx.host.run('apt-get', ['update', '-y'], { env: APT_ENV })
  if (!update.ok) return failed('apt-get update', update)
  const install = await ctx.host.run('apt-get', ['install', '-y', ...BASE_PACKAGES], { env: APT_ENV })
  if (!install.ok) return failed('apt-get install', install)
  return outcome.ok(BASE_PACKAGES.join(' '))
}

/** Failures here are tolerated; the run continues. */
export async function installDatabase(ctx: StepContext): Promise<StepOutcome> {
  if (!ctx.config.installDatabase) return outcome.skipped('not requested')
  const cmds: ReadonlyArray<readonly [string, readonly string[]]> = [
    ['apt-get', ['install', '-y', DATABASE_PACKAGE]],
    ['systemctl', ['enable', DATABASE_PACKAGE]],
    ['systemctl', ['start', DATABASE_PACKAGE]]
  ]
  const problems: string[] = []
  for (const [bin, args] of cmds) {
    const res = await ctx.host.run(bin, args, bin === 'apt-get' ? { env: APT_ENV } : {})
    if (!res.ok) problems.push(`${formatCommand(bin, args)} exited with ${res.code ?? 'signal'}`)
  }
  if (problems.length > 0) {
    const reason = problems.join('; ')
    logger.warn(`${DATABASE_PACKAGE} could not be installed or started; continuing (${reason})`)
    return outcome.tolerated(reason)
  }
  return outcome.ok(DATABASE_PACKAGE)
}

export async function installRuntime(ctx: StepContext): Promise<StepOutcome> {
  const setup = await ctx.host.run('bash', ['-c', `set -o pipefail; curl -fsSL ${NODESOURCE_SETUP_URL} | bash -`], { env: APT_ENV })
  if (!setup.ok) return failed('NodeSource setup', setup)
  const install = await ctx.host.run('apt-get', ['install', '-y', 'nodejs'], { env: APT_ENV })
  if (!install.ok) return failed('apt-get install nodejs', install)
  const node = await ctx.host.run('node', ['-v'])
  const npm = await ctx.host.run('npm', ['-v'])
  if (!node.ok || !npm.ok) logger.warn('node or npm did not report a version after install')
  const version = node.stdout.trim()
  return outcome.ok(version.length > 0 ? `node ${version}` : undefined)
}
