import { join } from 'node:path'
import { constants } from '../../constants'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { renderSite } from '../templates/site'
import { failed, type StepContext } from './context'

/** Nginx is only asked to reload once `nginx -t` accepts the new config. */
export async function installSite(ctx: StepContext): Promise<StepOutcome> {
  const { paths } = ctx.config
  const available = join(paths.nginxSitesAvailable, constants.SITE_FILE)
  const enabled = join(paths.nginxSitesEnabled, constants.SITE_FILE)
  await ctx.host.writeFile(available, renderSite(ctx.config))
  await ctx.host.link(available, enabled)
  const test = await ctx.host.run('nginx', ['-t'])
  if (!test.ok) return failed('nginx -t', test)
  const reload = await ctx.host.run('systemctl', ['reload', 'nginx'])
  if (!reload.ok) return failed('systemctl reload nginx', reload)
  return outcome.ok(`server_name ${ctx.config.domain}`)
}
