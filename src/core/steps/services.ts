import { join } from 'node:path'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { renderServiceUnit, serviceUnits, unitFileName } from '../templates/service-unit'
import { failed, type StepContext } from './context'

/**
 * Units are rewritten and both services restarted on every run, first
 * install included.
 */
export async function installServices(ctx: StepContext): Promise<StepOutcome> {
  const units = serviceUnits(ctx.config)
  for (const unit of units) {
    await ctx.host.writeFile(join(ctx.config.paths.systemdDir, unitFileName(unit)), renderServiceUnit(unit))
  }
  const reload = await ctx.host.run('systemctl', ['daemon-reload'])
  if (!reload.ok) return failed('systemctl daemon-reload', reload)
  for (const verb of ['enable', 'restart'] as const) {
    for (const unit of units) {
      const res = await ctx.host.run('systemctl', [verb, unit.name])
      if (!res.ok) return failed(`systemctl ${verb} ${unit.name}`, res)
    }
  }
  return outcome.ok(units.map((u) => u.name).join(', '))
}
