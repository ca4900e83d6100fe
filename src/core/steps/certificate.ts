import { CERTIFICATE_PACKAGES } from '../../constants'
import { outcome, type StepOutcome } from '../../types/step-outcome'
import { logger } from '../../utils/logger'
import { APT_ENV, type StepContext } from './context'

/** Best-effort: the site already serves over plain HTTP. */
export async function issueCertificate(ctx: StepContext): Promise<StepOutcome> {
  const { issueCertificate: requested, certificateEmail, domain } = ctx.config
  if (!requested) return outcome.skipped('not requested')
  if (certificateEmail === undefined) {
    const reason = '--run-certificate-issuance provided but --email is missing; skipping certbot.'
    logger.warn(reason)
    return outcome.skipped(reason)
  }
  const install = await ctx.host.run('apt-get', ['install', '-y', ...CERTIFICATE_PACKAGES], { env: APT_ENV })
  if (!install.ok) {
    const reason = `certbot install exited with ${install.code ?? 'signal'}`
    logger.warn(`${reason}; continuing without TLS`)
    return outcome.tolerated(reason)
  }
  const res = await ctx.host.run('certbot', ['--nginx', '-d', domain, '-m', certificateEmail, '--agree-tos', '-n'])
  if (!res.ok) {
    const reason = `certbot exited with ${res.code ?? 'signal'}`
    logger.warn(`${reason}; continuing without TLS`)
    return outcome.tolerated(reason)
  }
  return outcome.ok(`certificate issued for ${domain}`)
}
