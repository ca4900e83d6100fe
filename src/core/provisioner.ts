import { constants } from '../constants'
import type { ProvisionConfig } from '../types/config'
import type { EndpointUrls, ProvisionResult } from '../types/provision-result'
import { outcome, type StepName, type StepOutcome, type StepRecord } from '../types/step-outcome'
import { errorMessage, ProvisionError } from '../utils/errors'
import { logger } from '../utils/logger'
import { NodeProcessRunner, type ProcessRunner } from '../utils/process'
import { Host } from './host'
import { checkPreconditions, processUid, type UidProvider } from './preflight'
import { materializeProductionEnv } from './secrets/env'
import { applyApiRootRewrite } from './steps/api-root'
import { buildProject } from './steps/build'
import { issueCertificate } from './steps/certificate'
import type { StepContext, StepFn } from './steps/context'
import { installBasePackages, installDatabase, installRuntime } from './steps/packages'
import { installSite } from './steps/proxy'
import { installServices } from './steps/services'
import { mirrorProjects, prepareDirs } from './steps/sync'

export interface ProvisionDeps {
  readonly runner?: ProcessRunner
  readonly getuid?: UidProvider
}

interface Step {
  readonly name: StepName
  readonly title: string
  readonly run: StepFn
}

/** Strictly sequential; each step sees the effects of the ones before it. */
const PIPELINE: readonly Step[] = [
  { name: 'base-packages', title: 'Updating apt and installing base packages', run: installBasePackages },
  { name: 'database', title: 'Installing MongoDB (apt)', run: installDatabase },
  { name: 'runtime', title: `Installing Node.js ${constants.NODE_MAJOR} (NodeSource)`, run: installRuntime },
  { name: 'prepare-dirs', title: 'Preparing target directories', run: prepareDirs },
  { name: 'mirror', title: 'Syncing project folders', run: mirrorProjects },
  { name: 'build-api', title: 'Building mevo-api', run: buildProject('api') },
  { name: 'materialize-secrets', title: 'Checking production.env', run: materializeProductionEnv },
  { name: 'api-root-rewrite', title: 'Setting frontend API_ROOT to /api', run: applyApiRootRewrite },
  { name: 'build-frontend', title: 'Building mevo-v2', run: buildProject('frontend') },
  { name: 'build-widget', title: 'Building mevobot_v2', run: buildProject('widget') },
  { name: 'services', title: 'Creating systemd services', run: installServices },
  { name: 'proxy', title: 'Writing Nginx site config', run: installSite },
  { name: 'certificate', title: 'Installing and running certbot', run: issueCertificate }
]

export function endpointUrls(domain: string): EndpointUrls {
  return {
    frontend: `http://${domain}/`,
    api: `http://${domain}/api/`,
    widget: `http://${domain}/widget/`
  }
}

function printSettings(config: ProvisionConfig): void {
  logger.section('Settings')
  logger.info(`Domain:           ${config.domain}`)
  logger.info(`Deploy user:      ${config.deployUser}`)
  logger.info(`Source dir:       ${config.sourceDir}`)
  logger.info(`Base dir:         ${config.paths.baseDir}`)
  logger.info(`Install MongoDB:  ${config.installDatabase ? 'yes' : 'no'}`)
  logger.info(`Run certbot:      ${config.issueCertificate ? 'yes' : 'no'}`)
  if (config.dryRun) logger.note('Dry run: commands are printed, nothing is changed')
}

function report(step: Step, out: StepOutcome): void {
  switch (out.kind) {
    case 'ok': logger.success(out.detail !== undefined ? `${step.title}: ${out.detail}` : step.title); break
    case 'skipped': logger.debug(`${step.name} skipped: ${out.reason}`); break
    case 'tolerated': logger.note(`${step.name} continued after failure: ${out.reason}`); break
    case 'fatal': logger.error(out.reason); break
  }
}

function printEndpoints(urls: EndpointUrls): void {
  logger.section('Done')
  logger.info(`Frontend:  ${urls.frontend}`)
  logger.info(`API:       ${urls.api}`)
  logger.info(`Widget:    ${urls.widget}`)
}

/**
 * Bring the host to the deployed state described by `config`. Stops at the
 * first fatal step and leaves whatever the earlier steps produced in place.
 */
export async function provision(config: ProvisionConfig, deps: ProvisionDeps = {}): Promise<ProvisionResult> {
  const t0 = Date.now()
  const host = new Host(deps.runner ?? new NodeProcessRunner(), config.dryRun)
  const steps: StepRecord[] = []
  const finish = (exitCode: number, urls?: EndpointUrls): ProvisionResult => ({
    ok: exitCode === 0,
    exitCode,
    steps,
    cmdPlan: host.commandPlan,
    urls,
    durationMs: Date.now() - t0
  })

  printSettings(config)
  try {
    await checkPreconditions(config, deps.getuid ?? processUid)
    steps.push({ name: 'preflight', outcome: outcome.ok() })
  } catch (err) {
    if (!(err instanceof ProvisionError)) throw err
    logger.error(err.message)
    if (err.remedy !== undefined) logger.note(err.remedy)
    steps.push({ name: 'preflight', outcome: outcome.fatal(err.message, err.exitCode) })
    return finish(err.exitCode)
  }

  const ctx: StepContext = { config, host }
  for (const step of PIPELINE) {
    logger.section(step.title)
    let out: StepOutcome
    try {
      out = await step.run(ctx)
    } catch (err) {
      // fs errors (EACCES, ENOSPC, ...) end the run like a failing tool would
      out = outcome.fatal(`${step.name}: ${errorMessage(err)}`, 1)
    }
    steps.push({ name: step.name, outcome: out })
    report(step, out)
    if (out.kind === 'fatal') return finish(out.exitCode)
  }

  const urls = endpointUrls(config.domain)
  printEndpoints(urls)
  return finish(0, urls)
}
