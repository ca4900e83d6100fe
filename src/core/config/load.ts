import { isAbsolute, join, resolve } from 'node:path'
import { constants } from '../../constants'
import type { HostPaths, ProvisionConfig } from '../../types/config'
import { domainRequired } from '../../utils/errors'

/** Raw option bag as parsed from the command line. */
export interface ProvisionOptions {
  readonly domain?: string
  readonly user?: string
  readonly src?: string
  readonly installDatabase?: boolean
  readonly runCertificateIssuance?: boolean
  readonly email?: string
  readonly dryRun?: boolean
}

type Env = Readonly<Record<string, string | undefined>>

function nonEmpty(v: string | undefined): string | undefined {
  if (v === undefined) return undefined
  const t = v.trim()
  return t.length > 0 ? t : undefined
}

/** Deploy user: explicit flag, then the sudo-originating user, then the current user. */
export function defaultDeployUser(env: Env): string {
  return nonEmpty(env.SUDO_USER) ?? nonEmpty(env.USER) ?? 'root'
}

/**
 * Host paths, overridable through PROVISION_BASE_DIR, PROVISION_SYSTEMD_DIR
 * and PROVISION_NGINX_DIR for chroots and scratch trees.
 */
export function resolveHostPaths(env: Env): HostPaths {
  const baseDir = nonEmpty(env.PROVISION_BASE_DIR) ?? constants.BASE_DIR
  const systemdDir = nonEmpty(env.PROVISION_SYSTEMD_DIR) ?? constants.SYSTEMD_DIR
  const nginxDir = nonEmpty(env.PROVISION_NGINX_DIR) ?? constants.NGINX_DIR
  return {
    baseDir,
    systemdDir,
    nginxSitesAvailable: join(nginxDir, 'sites-available'),
    nginxSitesEnabled: join(nginxDir, 'sites-enabled')
  }
}

export function buildConfig(opts: ProvisionOptions, env: Env = process.env, cwd: string = process.cwd()): ProvisionConfig {
  const domain = opts.domain
  if (domain === undefined || nonEmpty(domain) === undefined) throw domainRequired()
  const src = nonEmpty(opts.src)
  const sourceDir = src === undefined ? cwd : (isAbsolute(src) ? src : resolve(cwd, src))
  return {
    domain,
    deployUser: nonEmpty(opts.user) ?? defaultDeployUser(env),
    sourceDir,
    installDatabase: opts.installDatabase === true,
    issueCertificate: opts.runCertificateIssuance === true,
    certificateEmail: nonEmpty(opts.email),
    ports: { api: constants.API_PORT, widget: constants.WIDGET_PORT },
    paths: resolveHostPaths(env),
    dryRun: opts.dryRun === true
  }
}
