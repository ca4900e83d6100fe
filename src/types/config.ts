export type ProjectRole = 'api' | 'frontend' | 'widget'

export interface ServicePorts {
  readonly api: number
  readonly widget: number
}

/** Host locations the provisioner writes to. */
export interface HostPaths {
  readonly baseDir: string
  readonly systemdDir: string
  readonly nginxSitesAvailable: string
  readonly nginxSitesEnabled: string
}

/**
 * Everything a run needs, built once from flags and environment.
 * Steps receive it explicitly and never mutate it.
 */
export interface ProvisionConfig {
  readonly domain: string
  readonly deployUser: string
  readonly sourceDir: string
  readonly installDatabase: boolean
  readonly issueCertificate: boolean
  readonly certificateEmail?: string
  readonly ports: ServicePorts
  readonly paths: HostPaths
  readonly dryRun: boolean
}
