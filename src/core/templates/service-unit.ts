import { join } from 'node:path'
import { constants, PROJECT_DIRS } from '../../constants'
import type { ProvisionConfig } from '../../types/config'

export interface ServiceUnit {
  /** systemd unit name without the `.service` suffix */
  readonly name: string
  readonly description: string
  readonly user: string
  readonly workingDirectory: string
  readonly port: number
  readonly execStart: string
  readonly restartSec: number
}

/** The two long-running processes: the api server and the server-rendered widget. */
export function serviceUnits(config: ProvisionConfig): readonly ServiceUnit[] {
  return [
    {
      name: 'mevo-api',
      description: 'Mevo API (NestJS)',
      user: config.deployUser,
      workingDirectory: join(config.paths.baseDir, PROJECT_DIRS.api),
      port: config.ports.api,
      execStart: '/usr/bin/npm run start:prod --silent',
      restartSec: constants.RESTART_SEC
    },
    {
      name: 'mevobot-v2',
      description: 'Mevobot V2 (Nuxt 3)',
      user: config.deployUser,
      workingDirectory: join(config.paths.baseDir, PROJECT_DIRS.widget),
      port: config.ports.widget,
      execStart: '/usr/bin/node .output/server/index.mjs',
      restartSec: constants.RESTART_SEC
    }
  ]
}

export function unitFileName(unit: ServiceUnit): string {
  return `${unit.name}.service`
}

export function renderServiceUnit(unit: ServiceUnit): string {
  return `[Unit]
Description=${unit.description}
After=network.target

[Service]
Type=simple
User=${unit.user}
WorkingDirectory=${unit.workingDirectory}
Environment=NODE_ENV=production
Environment=PORT=${unit.port}
ExecStart=${unit.execStart}
Restart=always
RestartSec=${unit.restartSec}

[Install]
WantedBy=multi-user.target
`
}
