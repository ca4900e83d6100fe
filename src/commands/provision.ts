import { Command, CommanderError, Option, type OutputConfiguration } from 'commander'
import { buildConfig, defaultDeployUser } from '../core/config/load'
import { provision, type ProvisionDeps } from '../core/provisioner'
import { isColorMode, setColorMode } from '../utils/colors'
import type { ProvisionConfig } from '../types/config'
import { ProvisionError } from '../utils/errors'
import { logger } from '../utils/logger'
import { summarizeResult, withSchemaCheck } from '../utils/summarize'

export const VERSION = '0.1.0'

type CliOptions = {
  readonly domain?: string
  readonly user?: string
  readonly src?: string
  readonly installDatabase?: boolean
  readonly installMongodb?: boolean
  readonly runCertificateIssuance?: boolean
  readonly runCertbot?: boolean
  readonly email?: string
  readonly dryRun?: boolean
  readonly json?: boolean
  readonly ndjson?: boolean
  readonly quiet?: boolean
  readonly verbose?: boolean
  readonly emoji?: boolean
  readonly timestamps?: boolean
  readonly color?: string
}

export interface CliDeps extends ProvisionDeps {
  readonly env?: Readonly<Record<string, string | undefined>>
  readonly cwd?: string
  readonly output?: OutputConfiguration
}

function applyOutputFlags(opts: CliOptions): void {
  if (opts.verbose === true) logger.setLevel('debug')
  if (opts.quiet === true) logger.setLevel('error')
  if (opts.json === true) logger.setJsonOnly(true)
  if (opts.ndjson === true) logger.setNdjson(true)
  if (opts.emoji === false) logger.setNoEmoji(true)
  if (opts.timestamps === true) logger.setTimestamps(true)
  if (opts.color !== undefined && isColorMode(opts.color)) setColorMode(opts.color)
}

function configFrom(opts: CliOptions, env: Readonly<Record<string, string | undefined>>, cwd: string): ProvisionConfig | ProvisionError {
  try {
    return buildConfig({
      domain: opts.domain,
      user: opts.user,
      src: opts.src,
      installDatabase: opts.installDatabase === true || opts.installMongodb === true,
      runCertificateIssuance: opts.runCertificateIssuance === true || opts.runCertbot === true,
      email: opts.email,
      dryRun: opts.dryRun
    }, env, cwd)
  } catch (err) {
    if (err instanceof ProvisionError) return err
    throw err
  }
}

export function createProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const env = deps.env ?? process.env
  const program: Command = new Command()
  program
    .name('provision')
    .description('Install, build and serve the api, frontend and widget apps behind Nginx on this host')
    .version(VERSION)
    .option('--domain <domain>', 'Required. Public domain for Nginx server_name')
    .option('--user <user>', `System user that will run the services (default: ${defaultDeployUser(env)})`)
    .option('--src <path>', 'Path containing mevo-api, mevo-v2, mevobot_v2 (default: current dir)')
    .option('--install-database', 'Install MongoDB from apt (best-effort)')
    .option('--install-mongodb', 'Alias of --install-database')
    .option('--run-certificate-issuance', "Obtain a Let's Encrypt certificate via certbot (best-effort)")
    .option('--run-certbot', 'Alias of --run-certificate-issuance')
    .option('--email <email>', 'Contact email for certbot (used only with --run-certificate-issuance)')
    .option('--dry-run', 'Print the plan without changing the host')
    .option('--json', 'JSON-only output (final summary object)')
    .option('--ndjson', 'Compact one-line JSON summary (implies --json)')
    .option('--quiet', 'Error-only output')
    .option('--verbose', 'Verbose output')
    .option('--no-emoji', 'Disable emoji prefixes for logs')
    .option('--timestamps', 'Prefix logs and JSON with ISO timestamps')
    .addOption(new Option('--color <mode>', 'Color mode').choices(['auto', 'always', 'never']).default('auto'))
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
  if (deps.output !== undefined) program.configureOutput(deps.output)

  program.action(async (): Promise<void> => {
    const opts: CliOptions = program.opts<CliOptions>()
    applyOutputFlags(opts)
    const jsonMode: boolean = opts.json === true || opts.ndjson === true
    const config: ProvisionConfig | ProvisionError = configFrom(opts, env, deps.cwd ?? process.cwd())
    if (config instanceof ProvisionError) {
      const err = config
      if (jsonMode) {
        logger.json(withSchemaCheck({ ok: false, action: 'provision', exitCode: err.exitCode, steps: [], code: err.code, message: err.message, final: true }))
      } else {
        logger.error(err.message)
        program.outputHelp({ error: true })
      }
      onExit(err.exitCode)
      return
    }
    const result = await provision(config, deps)
    if (jsonMode) logger.json(withSchemaCheck(summarizeResult(config.domain, config.dryRun, result)))
    onExit(result.exitCode)
  })
  return program
}

/**
 * Parse argv (node-style, program name at index 1) and provision.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0
  const program = createProgram(deps, (code) => { exitCode = code })
  try {
    await program.parseAsync([...argv])
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  return exitCode
}
