import { mkdir, rm, symlink, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { escapeRegExp, logger } from '../utils/logger'
import { formatCommand, type ExecResult, type ProcessRunner } from '../utils/process'

export interface RunOptions {
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
}

const DRY_RESULT: ExecResult = { ok: true, code: 0, stdout: '', stderr: '' }

/**
 * Every host mutation goes through here: commands, file writes, links.
 * Records the plan, streams tool output line by line (redacted), and
 * turns into a recorder only when the run is a dry run.
 */
export class Host {
  private readonly plan: string[] = []
  private redactors: RegExp[] = []
  private readonly secrets = new Set<string>()

  public constructor(private readonly runner: ProcessRunner, public readonly dryRun: boolean) {}

  public get commandPlan(): readonly string[] {
    return [...this.plan]
  }

  public async run(bin: string, args: readonly string[], opts: RunOptions = {}): Promise<ExecResult> {
    const line = formatCommand(bin, args)
    this.plan.push(opts.cwd !== undefined ? `(cd ${opts.cwd}) ${line}` : line)
    logger.info(`$ ${line}`)
    if (this.dryRun) return DRY_RESULT
    const toStdout = (chunk: string): void => { (logger.isJsonOnly() ? process.stderr : process.stdout).write(chunk) }
    const toStderr = (chunk: string): void => { process.stderr.write(chunk) }
    const ctl = this.runner.spawn(bin, args, { cwd: opts.cwd, env: opts.env, redactors: this.redactors, onStdout: toStdout, onStderr: toStderr })
    return await ctl.done
  }

  public async mkdirp(path: string): Promise<void> {
    this.plan.push(`mkdir -p ${path}`)
    if (this.dryRun) return
    await mkdir(path, { recursive: true })
  }

  public async writeFile(path: string, content: string): Promise<void> {
    this.plan.push(`write ${path}`)
    logger.debug(`writing ${path}`)
    if (this.dryRun) return
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, 'utf8')
  }

  /** `ln -sf`: replaces whatever sits at linkPath. */
  public async link(target: string, linkPath: string): Promise<void> {
    this.plan.push(`ln -sf ${target} ${linkPath}`)
    if (this.dryRun) return
    await mkdir(dirname(linkPath), { recursive: true })
    await rm(linkPath, { force: true })
    await symlink(target, linkPath)
  }

  /** Keep these values out of logs and streamed tool output from here on. */
  public addSecrets(values: readonly string[]): void {
    const fresh = [...new Set(values)].filter((v) => v.length >= 4 && !this.secrets.has(v))
    if (fresh.length === 0) return
    for (const v of fresh) this.secrets.add(v)
    this.redactors = [...this.redactors, ...fresh.map((v) => new RegExp(escapeRegExp(v), 'g'))]
    logger.setRedactors(this.redactors)
  }
}

