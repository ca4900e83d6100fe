import { spawn, type SpawnOptions as NodeSpawnOptions } from 'node:child_process'
import { EOL } from 'node:os'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface SpawnCtl {
  readonly done: Promise<ExecResult>
  cancel(reason?: string): void
}

export interface ExecOptions {
  readonly cwd?: string
  /** Merged over process.env. */
  readonly env?: Readonly<Record<string, string>>
  readonly redactors?: readonly RegExp[]
}

export interface SpawnOptions extends ExecOptions {
  readonly onStdout?: (chunk: string) => void
  readonly onStderr?: (chunk: string) => void
}

export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
  spawn(bin: string, args: readonly string[], opts?: SpawnOptions): SpawnCtl
}

/** Exit code reported when the binary could not be started at all. */
export const SPAWN_FAILED_CODE = 127

function redact(s: string, patterns?: readonly RegExp[]): string {
  if (!patterns || patterns.length === 0) return s
  let out = s
  for (const re of patterns) out = out.replace(re, '******')
  return out
}

/**
 * Forwards text to `sink` one complete line at a time, so a redaction
 * pattern never straddles two chunks. `flush` emits any trailing partial line.
 */
function lineSink(sink: ((chunk: string) => void) | undefined, patterns?: readonly RegExp[]): { push(s: string): void; flush(): void } {
  let pending = ''
  return {
    push(s: string): void {
      if (!sink) return
      pending += s
      const cut = pending.lastIndexOf('\n')
      if (cut < 0) return
      sink(redact(pending.slice(0, cut + 1), patterns))
      pending = pending.slice(cut + 1)
    },
    flush(): void {
      if (!sink || pending.length === 0) return
      sink(redact(pending, patterns))
      pending = ''
    }
  }
}

/** Render a command line for logs and the command plan. */
export function formatCommand(bin: string, args: readonly string[]): string {
  const quote = (a: string): string => (/^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replace(/'/g, `'\\''`)}'`)
  return [bin, ...args].map(quote).join(' ')
}

export class NodeProcessRunner implements ProcessRunner {
  async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const ctl = this.spawn(bin, args, opts)
    return await ctl.done
  }

  spawn(bin: string, args: readonly string[], opts?: SpawnOptions): SpawnCtl {
    const env: NodeJS.ProcessEnv = opts?.env !== undefined ? { ...process.env, ...opts.env } : process.env
    const nodeOpts: NodeSpawnOptions = { cwd: opts?.cwd, env, shell: false, windowsHide: true }
    const child = spawn(bin, [...args], nodeOpts)
    let stdout = ''
    let stderr = ''
    const outLines = lineSink(opts?.onStdout, opts?.redactors)
    const errLines = lineSink(opts?.onStderr, opts?.redactors)
    const flush = (): void => { outLines.flush(); errLines.flush() }
    // utf8 decoding keeps multibyte characters split across chunks intact
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (s: string) => { stdout += s; outLines.push(s) })
    child.stderr?.on('data', (s: string) => { stderr += s; errLines.push(s) })

    const done = new Promise<ExecResult>((resolve) => {
      child.on('error', (err: Error) => {
        const msg = `${bin}: ${err.message}${EOL}`
        stderr += msg
        errLines.push(msg)
        flush()
        resolve({ ok: false, code: SPAWN_FAILED_CODE, stdout, stderr })
      })
      child.on('close', (code: number | null) => {
        flush()
        resolve({ ok: code === 0, code, stdout, stderr })
      })
    })

    return {
      done,
      cancel: (reason?: string): void => {
        child.kill('SIGTERM')
        if (reason) stderr += `${EOL}cancelled: ${reason}${EOL}`
      }
    }
  }
}
