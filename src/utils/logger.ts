import { colorize } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly debug: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly json: (val: unknown) => void
  readonly isJsonOnly: () => boolean
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setJsonCompact: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let jsonCompact = false
let ndjson = false
let timestampsOn = false
let redactors: RegExp[] = []

function enabled(kind: LogLevel): boolean {
  return LEVEL_RANK[kind] <= LEVEL_RANK[level]
}

function applyRedaction(msg: string): string {
  if (redactors.length === 0) return msg
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  // Leave pre-colored messages (success/note) alone
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // eslint-disable-next-line no-console
  console[kind === 'error' || kind === 'warn' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  info: (msg: string): void => { if (enabled('info')) write('info', msg) },
  warn: (msg: string): void => { if (enabled('warn')) write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  debug: (msg: string): void => { if (enabled('debug')) write('debug', msg) },
  success: (msg: string): void => {
    if (!enabled('info')) return
    const text = `${noEmoji ? '[ok]' : '✓'} ${msg}`
    write('info', colorize('green', text))
  },
  note: (msg: string): void => {
    if (!enabled('info')) return
    const text = `${noEmoji ? '[note]' : '✱'} ${msg}`
    write('info', colorize('blue', text))
  },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', applyRedaction(title))}\n${colorize('cyan', bar)}`)
  },
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = ndjson || jsonCompact ? JSON.stringify(v) : JSON.stringify(v, null, 2)
    // eslint-disable-next-line no-console
    console.log(applyRedaction(line))
  },
  isJsonOnly: (): boolean => jsonOnly,
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setJsonCompact: (on: boolean): void => { jsonCompact = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) { jsonOnly = true; jsonCompact = true } },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map((p) => p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g'))
  }
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
