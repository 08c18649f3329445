import { dirname } from 'node:path'
import { mkdir, appendFile } from 'node:fs/promises'
import { colorize, stripAnsi } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setFile: (path: string | undefined) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly addRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly flush: () => Promise<void>
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

// userinfo in URLs (https://token@host/...) never reaches an output
const URL_CREDENTIALS = /(https?:\/\/)[^/\s@]+@/g

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let timestampsOn = false
let filePath: string | undefined
let sink: Promise<void> = Promise.resolve()
let redactors: RegExp[] = []

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function toPattern(p: string | RegExp): RegExp {
  return p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g')
}

function applyRedaction(msg: string): string {
  let out = msg.replace(URL_CREDENTIALS, '$1******@')
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

async function appendLine(path: string, line: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await appendFile(path, line, 'utf8')
  } catch (err) {
    // Stop writing to a sink that cannot be written, but say so once
    if (filePath === path) filePath = undefined
    const reason: string = err instanceof Error ? err.message : String(err)
    console.error(`[warn] log file disabled (${path}): ${reason}`)
  }
}

function toFile(tag: string, msg: string): void {
  const path: string | undefined = filePath
  if (path === undefined) return
  const line = `${new Date().toISOString()} [${tag}] ${stripAnsi(applyRedaction(msg))}\n`
  sink = sink.then(() => appendLine(path, line))
}

function enabled(kind: LogLevel): boolean {
  return !jsonOnly && RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  toFile(kind.toUpperCase(), msg)
  if (!enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  // Colorize by level unless the message already carries its own colors
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => { write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`)) },
  note: (msg: string): void => { write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`)) },
  section: (title: string): void => {
    toFile('SECTION', title)
    if (!enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`)
  },
  json: (val: unknown): void => {
    const line: string = applyRedaction(JSON.stringify(val, null, 2))
    toFile('JSON', line)
    console.log(line)
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setFile: (path: string | undefined): void => { filePath = path },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map(toPattern)
  },
  addRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = [...redactors, ...patterns.map(toPattern)]
  },
  flush: async (): Promise<void> => { await sink }
}
