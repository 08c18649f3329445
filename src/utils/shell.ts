/**
 * POSIX shell quoting for commands that must travel as one string (ssh hands
 * its command line to the remote login shell). Callers build argument
 * vectors; only this module turns them into text.
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/

export function shellQuote(arg: string): string {
  if (arg.length === 0) return "''"
  if (SAFE_WORD.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function renderCommand(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ')
}
