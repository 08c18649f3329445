import { stat } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isFile: (path: string) => Promise<boolean>
  readonly expandHome: (path: string) => string
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isFile(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() } catch { return false }
}

function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}

export const fsx: FSX = { exists, isFile, expandHome }
