import { parse } from 'dotenv'
import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { constants } from './constants'
import { fsx } from './utils/fs'

/** Prompt defaults and local paths, as text straight from the environment. */
export interface DeployDefaults {
  readonly repoUrl?: string
  readonly token?: string
  readonly branch: string
  readonly sshUser?: string
  readonly host?: string
  readonly sshKeyPath: string
  readonly appPort: string
  /** Parent directory of the local checkout */
  readonly workDir: string
  readonly logDir: string
}

function pick(vars: Readonly<Record<string, string | undefined>>, key: string): string | undefined {
  const v: string | undefined = vars[key]
  if (typeof v !== 'string') return undefined
  const t: string = v.trim()
  return t.length > 0 ? t : undefined
}

async function readDotenv(path: string): Promise<Record<string, string>> {
  if (!(await fsx.isFile(path))) return {}
  const buf: string = await readFile(path, 'utf8')
  return parse(buf)
}

/**
 * Resolve defaults from `<cwd>/.env` overlaid by the process environment.
 * process.env is read, never written.
 */
export async function loadConfig(args: { readonly cwd: string; readonly env?: NodeJS.ProcessEnv }): Promise<DeployDefaults> {
  const fromFile: Record<string, string> = await readDotenv(join(args.cwd, '.env'))
  const env: NodeJS.ProcessEnv = args.env ?? process.env
  // a blank environment variable does not hide the .env value
  const get = (key: string): string | undefined => pick(env, key) ?? pick(fromFile, key)
  const workDir: string = get('DEPLOY_WORK_DIR') ?? args.cwd
  const logDir: string = get('DEPLOY_LOG_DIR') ?? join(args.cwd, constants.DEFAULT_LOG_DIR)
  return {
    repoUrl: get('DEPLOY_REPO_URL'),
    token: get('DEPLOY_GIT_TOKEN'),
    branch: get('DEPLOY_BRANCH') ?? constants.DEFAULT_BRANCH,
    sshUser: get('DEPLOY_SSH_USER'),
    host: get('DEPLOY_HOST'),
    sshKeyPath: get('DEPLOY_SSH_KEY') ?? constants.DEFAULT_SSH_KEY,
    appPort: get('DEPLOY_APP_PORT') ?? String(constants.DEFAULT_APP_PORT),
    workDir: resolve(args.cwd, workDir),
    logDir: resolve(args.cwd, logDir)
  }
}
