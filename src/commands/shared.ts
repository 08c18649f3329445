import { join, resolve } from 'node:path'
import { loadConfig, type DeployDefaults } from '../config'
import type { ProcessRunner } from '../utils/process'
import type { Prompter } from '../utils/prompt'
import { ScriptedPrompter } from '../utils/prompt'
import type { Sleep } from '../utils/time'
import { runStamp } from '../utils/time'
import type { HttpHead } from '../core/validate/validator'
import { logger } from '../utils/logger'

/** Collaborators the commands talk to; tests replace them with in-process fakes. */
export interface CommandDeps {
  readonly runner: ProcessRunner
  readonly prompter: Prompter
  readonly sleep?: Sleep
  readonly httpHead?: HttpHead
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
  readonly now?: () => Date
}

/** Flags shared by both modes; flags win over .env and environment defaults. */
export interface TargetFlags {
  readonly user?: string
  readonly host?: string
  readonly key?: string
  readonly workDir?: string
  readonly logDir?: string
  readonly ci?: boolean
  readonly json?: boolean
}

export interface DeployFlags extends TargetFlags {
  readonly repo?: string
  readonly branch?: string
  readonly port?: string
}

export async function resolveDefaults(flags: DeployFlags, deps: CommandDeps): Promise<DeployDefaults> {
  const cwd: string = deps.cwd ?? process.cwd()
  const base: DeployDefaults = await loadConfig({ cwd, env: deps.env })
  return {
    ...base,
    repoUrl: flags.repo ?? base.repoUrl,
    branch: flags.branch ?? base.branch,
    sshUser: flags.user ?? base.sshUser,
    host: flags.host ?? base.host,
    sshKeyPath: flags.key ?? base.sshKeyPath,
    appPort: flags.port ?? base.appPort,
    workDir: flags.workDir !== undefined ? resolve(cwd, flags.workDir) : base.workDir,
    logDir: flags.logDir !== undefined ? resolve(cwd, flags.logDir) : base.logDir
  }
}

/** Under --ci every prompt takes its default. */
export function promptsFor(flags: TargetFlags, deps: CommandDeps): Prompter {
  return flags.ci === true ? new ScriptedPrompter([]) : deps.prompter
}

/** Start the per-run log file and return its path. */
export function openRunLog(logDir: string, deps: CommandDeps): string {
  const now: Date = (deps.now ?? ((): Date => new Date()))()
  const file: string = join(logDir, `deploy_${runStamp(now)}.log`)
  logger.setFile(file)
  return file
}
