import Ajv2020 from 'ajv/dist/2020'
import { constants } from '../constants'
import type { DeployDefaults } from '../config'
import { CleanupOrchestrator, type CleanupOutcome } from '../core/cleanup/orchestrator'
import { collectRemoteTarget } from '../core/input/collector'
import { RemoteSession } from '../core/remote/session'
import { cleanupSummarySchema } from '../schemas/cleanup-summary.schema'
import type { RemoteTarget } from '../types/deployment-request'
import { logger } from '../utils/logger'
import type { Prompter } from '../utils/prompt'
import { openRunLog, promptsFor, resolveDefaults, type CommandDeps, type TargetFlags } from './shared'

export interface CleanupCommandOptions extends TargetFlags {
  /** Confirmation answer given up front, for --ci runs */
  readonly confirm?: string
}

export interface CleanupSummary extends CleanupOutcome {
  readonly ok: true
  readonly action: 'cleanup'
  readonly host: string
  readonly logFile: string
  readonly final: true
}

export interface CleanupSummaryWithSchema extends CleanupSummary {
  readonly schemaOk: boolean
  readonly schemaErrors: readonly string[]
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateSummary = ajv.compile(cleanupSummarySchema)

export function annotateCleanupSummary(summary: CleanupSummary): CleanupSummaryWithSchema {
  const ok: boolean = validateSummary(summary)
  const errs: string[] = ok ? [] : (validateSummary.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'invalid'}`)
  return { ...summary, schemaOk: ok, schemaErrors: errs }
}

/**
 * Tear down what a deploy left on the host. Only the exact confirmation
 * token proceeds; an aborted cleanup is still a successful run.
 */
export async function runCleanup(opts: CleanupCommandOptions, deps: CommandDeps): Promise<CleanupSummary> {
  const defaults: DeployDefaults = await resolveDefaults(opts, deps)
  const logFile: string = openRunLog(defaults.logDir, deps)
  logger.info(`Logging to ${logFile}`)

  logger.section('Cleanup')
  const prompter: Prompter = promptsFor(opts, deps)
  const target: RemoteTarget = await collectRemoteTarget({ prompter, defaults })
  const orchestrator: CleanupOrchestrator = new CleanupOrchestrator(new RemoteSession(target, deps.runner))
  const outcome: CleanupOutcome = await orchestrator.run(async (): Promise<string> => {
    if (opts.confirm !== undefined) return opts.confirm.trim()
    if (opts.ci === true) return ''
    const answer: string = await prompter.ask({
      message: `This stops the app containers and deletes ${constants.REMOTE_APP_DIR} and the nginx site on ${target.host}. Type ${constants.CLEANUP_CONFIRM_TOKEN} to proceed`
    })
    return answer.trim()
  })
  const summary: CleanupSummary = { ...outcome, ok: true, action: 'cleanup', host: target.host, logFile, final: true }
  if (opts.json === true) logger.json(annotateCleanupSummary(summary))
  else logger.note(`Full log: ${logFile}`)
  return summary
}
