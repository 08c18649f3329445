import Ajv2020 from 'ajv/dist/2020'
import { constants } from '../constants'
import type { DeployDefaults } from '../config'
import { collectDeploymentRequest } from '../core/input/collector'
import { SourceStager } from '../core/source/stager'
import { RemoteSession } from '../core/remote/session'
import { EnvironmentProvisioner } from '../core/provision/provisioner'
import { transfer } from '../core/transfer/transfer'
import { DeploymentExecutor, type DeployOutcome } from '../core/deploy/executor'
import { ProxyConfigurator } from '../core/proxy/configurator'
import { Validator } from '../core/validate/validator'
import { deploySummarySchema } from '../schemas/deploy-summary.schema'
import type { DeploymentRequest } from '../types/deployment-request'
import type { DeploySummary, ValidationReport } from '../types/deploy-summary'
import type { WorkingCopy } from '../types/working-copy'
import { logger } from '../utils/logger'
import { openRunLog, promptsFor, resolveDefaults, type CommandDeps, type DeployFlags } from './shared'

export type DeployOptions = DeployFlags

export interface SummaryWithSchema extends DeploySummary {
  readonly schemaOk: boolean
  readonly schemaErrors: readonly string[]
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateSummary = ajv.compile(deploySummarySchema)

export function annotateSummary(summary: DeploySummary): SummaryWithSchema {
  const ok: boolean = validateSummary(summary)
  const errs: string[] = ok ? [] : (validateSummary.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'invalid'}`)
  return { ...summary, schemaOk: ok, schemaErrors: errs }
}

/**
 * The full pipeline: inputs, local checkout, host provisioning, transfer,
 * build and start, nginx, reachability checks. Any step that throws stops
 * the run; the caller maps the error to an exit code.
 */
export async function runDeploy(opts: DeployOptions, deps: CommandDeps): Promise<DeploySummary> {
  const started: number = Date.now()
  const defaults: DeployDefaults = await resolveDefaults(opts, deps)
  const logFile: string = openRunLog(defaults.logDir, deps)
  logger.info(`Logging to ${logFile}`)

  logger.section('Inputs')
  const request: DeploymentRequest = await collectDeploymentRequest({ prompter: promptsFor(opts, deps), defaults })
  logger.info(`Deploying ${request.repoUrl} (${request.branch}) to ${request.sshUser}@${request.host}, app port ${request.appPort}`)

  logger.section('Source')
  const workingCopy: WorkingCopy = await new SourceStager(deps.runner).stage(request, defaults.workDir)

  logger.section('Connect')
  const session: RemoteSession = new RemoteSession(request, deps.runner)
  await session.connectCheck()

  logger.section('Provision')
  await new EnvironmentProvisioner(session).provision(constants.REMOTE_APP_DIR)

  logger.section('Transfer')
  await transfer(session, workingCopy, constants.REMOTE_APP_DIR)

  logger.section('Deploy')
  const outcome: DeployOutcome = await new DeploymentExecutor(session, { sleep: deps.sleep }).deploy(constants.REMOTE_APP_DIR, request.appPort)

  logger.section('Proxy')
  await new ProxyConfigurator(session).configure(request.appPort)

  logger.section('Validate')
  const validation: ValidationReport = await new Validator(session, { httpHead: deps.httpHead }).validate(request.appPort)

  const summary: DeploySummary = {
    ok: true,
    action: 'deploy',
    host: request.host,
    appPort: request.appPort,
    strategy: outcome.strategy,
    validation,
    logFile,
    durationMs: Date.now() - started,
    final: true
  }
  if (opts.json === true) {
    logger.json(annotateSummary(summary))
  } else {
    logger.success(`Deployed to http://${request.host}/ (${outcome.strategy})`)
    logger.note(`Full log: ${logFile}`)
  }
  return summary
}
