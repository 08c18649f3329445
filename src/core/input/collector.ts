import Ajv2020 from 'ajv/dist/2020'
import type { ErrorObject } from 'ajv'
import type { DeployDefaults } from '../../config'
import type { DeploymentRequest, RemoteTarget } from '../../types/deployment-request'
import { deploymentRequestSchema, remoteTargetSchema } from '../../schemas/deployment-request.schema'
import { ValidationError } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import type { Prompter } from '../../utils/prompt'

/** Raw operator answers, before any parsing. */
export interface RawRequest {
  readonly repoUrl: string
  readonly token: string
  readonly branch: string
  readonly sshUser: string
  readonly host: string
  readonly sshKeyPath: string
  readonly appPort: string
}

export type RawTarget = Pick<RawRequest, 'sshUser' | 'host' | 'sshKeyPath'>

const LABELS: Readonly<Record<string, string>> = {
  repoUrl: 'Git repository URL',
  token: 'Access token',
  branch: 'Branch name',
  sshUser: 'SSH username',
  host: 'Remote host',
  sshKeyPath: 'SSH key path',
  appPort: 'Application port'
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateRequestShape = ajv.compile(deploymentRequestSchema)
const validateTargetShape = ajv.compile(remoteTargetSchema)

function messageFor(e: ErrorObject): string {
  const field: string = e.instancePath.replace(/^\//, '')
  const label: string = LABELS[field] ?? (field || 'Input')
  if (e.keyword === 'minLength') return `${label} is required`
  if (e.keyword === 'pattern') return `${label} contains characters that are not allowed`
  if (field === 'appPort') return `${label} must be a whole number between 1 and 65535`
  return `${label} ${e.message ?? 'is invalid'}`
}

function shapeErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (!errors) return []
  // one message per field is enough
  const seen = new Set<string>()
  const out: string[] = []
  for (const e of errors) {
    if (seen.has(e.instancePath)) continue
    seen.add(e.instancePath)
    out.push(messageFor(e))
  }
  return out
}

function parsePort(text: string): number {
  return /^\d+$/.test(text.trim()) ? Number(text.trim()) : Number.NaN
}

async function ensureKeyFile(path: string): Promise<void> {
  if (!(await fsx.isFile(path))) {
    throw new ValidationError(`SSH key file not found: ${path}`, 'Pass the path to an existing private key (e.g. ~/.ssh/id_ed25519).')
  }
}

export async function validateRemoteTarget(raw: RawTarget): Promise<RemoteTarget> {
  const target: RemoteTarget = {
    sshUser: raw.sshUser.trim(),
    host: raw.host.trim(),
    sshKeyPath: fsx.expandHome(raw.sshKeyPath.trim())
  }
  if (!validateTargetShape(target)) {
    throw new ValidationError(shapeErrors(validateTargetShape.errors).join('; '))
  }
  await ensureKeyFile(target.sshKeyPath)
  return target
}

/**
 * Turn raw answers into a DeploymentRequest, or fail before anything touches
 * the network or the disk beyond a stat of the key file.
 */
export async function validateDeploymentRequest(raw: RawRequest): Promise<DeploymentRequest> {
  const token: string = raw.token.trim()
  const request: DeploymentRequest = {
    repoUrl: raw.repoUrl.trim(),
    ...(token.length > 0 ? { token } : {}),
    branch: raw.branch.trim(),
    sshUser: raw.sshUser.trim(),
    host: raw.host.trim(),
    sshKeyPath: fsx.expandHome(raw.sshKeyPath.trim()),
    appPort: parsePort(raw.appPort)
  }
  if (!validateRequestShape(request)) {
    throw new ValidationError(shapeErrors(validateRequestShape.errors).join('; '))
  }
  await ensureKeyFile(request.sshKeyPath)
  return Object.freeze(request)
}

export interface CollectArgs {
  readonly prompter: Prompter
  readonly defaults: DeployDefaults
}

async function askTarget(args: CollectArgs): Promise<RawTarget> {
  const { prompter, defaults } = args
  const sshUser: string = await prompter.ask({ message: 'Remote SSH username', defaultValue: defaults.sshUser })
  const host: string = await prompter.ask({ message: 'Remote server address', defaultValue: defaults.host })
  const sshKeyPath: string = await prompter.ask({ message: 'Path to SSH private key', defaultValue: defaults.sshKeyPath })
  return { sshUser, host, sshKeyPath }
}

export async function collectDeploymentRequest(args: CollectArgs): Promise<DeploymentRequest> {
  const { prompter, defaults } = args
  const repoUrl: string = await prompter.ask({ message: 'Git repository URL (https:// or git@...)', defaultValue: defaults.repoUrl })
  const token: string = await prompter.ask({ message: 'Access token for private repositories (blank for public)', defaultValue: defaults.token, secret: true })
  const branch: string = await prompter.ask({ message: 'Branch name', defaultValue: defaults.branch })
  const target: RawTarget = await askTarget(args)
  const appPort: string = await prompter.ask({ message: 'Application port inside the container', defaultValue: defaults.appPort })
  return await validateDeploymentRequest({ repoUrl, token, branch, ...target, appPort })
}

export async function collectRemoteTarget(args: CollectArgs): Promise<RemoteTarget> {
  return await validateRemoteTarget(await askTarget(args))
}
