import { posix } from 'node:path'
import type { BuildDescriptor } from '../../types/working-copy'
import type { DeployStrategy } from '../../types/deploy-summary'
import { constants } from '../../constants'
import { NoBuildTargetError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { sleep as realSleep, type Sleep } from '../../utils/time'
import { detectRemoteDescriptor } from '../detectors/build-descriptor'
import type { RemoteResult, RemoteSession } from '../remote/session'
import { resolveComposeCommand } from './compose'
import { removeNamedContainers } from './containers'

export interface DeployOutcome {
  readonly strategy: DeployStrategy
  /** Container listing taken after the grace period; informational only */
  readonly status: string
}

export interface ExecutorOptions {
  readonly graceMs?: number
  readonly sleep?: Sleep
}

/**
 * Build and (re)start the application on the host, replacing whatever
 * generation was running before.
 */
export class DeploymentExecutor {
  private readonly graceMs: number
  private readonly sleep: Sleep

  public constructor(private readonly session: RemoteSession, opts: ExecutorOptions = {}) {
    this.graceMs = opts.graceMs ?? constants.START_GRACE_MS
    this.sleep = opts.sleep ?? realSleep
  }

  public async deploy(remoteDir: string, appPort: number): Promise<DeployOutcome> {
    // Checked again after transfer: the remote tree is what gets built
    const descriptor: BuildDescriptor | undefined = await detectRemoteDescriptor(this.session, remoteDir)
    if (!descriptor) throw new NoBuildTargetError(remoteDir)
    logger.info(`Deploying with ${descriptor.kind === 'compose' ? `compose (${descriptor.file})` : 'docker build/run'}`)
    const outcome: DeployOutcome = descriptor.kind === 'compose'
      ? await this.deployCompose(posix.join(remoteDir, descriptor.file))
      : await this.deployImage(remoteDir, appPort)
    if (outcome.status.trim()) logger.info(`Containers:\n${outcome.status.trimEnd()}`)
    return outcome
  }

  private async deployCompose(file: string): Promise<DeployOutcome> {
    const compose: string[] = await resolveComposeCommand(this.session)
    await this.session.execute([...compose, '-f', file, 'down'], { tolerateFailure: true })
    await this.session.execute([...compose, '-f', file, 'build', '--pull'])
    await this.session.execute([...compose, '-f', file, 'up', '-d'])
    await this.sleep(this.graceMs)
    const ps: RemoteResult = await this.session.execute([...compose, '-f', file, 'ps'], { tolerateFailure: true })
    return { strategy: 'compose', status: ps.output }
  }

  private async deployImage(remoteDir: string, appPort: number): Promise<DeployOutcome> {
    const name: string = constants.APP_NAME
    await this.session.execute(['sudo', 'docker', 'build', '-t', name, remoteDir])
    const removed: number = await removeNamedContainers(this.session, name)
    if (removed > 0) logger.info(`Removed ${removed} previous container(s) named ${name}`)
    await this.session.execute(['sudo', 'docker', 'run', '-d', '--name', name, '-p', `${appPort}:${appPort}`, name])
    await this.sleep(this.graceMs)
    const ps: RemoteResult = await this.session.execute(
      ['sudo', 'docker', 'ps', '--filter', `name=${name}`, '--format', 'table {{.Names}}\t{{.Status}}\t{{.Ports}}'],
      { tolerateFailure: true }
    )
    return { strategy: 'dockerfile', status: ps.output }
  }
}
