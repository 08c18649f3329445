import { posix } from 'node:path'
import type { BuildDescriptor } from '../../types/working-copy'
import { constants } from '../../constants'
import { logger } from '../../utils/logger'
import { detectRemoteDescriptor } from '../detectors/build-descriptor'
import { resolveComposeCommand } from '../deploy/compose'
import { removeNamedContainers } from '../deploy/containers'
import { sitePaths, type SitePaths } from '../proxy/nginx'
import type { RemoteResult, RemoteSession } from '../remote/session'

export type CleanupState = 'idle' | 'awaiting-confirmation' | 'executing' | 'done'

export interface CleanupStepResult {
  readonly title: string
  readonly ok: boolean
  readonly detail?: string
}

export interface CleanupOutcome {
  readonly state: CleanupState
  readonly aborted: boolean
  readonly steps: readonly CleanupStepResult[]
}

interface StepReport { readonly ok: boolean; readonly detail?: string }

export interface CleanupOptions {
  readonly remoteDir?: string
  readonly confirmToken?: string
}

/**
 * Reverses a deploy: containers, app directory, nginx site.
 *
 * idle → awaiting-confirmation → executing → done. Anything but the exact
 * confirmation token falls back to idle without touching the host. Once
 * executing, every step is best-effort and the run always reaches done.
 */
export class CleanupOrchestrator {
  private current: CleanupState = 'idle'
  private readonly remoteDir: string
  private readonly confirmToken: string
  private readonly paths: SitePaths = sitePaths()

  public constructor(private readonly session: RemoteSession, opts: CleanupOptions = {}) {
    this.remoteDir = opts.remoteDir ?? constants.REMOTE_APP_DIR
    this.confirmToken = opts.confirmToken ?? constants.CLEANUP_CONFIRM_TOKEN
  }

  public get state(): CleanupState { return this.current }

  public async run(readConfirmation: () => Promise<string>): Promise<CleanupOutcome> {
    if (this.current === 'awaiting-confirmation' || this.current === 'executing') {
      throw new Error(`cleanup already in progress (${this.current})`)
    }
    this.current = 'awaiting-confirmation'
    const answer: string = await this.confirm(readConfirmation)
    if (answer !== this.confirmToken) {
      this.current = 'idle'
      logger.info('Cleanup aborted')
      return { state: this.current, aborted: true, steps: [] }
    }
    try {
      await this.session.connectCheck()
    } catch (err) {
      this.current = 'idle'
      throw err
    }
    this.current = 'executing'
    logger.info(`Removing containers, ${this.remoteDir} and the nginx site on ${this.session.host}`)
    const steps: CleanupStepResult[] = []
    steps.push(await this.step('Stop compose stack', () => this.composeDown()))
    steps.push(await this.step(`Remove containers named ${constants.APP_NAME}`, () => this.removeContainers()))
    steps.push(await this.step(`Delete ${this.remoteDir}`, () => this.tolerated(['sudo', 'rm', '-rf', this.remoteDir])))
    steps.push(await this.step('Delete nginx site', () => this.tolerated(['sudo', 'rm', '-f', this.paths.available, this.paths.enabled])))
    steps.push(await this.step('Reload nginx', () => this.reloadProxy()))
    this.current = 'done'
    const failed: number = steps.filter((s) => !s.ok).length
    if (failed > 0) logger.warn(`Cleanup finished with ${failed} step(s) skipped or failed`)
    else logger.success('Cleanup complete')
    return { state: this.current, aborted: false, steps }
  }

  private async confirm(readConfirmation: () => Promise<string>): Promise<string> {
    try {
      return await readConfirmation()
    } catch (err) {
      this.current = 'idle'
      throw err
    }
  }

  private async step(title: string, fn: () => Promise<StepReport>): Promise<CleanupStepResult> {
    try {
      const report: StepReport = await fn()
      return { title, ...report }
    } catch (err) {
      const detail: string = err instanceof Error ? err.message : String(err)
      logger.warn(`${title} failed: ${detail}`)
      return { title, ok: false, detail }
    }
  }

  private async tolerated(command: readonly string[]): Promise<StepReport> {
    const res: RemoteResult = await this.session.execute(command, { tolerateFailure: true })
    return { ok: res.ok }
  }

  private async composeDown(): Promise<StepReport> {
    const descriptor: BuildDescriptor | undefined = await detectRemoteDescriptor(this.session, this.remoteDir)
    if (!descriptor || descriptor.kind !== 'compose') return { ok: true, detail: 'no compose file' }
    const compose: string[] = await resolveComposeCommand(this.session)
    return await this.tolerated([...compose, '-f', posix.join(this.remoteDir, descriptor.file), 'down'])
  }

  private async removeContainers(): Promise<StepReport> {
    const removed: number = await removeNamedContainers(this.session, constants.APP_NAME)
    return { ok: true, detail: `${removed} removed` }
  }

  private async reloadProxy(): Promise<StepReport> {
    const check: RemoteResult = await this.session.execute(['sudo', 'nginx', '-t'], { tolerateFailure: true })
    if (!check.ok) return { ok: false, detail: 'nginx -t failed; not reloaded' }
    return await this.tolerated(['sudo', 'systemctl', 'reload', 'nginx'])
  }
}
