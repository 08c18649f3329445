import type { RemoteTarget } from '../../types/deployment-request'
import type { ExecResult, ProcessRunner } from '../../utils/process'
import { ConnectivityError, RemoteCommandError, mapSshError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { renderCommand } from '../../utils/shell'
import { constants } from '../../constants'

/** A remote command as an argument vector; quoting happens in one place. */
export type RemoteCommand = readonly string[]

export interface ExecuteOptions {
  /** Report a non-zero exit as a warning and return it instead of throwing */
  readonly tolerateFailure?: boolean
  /** Sent to the remote command's stdin */
  readonly input?: string
}

export interface RemoteResult {
  readonly ok: boolean
  readonly exitCode: number | null
  /** stdout followed by stderr */
  readonly output: string
}

interface LineSink {
  readonly push: (chunk: string) => void
  readonly end: () => void
}

function debugLines(): LineSink {
  let buf = ''
  return {
    push: (chunk: string): void => {
      buf += chunk
      const parts: string[] = buf.split(/\r?\n/)
      buf = parts.pop() ?? ''
      for (const line of parts) if (line.trim().length > 0) logger.debug(`  ${line}`)
    },
    end: (): void => {
      if (buf.trim().length > 0) logger.debug(`  ${buf}`)
      buf = ''
    }
  }
}

/**
 * The single channel to one host. Every remote step goes through here so
 * transport, authentication and logging are handled once.
 */
export class RemoteSession {
  private connected = false

  public constructor(
    private readonly target: RemoteTarget,
    private readonly runner: ProcessRunner
  ) {}

  public get host(): string { return this.target.host }

  public get user(): string { return this.target.sshUser }

  /** user@host */
  public get address(): string { return `${this.target.sshUser}@${this.target.host}` }

  /** `user@host:dir` for rsync and scp; IPv6 hosts need brackets there. */
  public remoteSpec(remoteDir: string): string {
    const host: string = this.target.host.includes(':') ? `[${this.target.host}]` : this.target.host
    return `${this.target.sshUser}@${host}:${remoteDir}`
  }

  /** Options shared by ssh, scp and the ssh that rsync spawns. */
  public sshOptions(): string[] {
    return [
      '-i', this.target.sshKeyPath,
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', 'ConnectTimeout=15'
    ]
  }

  public async connectCheck(): Promise<void> {
    logger.info(`Checking SSH connectivity to ${this.address}`)
    const res: ExecResult = await this.runner.exec('ssh', [...this.sshOptions(), this.address, 'echo connected'], {
      timeoutMs: constants.CONNECT_CHECK_TIMEOUT_MS
    })
    if (!res.ok) throw new ConnectivityError(mapSshError(this.address, res.stderr))
    this.connected = true
    logger.success('SSH connectivity OK')
  }

  public async execute(command: RemoteCommand, opts: ExecuteOptions = {}): Promise<RemoteResult> {
    this.requireConnected()
    const rendered: string = renderCommand(command)
    logger.info(`REMOTE> ${rendered}`)
    const res: RemoteResult = await this.run(rendered, opts.input)
    if (!res.ok) {
      if (opts.tolerateFailure === true) {
        logger.warn(`Ignored failure (exit ${res.exitCode ?? 'signal'}): ${rendered}`)
        return res
      }
      throw new RemoteCommandError({ command: rendered, exitCode: res.exitCode, output: res.output })
    }
    return res
  }

  /** Ask a yes/no question of the host, e.g. `command -v docker`. Failure is an answer, not an error. */
  public async succeeds(command: RemoteCommand): Promise<boolean> {
    this.requireConnected()
    const rendered: string = renderCommand(command)
    logger.debug(`REMOTE? ${rendered}`)
    const res: RemoteResult = await this.run(rendered)
    return res.ok
  }

  /**
   * Make remoteDir an exact copy of localDir, deleting remote files that no
   * longer exist locally.
   */
  public async sync(localDir: string, remoteDir: string): Promise<void> {
    this.requireConnected()
    const base: string = localDir.replace(/\/+$/, '')
    if (await this.runner.has('rsync')) {
      const args: string[] = ['-az', '--delete', '-e', renderCommand(['ssh', ...this.sshOptions()]), `${base}/`, this.remoteSpec(`${remoteDir}/`)]
      logger.info(`LOCAL> rsync ${renderCommand(args)}`)
      await this.local('rsync', args)
      return
    }
    logger.warn('rsync not found locally, falling back to scp (slower, full copy)')
    await this.execute(['sudo', 'rm', '-rf', remoteDir])
    await this.execute(['sudo', 'mkdir', '-p', remoteDir])
    await this.execute(['sudo', 'chown', `${this.user}:`, remoteDir])
    const args: string[] = [...this.sshOptions(), '-r', `${base}/.`, this.remoteSpec(remoteDir)]
    logger.info(`LOCAL> scp ${renderCommand(args)}`)
    await this.local('scp', args)
  }

  private requireConnected(): void {
    if (!this.connected) throw new Error('RemoteSession used before connectCheck()')
  }

  private async run(rendered: string, input?: string): Promise<RemoteResult> {
    const out: LineSink = debugLines()
    const res: ExecResult = await this.runner.exec('ssh', [...this.sshOptions(), this.address, rendered], {
      input,
      onStdout: out.push,
      onStderr: out.push
    })
    out.end()
    return { ok: res.ok, exitCode: res.code, output: `${res.stdout}${res.stderr}` }
  }

  private async local(bin: string, args: readonly string[]): Promise<void> {
    const out: LineSink = debugLines()
    const res: ExecResult = await this.runner.exec(bin, args, { onStdout: out.push, onStderr: out.push })
    out.end()
    if (!res.ok) {
      throw new RemoteCommandError({ command: `${bin} ${renderCommand(args)}`, exitCode: res.code, output: `${res.stdout}${res.stderr}` })
    }
  }
}
