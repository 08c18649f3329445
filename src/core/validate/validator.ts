import type { ValidationReport } from '../../types/deploy-summary'
import { constants } from '../../constants'
import { logger } from '../../utils/logger'
import type { RemoteResult, RemoteSession } from '../remote/session'

/** Resolves with the HTTP status of a HEAD request, rejects when nothing answers. */
export type HttpHead = (url: string, timeoutMs: number) => Promise<number>

export const fetchHead: HttpHead = async (url: string, timeoutMs: number): Promise<number> => {
  const res: Response = await fetch(url, { method: 'HEAD', redirect: 'manual', signal: AbortSignal.timeout(timeoutMs) })
  return res.status
}

export function externalUrl(host: string): string {
  return host.includes(':') ? `http://[${host}]/` : `http://${host}/`
}

export interface ValidatorOptions {
  readonly httpHead?: HttpHead
  readonly timeoutMs?: number
}

/**
 * Best-effort reachability checks. Both outcomes are reported; neither ever
 * fails the run.
 */
export class Validator {
  private readonly httpHead: HttpHead
  private readonly timeoutMs: number

  public constructor(private readonly session: RemoteSession, opts: ValidatorOptions = {}) {
    this.httpHead = opts.httpHead ?? fetchHead
    this.timeoutMs = opts.timeoutMs ?? constants.HTTP_CHECK_TIMEOUT_MS
  }

  public async validate(appPort: number): Promise<ValidationReport> {
    const local: boolean = await this.checkLocal(appPort)
    const external: boolean = await this.checkExternal()
    return { local, external }
  }

  private async checkLocal(appPort: number): Promise<boolean> {
    const seconds: string = String(Math.ceil(this.timeoutMs / 1000))
    const res: RemoteResult = await this.session.execute(
      ['curl', '-sS', '-I', '--max-time', seconds, `http://127.0.0.1:${appPort}`],
      { tolerateFailure: true }
    )
    if (!res.ok) {
      logger.warn(`Container did not answer on 127.0.0.1:${appPort} from the host`)
      return false
    }
    const head: string = res.output.split(/\r?\n/).slice(0, 10).join('\n').trimEnd()
    logger.success(`Container answers on 127.0.0.1:${appPort}`)
    if (head) logger.info(head)
    return true
  }

  private async checkExternal(): Promise<boolean> {
    const url: string = externalUrl(this.session.host)
    try {
      const status: number = await this.httpHead(url, this.timeoutMs)
      logger.success(`External HTTP check OK: ${url} (${status})`)
      return true
    } catch (err) {
      const reason: string = err instanceof Error ? err.message : String(err)
      logger.warn(`External HTTP check failed for ${url}: ${reason}. Check firewall/security group rules or the nginx config.`)
      return false
    }
  }
}
