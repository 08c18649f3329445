import { constants } from '../../constants'
import { ProxyConfigError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import type { RemoteResult, RemoteSession } from '../remote/session'
import { renderSiteConfig, sitePaths, type SitePaths } from './nginx'

export class ProxyConfigurator {
  private readonly paths: SitePaths = sitePaths()

  public constructor(private readonly session: RemoteSession) {}

  /**
   * Write and enable the site, then reload nginx. A config nginx rejects is
   * reported with nginx's own diagnostics and stops the run.
   */
  public async configure(appPort: number): Promise<void> {
    const s: RemoteSession = this.session
    const { temp, available, enabled } = this.paths
    await s.execute(['tee', temp], { input: renderSiteConfig(appPort) })
    await s.execute(['sudo', 'mv', temp, available])
    await s.execute(['sudo', 'ln', '-sf', available, enabled])
    const check: RemoteResult = await s.execute(['sudo', 'nginx', '-t'], { tolerateFailure: true })
    if (!check.ok) {
      const tail: RemoteResult = await s.execute(
        ['sudo', 'tail', '-n', String(constants.NGINX_LOG_TAIL_LINES), constants.NGINX_ERROR_LOG],
        { tolerateFailure: true }
      )
      const diagnostics: string = [check.output.trim(), tail.output.trim()].filter((t) => t.length > 0).join('\n--- error.log ---\n')
      logger.error(`nginx -t failed:\n${diagnostics}`)
      throw new ProxyConfigError(diagnostics)
    }
    await s.execute(['sudo', 'systemctl', 'reload', 'nginx'])
    logger.success(`nginx forwards port 80 -> ${appPort}`)
  }
}
