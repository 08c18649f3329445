import { join } from 'node:path'
import type { DeploymentRequest } from '../../types/deployment-request'
import type { BuildDescriptor, WorkingCopy } from '../../types/working-copy'
import type { ExecResult, ProcessRunner } from '../../utils/process'
import { LocalCommandError, MissingBuildDescriptorError } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'
import { secretPatterns } from '../../utils/redaction'
import { renderCommand } from '../../utils/shell'
import { detectLocalDescriptor } from '../detectors/build-descriptor'

/** `https://github.com/acme/shop.git` and `git@github.com:acme/shop.git` both give `shop`. */
export function repoNameFromUrl(url: string): string {
  const trimmed: string = url.trim().replace(/\/+$/, '').replace(/\.git$/, '')
  const last: string = trimmed.split(/[/:]/).pop() ?? ''
  return last.length > 0 && last !== '.' && last !== '..' ? last : 'app'
}

/**
 * Embed the token for HTTPS clones. Known weakness: the resulting URL is
 * visible in the local process list while git runs and is stored as the
 * checkout's origin. SSH URLs ignore the token.
 */
export function authenticatedUrl(url: string, token?: string): string {
  if (!token || !url.startsWith('https://')) return url
  return `https://${encodeURIComponent(token)}@${url.slice('https://'.length)}`
}

export class SourceStager {
  public constructor(private readonly runner: ProcessRunner) {}

  /** Clone or fast-forward the checkout under workDir and check it can be deployed. */
  public async stage(request: DeploymentRequest, workDir: string): Promise<WorkingCopy> {
    if (request.token) {
      logger.addRedactors([...secretPatterns(request.token), ...secretPatterns(encodeURIComponent(request.token))])
    }
    const dir: string = join(workDir, repoNameFromUrl(request.repoUrl))
    if (await fsx.exists(join(dir, '.git'))) {
      logger.info(`Repository exists at ${dir}, pulling latest ${request.branch}`)
      await this.git(['fetch', '--all'], dir)
      await this.git(['checkout', request.branch], dir)
      await this.git(['pull', '--ff-only', 'origin', request.branch], dir)
    } else {
      logger.info(`Cloning ${request.repoUrl} (${request.branch}) into ${dir}`)
      const url: string = authenticatedUrl(request.repoUrl, request.token)
      if (request.token && url === request.repoUrl) logger.note('Token ignored for non-HTTPS URL; SSH credentials are used instead')
      await this.git(['clone', '--branch', request.branch, '--', url, dir])
    }
    const descriptor: BuildDescriptor | undefined = await detectLocalDescriptor(dir)
    if (!descriptor) throw new MissingBuildDescriptorError(dir)
    logger.success(`Found ${descriptor.file}`)
    return { dir, branch: request.branch, descriptor }
  }

  private async git(args: readonly string[], cwd?: string): Promise<void> {
    const shown: string = `git ${renderCommand(args)}`
    logger.info(`LOCAL> ${shown}`)
    const res: ExecResult = await this.runner.exec('git', args, { cwd })
    if (res.stdout.trim()) logger.debug(res.stdout.trim())
    if (!res.ok) throw new LocalCommandError(shown, `${res.stdout}${res.stderr}`)
  }
}
