import type { RemoteResult, RemoteSession } from '../remote/session'
import { UnsupportedPlatformError } from '../../utils/errors'
import { logger } from '../../utils/logger'

export interface ProvisionReport {
  /** Components installed by this run; empty when the host was ready */
  readonly installed: readonly string[]
  readonly versions: readonly string[]
}

const DOCKER_KEYRING = '/etc/apt/keyrings/docker.asc'
const DOCKER_SOURCE_LIST = '/etc/apt/sources.list.d/docker.list'
const DOCKER_REPO_DISTROS: readonly string[] = ['ubuntu', 'debian']

// Fixed text: nothing from the operator is interpolated here
const OS_RELEASE_SCRIPT = '. /etc/os-release && echo "$ID $VERSION_CODENAME"'

function lastLine(output: string): string {
  const lines: string[] = output.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0)
  return lines[lines.length - 1] ?? ''
}

export function dockerAptSource(arch: string, distro: string, codename: string): string {
  return `deb [arch=${arch} signed-by=${DOCKER_KEYRING}] https://download.docker.com/linux/${distro} ${codename} stable\n`
}

/**
 * Bring an apt-based host to "docker + compose + nginx running". Every
 * install is skipped when the tool is already there, so re-running is cheap.
 */
export class EnvironmentProvisioner {
  public constructor(private readonly session: RemoteSession) {}

  public async provision(remoteDir: string): Promise<ProvisionReport> {
    const s: RemoteSession = this.session
    if (!(await s.succeeds(['command', '-v', 'apt-get']))) throw new UnsupportedPlatformError(s.host)
    const installed: string[] = []

    await s.execute(['sudo', 'apt-get', 'update', '-y'])

    if (await s.succeeds(['command', '-v', 'docker'])) {
      logger.info('docker already installed')
    } else {
      await this.installDocker()
      installed.push('docker')
    }

    const hasCompose: boolean = await s.succeeds(['docker', 'compose', 'version']) || await s.succeeds(['command', '-v', 'docker-compose'])
    if (hasCompose) {
      logger.info('compose already available')
    } else {
      await s.execute(['sudo', 'apt-get', 'install', '-y', 'docker-compose-plugin'])
      installed.push('docker-compose-plugin')
    }

    if (await s.succeeds(['command', '-v', 'nginx'])) {
      logger.info('nginx already installed')
    } else {
      await s.execute(['sudo', 'apt-get', 'install', '-y', 'nginx'])
      installed.push('nginx')
    }

    await s.execute(['sudo', 'systemctl', 'enable', '--now', 'docker'], { tolerateFailure: true })
    await s.execute(['sudo', 'systemctl', 'enable', '--now', 'nginx'], { tolerateFailure: true })
    await s.execute(['sudo', 'usermod', '-aG', 'docker', s.user], { tolerateFailure: true })

    // rsync writes as the SSH user, so the app directory must belong to it
    await s.execute(['sudo', 'mkdir', '-p', remoteDir])
    await s.execute(['sudo', 'chown', `${s.user}:`, remoteDir])

    const versions: string[] = await this.versions()
    logger.info(`versions: ${versions.join(' | ')}`)
    return { installed, versions }
  }

  private async installDocker(): Promise<void> {
    const s: RemoteSession = this.session
    logger.info('Installing docker from the Docker apt repository')
    await s.execute(['sudo', 'apt-get', 'install', '-y', 'ca-certificates', 'curl', 'gnupg'])
    const release: RemoteResult = await s.execute(['sh', '-c', OS_RELEASE_SCRIPT])
    const [id = '', codename = ''] = lastLine(release.output).split(/\s+/)
    const distro: string = DOCKER_REPO_DISTROS.includes(id) ? id : 'ubuntu'
    const arch: string = lastLine((await s.execute(['dpkg', '--print-architecture'])).output)
    await s.execute(['sudo', 'install', '-m', '0755', '-d', '/etc/apt/keyrings'])
    await s.execute(['sudo', 'curl', '-fsSL', `https://download.docker.com/linux/${distro}/gpg`, '-o', DOCKER_KEYRING])
    await s.execute(['sudo', 'chmod', 'a+r', DOCKER_KEYRING])
    await s.execute(['sudo', 'tee', DOCKER_SOURCE_LIST], { input: dockerAptSource(arch, distro, codename) })
    await s.execute(['sudo', 'apt-get', 'update', '-y'])
    await s.execute(['sudo', 'apt-get', 'install', '-y', 'docker-ce', 'docker-ce-cli', 'containerd.io', 'docker-compose-plugin'])
  }

  private async versions(): Promise<string[]> {
    const checks: readonly (readonly string[])[] = [
      ['docker', '--version'],
      ['docker', 'compose', 'version'],
      ['nginx', '-v']
    ]
    const out: string[] = []
    for (const cmd of checks) {
      const res: RemoteResult = await this.session.execute(cmd, { tolerateFailure: true })
      out.push(res.ok ? lastLine(res.output) : `${cmd[0]}: n/a`)
    }
    return out
  }
}
