import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { DeployDefaults } from '../../src/config'
import type { DeploymentRequest } from '../../src/types/deployment-request'
import { logger } from '../../src/utils/logger'

const created: string[] = []

export async function tempDir(prefix: string = 'shipwright-'): Promise<string> {
  const dir: string = await mkdtemp(join(tmpdir(), prefix))
  created.push(dir)
  return dir
}

/** A private key placeholder; only its existence is checked. */
export async function tempKeyFile(): Promise<string> {
  const file: string = join(await tempDir('shipwright-key-'), 'id_test')
  await writeFile(file, 'not-a-real-key\n', { encoding: 'utf8', mode: 0o600 })
  return file
}

export async function removeTempDirs(): Promise<void> {
  // pending log lines may still target these directories
  await logger.flush()
  for (const d of created.splice(0)) await rm(d, { recursive: true, force: true })
}

export function defaultsFor(sshKeyPath: string, overrides: Partial<DeployDefaults> = {}): DeployDefaults {
  return {
    branch: 'main',
    sshKeyPath,
    appPort: '8080',
    workDir: tmpdir(),
    logDir: join(tmpdir(), 'logs'),
    ...overrides
  }
}

export function requestFor(sshKeyPath: string, overrides: Partial<DeploymentRequest> = {}): DeploymentRequest {
  return {
    repoUrl: 'https://example.test/acme/shop.git',
    branch: 'main',
    sshUser: 'deploy',
    host: 'app.example.test',
    sshKeyPath,
    appPort: 8080,
    ...overrides
  }
}
