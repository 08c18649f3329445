import { describe, it, expect, afterEach } from 'vitest'
import { collectDeploymentRequest, collectRemoteTarget, validateDeploymentRequest } from '../core/input/collector'
import { ValidationError } from '../utils/errors'
import { ScriptedPrompter } from '../utils/prompt'
import type { DeploymentRequest } from '../types/deployment-request'
import { failure } from '../../tests/helpers/errors'
import { defaultsFor, removeTempDirs, tempKeyFile } from '../../tests/helpers/fixtures'

afterEach(async () => { await removeTempDirs() })

describe('collectDeploymentRequest', () => {
  it('asks for every input in order and returns a validated request', async () => {
    const key: string = await tempKeyFile()
    const prompter = new ScriptedPrompter([
      'https://example.test/acme/shop.git', 'test-secret', 'release/1.2', 'deploy', '203.0.113.10', key, '3000'
    ])
    const req: DeploymentRequest = await collectDeploymentRequest({ prompter, defaults: defaultsFor(key) })
    expect(prompter.asked).toEqual([
      'Git repository URL (https:// or git@...)',
      'Access token for private repositories (blank for public)',
      'Branch name',
      'Remote SSH username',
      'Remote server address',
      'Path to SSH private key',
      'Application port inside the container'
    ])
    expect(req).toEqual({
      repoUrl: 'https://example.test/acme/shop.git',
      token: 'test-secret',
      branch: 'release/1.2',
      sshUser: 'deploy',
      host: '203.0.113.10',
      sshKeyPath: key,
      appPort: 3000
    })
    expect(Object.isFrozen(req)).toBe(true)
  })

  it('falls back to defaults for blank answers and omits an empty token', async () => {
    const key: string = await tempKeyFile()
    const defaults = defaultsFor(key, { repoUrl: 'git@example.test:acme/shop.git', sshUser: 'ubuntu', host: 'app.example.test' })
    const req: DeploymentRequest = await collectDeploymentRequest({ prompter: new ScriptedPrompter([]), defaults })
    expect(req.branch).toBe('main')
    expect(req.appPort).toBe(8080)
    expect(req.repoUrl).toBe('git@example.test:acme/shop.git')
    expect('token' in req).toBe(false)
  })

  it('rejects a missing host', async () => {
    const key: string = await tempKeyFile()
    const prompter = new ScriptedPrompter(['https://example.test/acme/shop.git', '', '', 'deploy', '', key, ''])
    const err: Error = await failure(collectDeploymentRequest({ prompter, defaults: defaultsFor(key) }))
    expect(err).toBeInstanceOf(ValidationError)
    expect(err.message).toBe('Remote host is required')
  })

  it('reports every missing field at once', async () => {
    const key: string = await tempKeyFile()
    const err: Error = await failure(collectDeploymentRequest({ prompter: new ScriptedPrompter([]), defaults: defaultsFor(key) }))
    expect(err.message).toBe('Git repository URL is required; SSH username is required; Remote host is required')
  })
})

describe('validateDeploymentRequest', () => {
  const raw = {
    repoUrl: 'https://example.test/acme/shop.git',
    token: '',
    branch: 'main',
    sshUser: 'deploy',
    host: 'app.example.test',
    appPort: '8080'
  }

  it.each(['abc', '0', '65536', '80.5', '-1'])('rejects port %s', async (appPort: string) => {
    const key: string = await tempKeyFile()
    const err: Error = await failure(validateDeploymentRequest({ ...raw, sshKeyPath: key, appPort }))
    expect(err.message).toBe('Application port must be a whole number between 1 and 65535')
  })

  it('rejects a branch that would be read as an option', async () => {
    const key: string = await tempKeyFile()
    const err: Error = await failure(validateDeploymentRequest({ ...raw, sshKeyPath: key, branch: '--upload-pack=touch' }))
    expect(err.message).toBe('Branch name contains characters that are not allowed')
  })

  it('rejects a host with shell characters', async () => {
    const key: string = await tempKeyFile()
    const err: Error = await failure(validateDeploymentRequest({ ...raw, sshKeyPath: key, host: 'example.test;reboot' }))
    expect(err.message).toBe('Remote host contains characters that are not allowed')
  })

  it('rejects a key file that does not exist', async () => {
    const err: Error = await failure(validateDeploymentRequest({ ...raw, sshKeyPath: '/nonexistent/id_test' }))
    expect(err).toBeInstanceOf(ValidationError)
    expect(err.message).toBe('SSH key file not found: /nonexistent/id_test')
  })
})

describe('collectRemoteTarget', () => {
  it('asks only for the connection details', async () => {
    const key: string = await tempKeyFile()
    const prompter = new ScriptedPrompter(['deploy', 'app.example.test', key])
    const target = await collectRemoteTarget({ prompter, defaults: defaultsFor(key) })
    expect(prompter.asked).toEqual(['Remote SSH username', 'Remote server address', 'Path to SSH private key'])
    expect(target).toEqual({ sshUser: 'deploy', host: 'app.example.test', sshKeyPath: key })
  })
})
