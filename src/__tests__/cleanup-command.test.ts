import { describe, it, expect, vi, afterEach } from 'vitest'
import { join } from 'node:path'
import { annotateCleanupSummary, runCleanup, type CleanupSummary } from '../commands/cleanup'
import { logger } from '../utils/logger'
import type { CommandDeps } from '../commands/shared'
import { ScriptedPrompter } from '../utils/prompt'
import { FakeHost, type FakeRunner } from '../../tests/helpers/fake-host'
import { removeTempDirs, tempDir, tempKeyFile } from '../../tests/helpers/fixtures'

afterEach(async () => { await removeTempDirs() })

async function depsFor(runner: FakeRunner, prompter: ScriptedPrompter): Promise<CommandDeps> {
  return { runner, prompter, cwd: await tempDir(), env: {}, now: (): Date => new Date(2026, 9, 18, 10, 15, 0) }
}

describe('runCleanup', () => {
  it('asks for the target, then for confirmation, and aborts on anything but YES', async () => {
    const key: string = await tempKeyFile()
    const runner: FakeRunner = new FakeHost().runner()
    const prompter = new ScriptedPrompter(['deploy', 'app.example.test', key, 'no'])
    const summary: CleanupSummary = await runCleanup({}, await depsFor(runner, prompter))
    expect(summary).toMatchObject({ ok: true, action: 'cleanup', aborted: true, state: 'idle', steps: [], host: 'app.example.test' })
    expect(prompter.asked).toEqual([
      'Remote SSH username',
      'Remote server address',
      'Path to SSH private key',
      'This stops the app containers and deletes /opt/deploy_app and the nginx site on app.example.test. Type YES to proceed'
    ])
    expect(runner.calls).toEqual([])
  })

  it('accepts a typed YES with surrounding whitespace', async () => {
    const key: string = await tempKeyFile()
    const runner: FakeRunner = new FakeHost({ tools: ['docker', 'nginx'] }).runner()
    const summary: CleanupSummary = await runCleanup({}, await depsFor(runner, new ScriptedPrompter(['deploy', 'app.example.test', key, ' YES '])))
    expect(summary.aborted).toBe(false)
    expect(summary.state).toBe('done')
  })

  it('takes the confirmation from --confirm in ci mode', async () => {
    const key: string = await tempKeyFile()
    const runner: FakeRunner = new FakeHost({ tools: ['docker', 'nginx'] }).runner()
    const prompter = new ScriptedPrompter([])
    const summary: CleanupSummary = await runCleanup(
      { ci: true, confirm: 'YES', user: 'deploy', host: 'app.example.test', key },
      await depsFor(runner, prompter)
    )
    expect(summary.state).toBe('done')
    expect(summary.steps).toHaveLength(5)
    expect(prompter.asked).toEqual([])
    expect(runner.remoteCommands()).toContain('sudo rm -rf /opt/deploy_app')
  })

  it('aborts in ci mode when no confirmation is given', async () => {
    const key: string = await tempKeyFile()
    const runner: FakeRunner = new FakeHost().runner()
    const deps: CommandDeps = await depsFor(runner, new ScriptedPrompter([]))
    const summary: CleanupSummary = await runCleanup({ ci: true, user: 'deploy', host: 'app.example.test', key, logDir: 'run-logs' }, deps)
    expect(summary.aborted).toBe(true)
    expect(summary.logFile).toBe(join(deps.cwd ?? '', 'run-logs', 'deploy_20261018_101500.log'))
    expect(runner.calls).toEqual([])
  })

  it('prints a schema-checked summary in json mode', async () => {
    const key: string = await tempKeyFile()
    const runner: FakeRunner = new FakeHost({ tools: ['docker', 'nginx'] }).runner()
    logger.setJsonOnly(true)
    await runCleanup(
      { ci: true, json: true, confirm: 'YES', user: 'deploy', host: 'app.example.test', key },
      await depsFor(runner, new ScriptedPrompter([]))
    )
    const out: string[] = vi.mocked(console.log).mock.calls.map((c) => String(c[0]))
    expect(out).toHaveLength(1)
    expect(JSON.parse(out[0] ?? '')).toMatchObject({ ok: true, action: 'cleanup', state: 'done', aborted: false, final: true, schemaOk: true, schemaErrors: [] })
  })
})

describe('annotateCleanupSummary', () => {
  it('flags a summary that does not match the schema', () => {
    const bad: CleanupSummary = {
      ok: true,
      action: 'cleanup',
      host: 'app.example.test',
      state: 'executing',
      aborted: false,
      steps: [],
      logFile: '/tmp/deploy.log',
      final: true
    }
    const res = annotateCleanupSummary(bad)
    expect(res.schemaOk).toBe(false)
    expect(res.schemaErrors).toEqual(['/state must be equal to one of the allowed values'])
  })
})
