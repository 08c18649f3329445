import { describe, it, expect } from 'vitest'
import { NodeProcessRunner } from '../utils/process'
import type { ExecResult } from '../utils/process'

const node: string = process.execPath
const runner = new NodeProcessRunner()

describe('NodeProcessRunner', () => {
  it('feeds input on stdin and closes it', async () => {
    const chunks: string[] = []
    const res: ExecResult = await runner.exec(node, ['-e', 'process.stdin.pipe(process.stdout)'], {
      input: 'server {}\n',
      onStdout: (d: string): void => { chunks.push(d) }
    })
    expect(res).toEqual({ ok: true, code: 0, stdout: 'server {}\n', stderr: '' })
    expect(chunks.join('')).toBe('server {}\n')
  })

  it('passes arguments through without a shell', async () => {
    const res: ExecResult = await runner.exec(node, ['-e', 'process.stdout.write(process.argv[1])', '$(echo hi); x'])
    expect(res.stdout).toBe('$(echo hi); x')
  })

  it('reports a non-zero exit with its stderr', async () => {
    const res: ExecResult = await runner.exec(node, ['-e', 'process.stderr.write("bad\\n"); process.exit(3)'])
    expect(res).toEqual({ ok: false, code: 3, stdout: '', stderr: 'bad\n' })
  })

  it('kills a command that outlives its timeout', async () => {
    const res: ExecResult = await runner.exec(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 })
    expect(res.ok).toBe(false)
    expect(res.code).toBeNull()
    expect(res.stderr).toContain('timed out after 200ms')
  })

  it('resolves instead of throwing when the binary is missing', async () => {
    const res: ExecResult = await runner.exec('shipwright-no-such-binary', ['--version'])
    expect(res.ok).toBe(false)
    expect(res.code).toBeNull()
    expect(res.stderr).toContain('ENOENT')
  })

  it('checks whether a binary is available', async () => {
    expect(await runner.has(node)).toBe(true)
    expect(await runner.has('shipwright-no-such-binary')).toBe(false)
  })
})
