import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ExecOptions, ExecResult, ProcessRunner } from '../../src/utils/process'

export interface RecordedCall {
  readonly bin: string
  readonly args: readonly string[]
  readonly input?: string
  readonly cwd?: string
}

export interface FakeReply {
  readonly code?: number | null
  readonly stdout?: string
  readonly stderr?: string
}

export type FakeHandler = (call: RecordedCall) => FakeReply | undefined | Promise<FakeReply | undefined>

/** Records every program the code under test runs and answers from a handler. */
export class FakeRunner implements ProcessRunner {
  public readonly calls: RecordedCall[] = []
  public readonly available: Set<string>

  public constructor(private readonly handler: FakeHandler = () => undefined, available: readonly string[] = ['rsync']) {
    this.available = new Set(available)
  }

  public async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const call: RecordedCall = { bin, args: [...args], input: opts?.input, cwd: opts?.cwd }
    this.calls.push(call)
    const reply: FakeReply = (await this.handler(call)) ?? {}
    const code: number | null = reply.code === undefined ? 0 : reply.code
    const stdout: string = reply.stdout ?? ''
    const stderr: string = reply.stderr ?? ''
    if (stdout) opts?.onStdout?.(stdout)
    if (stderr) opts?.onStderr?.(stderr)
    return { ok: code === 0, code, stdout, stderr }
  }

  public async has(bin: string): Promise<boolean> {
    return this.available.has(bin)
  }

  /** Command lines sent over ssh, in order (the last ssh argument). */
  public remoteCommands(): string[] {
    return this.calls.filter((c) => c.bin === 'ssh').map((c) => c.args[c.args.length - 1] ?? '')
  }

  public callsTo(bin: string): RecordedCall[] {
    return this.calls.filter((c) => c.bin === bin)
  }
}

const APT_PROVIDES: Readonly<Record<string, string>> = {
  'docker-ce': 'docker',
  'docker-compose-plugin': 'compose-plugin',
  nginx: 'nginx'
}

export interface FakeHostState {
  /** Tools present: docker, compose-plugin, docker-compose, nginx, apt-get */
  readonly tools?: readonly string[]
  /** Absolute remote paths `test -f` finds */
  readonly files?: readonly string[]
  readonly containerIds?: readonly string[]
  readonly nginxTestFails?: boolean
  readonly localHttpFails?: boolean
  readonly sshStderr?: string
  /** Remote command lines that exit 1 */
  readonly failing?: readonly string[]
  /** Files a local `git clone` creates in the target directory */
  readonly repoFiles?: readonly string[]
}

/**
 * A Debian-like host behind ssh plus a local git, all in memory except the
 * clone, which creates real files under the requested directory.
 */
export class FakeHost {
  public readonly tools: Set<string>
  public readonly files: Set<string>
  public containerIds: string[]

  public constructor(private readonly state: FakeHostState = {}) {
    this.tools = new Set(state.tools ?? ['apt-get'])
    this.files = new Set(state.files ?? [])
    this.containerIds = [...(state.containerIds ?? [])]
  }

  public runner(available: readonly string[] = ['rsync']): FakeRunner {
    return new FakeRunner((call: RecordedCall) => this.handle(call), available)
  }

  private async handle(call: RecordedCall): Promise<FakeReply | undefined> {
    if (call.bin === 'git') return await this.git(call.args)
    if (call.bin === 'rsync' || call.bin === 'scp') return this.copy(call.args)
    if (call.bin !== 'ssh') return undefined
    const cmd: string = call.args[call.args.length - 1] ?? ''
    if (this.state.sshStderr !== undefined) return { code: 255, stderr: this.state.sshStderr }
    if ((this.state.failing ?? []).includes(cmd)) return { code: 1, stderr: `failed: ${cmd}\n` }
    return this.remote(cmd)
  }

  private remote(cmd: string): FakeReply | undefined {
    const words: string[] = cmd.split(' ')
    if (cmd === 'echo connected') return { stdout: 'connected\n' }
    if (cmd.startsWith('command -v ')) return { code: this.tools.has(words[2] ?? '') ? 0 : 1 }
    if (cmd === 'docker compose version') return this.tools.has('compose-plugin') ? { stdout: 'Docker Compose version v2.27.0\n' } : { code: 1 }
    if (cmd === 'docker --version') return this.tools.has('docker') ? { stdout: 'Docker version 26.1.0, build abc\n' } : { code: 127 }
    if (cmd === 'nginx -v') return this.tools.has('nginx') ? { stderr: 'nginx version: nginx/1.24.0\n' } : { code: 127 }
    if (cmd.startsWith('sudo apt-get install -y ')) {
      for (const pkg of words.slice(4)) {
        const tool: string | undefined = APT_PROVIDES[pkg]
        if (tool) this.tools.add(tool)
      }
      return undefined
    }
    if (cmd.startsWith('test -f ')) return { code: this.files.has(words[2] ?? '') ? 0 : 1 }
    if (cmd.startsWith('sh -c ')) return { stdout: 'ubuntu jammy\n' }
    if (cmd === 'dpkg --print-architecture') return { stdout: 'amd64\n' }
    if (cmd === 'sudo nginx -t') {
      return this.state.nginxTestFails === true
        ? { code: 1, stderr: 'nginx: [emerg] unexpected "}" in /etc/nginx/sites-enabled/deployed_app:14\n' }
        : { stderr: 'nginx: configuration file /etc/nginx/nginx.conf test is successful\n' }
    }
    if (cmd.startsWith('sudo tail -n 200 ')) return { stdout: '2026/10/18 10:00:00 [emerg] 1#1: unexpected "}"\n' }
    if (cmd === 'sudo docker ps -aq --filter name=deployed_app') return { stdout: this.containerIds.map((id) => `${id}\n`).join('') }
    if (cmd.startsWith('sudo docker rm -f ')) {
      this.containerIds = []
      return undefined
    }
    if (cmd.startsWith('curl -sS -I ')) {
      return this.state.localHttpFails === true
        ? { code: 7, stderr: 'curl: (7) Failed to connect\n' }
        : { stdout: 'HTTP/1.1 200 OK\r\nContent-Type: text/html\r\n\r\n' }
    }
    return undefined
  }

  /** The cloned files land in the destination directory of the copy. */
  private copy(args: readonly string[]): FakeReply | undefined {
    const dest: string = args[args.length - 1] ?? ''
    const bracket: number = dest.indexOf(']:')
    const start: number = bracket >= 0 ? bracket + 2 : dest.indexOf(':') + 1
    const remoteDir: string = dest.slice(start).replace(/\/+$/, '')
    for (const f of this.state.repoFiles ?? ['Dockerfile']) this.files.add(`${remoteDir}/${f}`)
    return undefined
  }

  private async git(args: readonly string[]): Promise<FakeReply | undefined> {
    if (args[0] !== 'clone') return undefined
    const dir: string | undefined = args[args.length - 1]
    if (dir === undefined) return { code: 128, stderr: 'fatal: no directory\n' }
    await mkdir(join(dir, '.git'), { recursive: true })
    for (const f of this.state.repoFiles ?? ['Dockerfile']) await writeFile(join(dir, f), 'FROM scratch\n', 'utf8')
    return { stderr: `Cloning into '${dir}'...\n` }
  }
}
