import { spawn, type SpawnOptions as NodeSpawnOptions } from 'node:child_process'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface ExecOptions {
  readonly cwd?: string
  /** Written to the child's stdin, which is then closed */
  readonly input?: string
  readonly timeoutMs?: number
  readonly onStdout?: (chunk: string) => void
  readonly onStderr?: (chunk: string) => void
}

/**
 * Runs local programs by argument vector. No shell is involved, so arguments
 * reach the program exactly as given.
 */
export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
  has(bin: string): Promise<boolean>
}

export class NodeProcessRunner implements ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const nodeOpts: NodeSpawnOptions = {
      cwd: opts?.cwd,
      shell: false,
      windowsHide: true
    }
    return new Promise<ExecResult>((resolve) => {
      const child = spawn(bin, [...args], nodeOpts)
      let stdout = ''
      let stderr = ''
      let timer: NodeJS.Timeout | undefined
      let settled = false
      const finish = (code: number | null): void => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        resolve({ ok: code === 0, code, stdout, stderr })
      }
      child.stdout?.setEncoding('utf8')
      child.stderr?.setEncoding('utf8')
      child.stdout?.on('data', (d: string) => { stdout += d; opts?.onStdout?.(d) })
      child.stderr?.on('data', (d: string) => { stderr += d; opts?.onStderr?.(d) })
      child.on('error', (err: Error) => {
        stderr += err.message
        finish(null)
      })
      child.on('close', (code: number | null) => { finish(code) })
      if (child.stdin) {
        // A remote side that exits early closes the pipe; the exit code reports that
        child.stdin.on('error', (err: Error) => { stderr += `stdin: ${err.message}\n` })
        if (typeof opts?.input === 'string') child.stdin.write(opts.input)
        child.stdin.end()
      }
      if (opts?.timeoutMs && opts.timeoutMs > 0) {
        timer = setTimeout(() => {
          stderr += `\ntimed out after ${opts.timeoutMs}ms\n`
          child.kill('SIGTERM')
        }, opts.timeoutMs)
      }
    })
  }

  async has(bin: string): Promise<boolean> {
    const res: ExecResult = await this.exec(bin, ['--version'], { timeoutMs: 10000 })
    return res.ok
  }
}
