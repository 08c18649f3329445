import { Command } from 'commander'
import { runCleanup } from './commands/cleanup'
import { runDeploy } from './commands/deploy'
import type { CommandDeps, DeployFlags } from './commands/shared'
import { isColorMode, setColorMode } from './utils/colors'
import { DeployError, EXIT, ProxyConfigError, exitCodeFor, type ExitCode } from './utils/errors'
import { logger } from './utils/logger'

export const VERSION: string = '0.1.0'

export interface ProgramOptions extends DeployFlags {
  readonly cleanup?: boolean
  readonly confirm?: string
  readonly verbose?: boolean
  readonly quiet?: boolean
  /** false when --no-emoji is given */
  readonly emoji?: boolean
  readonly timestamps?: boolean
  readonly color?: string
}

export function applyOutputOptions(opts: ProgramOptions): void {
  if (opts.verbose === true) logger.setLevel('debug')
  if (opts.quiet === true) logger.setLevel('error')
  if (opts.json === true) logger.setJsonOnly(true)
  if (opts.emoji === false) logger.setNoEmoji(true)
  if (opts.timestamps === true) logger.setTimestamps(true)
  const color: string = opts.color ?? 'auto'
  setColorMode(isColorMode(color) ? color : 'auto')
}

/** Print the failure for humans, or as a final JSON object under --json. */
export function reportFailure(err: unknown, opts: ProgramOptions): void {
  const message: string = err instanceof Error ? err.message : String(err)
  const code: string = err instanceof DeployError ? err.code : 'UNEXPECTED'
  const remedy: string | undefined = err instanceof DeployError ? err.remedy : undefined
  if (opts.json === true) {
    logger.json({
      ok: false,
      action: opts.cleanup === true ? 'cleanup' : 'deploy',
      code,
      message,
      ...(remedy ? { remedy } : {}),
      ...(err instanceof ProxyConfigError ? { diagnostics: err.diagnostics } : {}),
      exitCode: exitCodeFor(err),
      final: true
    })
    return
  }
  // nginx diagnostics were already printed where they happened
  logger.error(err instanceof ProxyConfigError ? `${message} [${code}]` : message)
  if (remedy) logger.note(`Try: ${remedy}`)
}

export function createProgram(deps: CommandDeps): Command {
  const program: Command = new Command()
  program.name('shipwright')
  program.description('Provision a single host over SSH and deploy a containerized app behind nginx')
  program.version(VERSION)
  program.option('--cleanup', 'Remove the deployed containers, app directory and nginx site instead of deploying')
  program.option('--ci', 'Non-interactive: take every answer from flags, .env and the environment')
  program.option('--confirm <token>', 'Cleanup confirmation answer (type YES to proceed)')
  program.option('--repo <url>', 'Git repository URL')
  program.option('--branch <name>', 'Branch to deploy')
  program.option('--user <name>', 'Remote SSH username')
  program.option('--host <address>', 'Remote server address')
  program.option('--key <path>', 'Path to the SSH private key')
  program.option('--port <n>', 'Application port inside the container')
  program.option('--work-dir <dir>', 'Where the local checkout is kept')
  program.option('--log-dir <dir>', 'Where per-run log files are written')
  program.option('--json', 'JSON-only output (final summary object)')
  program.option('--verbose', 'Verbose output (streams remote command output)')
  program.option('--quiet', 'Error-only output')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--timestamps', 'Prefix human logs with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.action(async (opts: ProgramOptions): Promise<void> => {
    applyOutputOptions(opts)
    if (opts.cleanup === true) await runCleanup(opts, deps)
    else await runDeploy(opts, deps)
  })
  return program
}

/** Parse argv, run the selected mode and return the process exit code. */
export async function runCli(argv: readonly string[], deps: CommandDeps): Promise<ExitCode> {
  const program: Command = createProgram(deps)
  try {
    await program.parseAsync([...argv])
    return EXIT.ok
  } catch (err) {
    const opts: ProgramOptions = program.opts()
    reportFailure(err, opts)
    return exitCodeFor(err)
  } finally {
    await logger.flush()
  }
}
