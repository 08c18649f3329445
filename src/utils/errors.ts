export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

export const EXIT = {
  ok: 0,
  precondition: 1,
  failure: 2
} as const

export type ExitCode = typeof EXIT[keyof typeof EXIT]

/**
 * Base class for every failure the pipeline reports on purpose. The exit code
 * tells the operator whether the inputs or environment were wrong (1) or a
 * step broke while executing (2).
 */
export class DeployError extends Error {
  public readonly code: string
  public readonly exitCode: ExitCode
  public readonly remedy?: string

  public constructor(args: { readonly message: string; readonly code: string; readonly exitCode: ExitCode; readonly remedy?: string }) {
    super(args.message)
    this.name = new.target.name
    this.code = args.code
    this.exitCode = args.exitCode
    this.remedy = args.remedy
  }
}

export class ValidationError extends DeployError {
  public constructor(message: string, remedy?: string) {
    super({ message, code: 'VALIDATION_FAILED', exitCode: EXIT.precondition, remedy })
  }
}

export class ConnectivityError extends DeployError {
  public constructor(info: ErrorInfo) {
    super({ message: info.message, code: info.code, exitCode: EXIT.precondition, remedy: info.remedy })
  }
}

export class MissingBuildDescriptorError extends DeployError {
  public constructor(dir: string) {
    super({
      message: `No Dockerfile or compose file found in ${dir}`,
      code: 'MISSING_BUILD_DESCRIPTOR',
      exitCode: EXIT.precondition,
      remedy: 'Add a Dockerfile or docker-compose.yml at the repository root, or pick another branch.'
    })
  }
}

export class NoBuildTargetError extends DeployError {
  public constructor(remoteDir: string) {
    super({
      message: `Nothing to build in ${remoteDir}: no compose file and no Dockerfile`,
      code: 'NO_BUILD_TARGET',
      exitCode: EXIT.precondition,
      remedy: 'Check that the transfer completed; re-run the deploy.'
    })
  }
}

export class UnsupportedPlatformError extends DeployError {
  public constructor(host: string) {
    super({
      message: `${host} has no apt-get; only Debian/Ubuntu hosts are provisioned automatically`,
      code: 'UNSUPPORTED_PLATFORM',
      exitCode: EXIT.precondition,
      remedy: 'Install docker, a compose tool and nginx manually, then re-run.'
    })
  }
}

export class RemoteCommandError extends DeployError {
  public readonly command: string
  public readonly output: string

  public constructor(args: { readonly command: string; readonly exitCode: number | null; readonly output: string }) {
    const tail: string = lastLines(args.output, 20)
    super({
      message: `Remote command failed (exit ${args.exitCode ?? 'signal'}): ${args.command}${tail ? `\n${tail}` : ''}`,
      code: 'REMOTE_COMMAND_FAILED',
      exitCode: EXIT.failure
    })
    this.command = args.command
    this.output = args.output
  }
}

export class ProxyConfigError extends DeployError {
  public readonly diagnostics: string

  public constructor(diagnostics: string) {
    super({
      message: 'nginx rejected the configuration (nginx -t failed)',
      code: 'PROXY_CONFIG_INVALID',
      exitCode: EXIT.failure,
      remedy: 'Review the nginx diagnostics (nginx -t output and the error.log tail); the new site is linked but nginx was not reloaded.'
    })
    this.diagnostics = diagnostics
  }
}

export class LocalCommandError extends DeployError {
  public constructor(command: string, output: string) {
    const tail: string = lastLines(output, 20)
    super({
      message: `Local command failed: ${command}${tail ? `\n${tail}` : ''}`,
      code: 'LOCAL_COMMAND_FAILED',
      exitCode: EXIT.failure
    })
  }
}

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof DeployError) return err.exitCode
  return EXIT.failure
}

export function lastLines(text: string, n: number): string {
  const lines: string[] = text.trimEnd().split(/\r?\n/)
  return lines.slice(-n).join('\n').trim()
}

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/** Translate ssh's stderr into something an operator can act on. */
export function mapSshError(target: string, raw: string): ErrorInfo {
  const txt = normalize(raw)
  if (txt.includes('permission denied') || txt.includes('too many authentication failures')) {
    return {
      code: 'SSH_AUTH_FAILED',
      message: `SSH authentication to ${target} was rejected.`,
      remedy: 'Check the username and that the public half of the key is in ~/.ssh/authorized_keys on the host.'
    }
  }
  if (txt.includes('could not resolve hostname') || txt.includes('name or service not known')) {
    return {
      code: 'SSH_HOST_UNRESOLVED',
      message: `The host in ${target} could not be resolved.`,
      remedy: 'Check the host address for typos or use the IP address.'
    }
  }
  if (txt.includes('remote host identification has changed') || txt.includes('host key verification failed')) {
    return {
      code: 'SSH_HOST_KEY_MISMATCH',
      message: `The host key of ${target} does not match known_hosts.`,
      remedy: 'If the server was rebuilt, remove the old entry with: ssh-keygen -R <host>'
    }
  }
  if (txt.includes('connection refused')) {
    return {
      code: 'SSH_CONNECTION_REFUSED',
      message: `${target} refused the SSH connection.`,
      remedy: 'Make sure sshd is running and port 22 is open.'
    }
  }
  if (txt.includes('timed out') || txt.includes('no route to host') || txt.includes('network is unreachable')) {
    return {
      code: 'SSH_UNREACHABLE',
      message: `${target} did not answer.`,
      remedy: 'Check the address, firewall rules and security groups for port 22.'
    }
  }
  if (txt.includes('unprotected private key') || txt.includes('bad permissions')) {
    return {
      code: 'SSH_KEY_PERMISSIONS',
      message: 'ssh refused to use the private key because of its file permissions.',
      remedy: 'Run: chmod 600 <key file>'
    }
  }
  return {
    code: 'SSH_FAILED',
    message: `SSH connection to ${target} failed.${raw.trim() ? ` ${lastLines(raw, 3)}` : ''}`,
    remedy: 'Fix SSH access (try: ssh -i <key> <user>@<host>) and try again.'
  }
}
