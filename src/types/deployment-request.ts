/** Where and as whom remote work happens. */
export interface RemoteTarget {
  readonly sshUser: string
  readonly host: string
  readonly sshKeyPath: string
}

/** Everything one deploy run needs, validated once and never mutated. */
export interface DeploymentRequest extends RemoteTarget {
  readonly repoUrl: string
  readonly token?: string
  readonly branch: string
  readonly appPort: number
}
