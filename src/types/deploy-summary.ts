export type DeployStrategy = 'compose' | 'dockerfile'

export interface ValidationReport {
  /** Container answered on the app port from the host itself */
  readonly local: boolean
  /** nginx answered on port 80 from here */
  readonly external: boolean
}

export interface DeploySummary {
  readonly ok: boolean
  readonly action: 'deploy'
  readonly host: string
  readonly appPort: number
  readonly strategy: DeployStrategy
  readonly validation: ValidationReport
  readonly logFile?: string
  readonly durationMs: number
  readonly final: true
}
