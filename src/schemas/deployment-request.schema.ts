/**
 * JSON Schemas for operator input. Anything that ends up as a process
 * argument is restricted to characters that cannot start an option or
 * break out of quoting.
 */
const targetProperties = {
  sshUser: { type: 'string', minLength: 1, pattern: '^[A-Za-z_][A-Za-z0-9_.-]*$' },
  host: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9][A-Za-z0-9.:-]*$' },
  sshKeyPath: { type: 'string', minLength: 1 }
} as const

export const remoteTargetSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['sshUser', 'host', 'sshKeyPath'],
  properties: targetProperties
} as const

export const deploymentRequestSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['repoUrl', 'branch', 'sshUser', 'host', 'sshKeyPath', 'appPort'],
  properties: {
    repoUrl: { type: 'string', minLength: 1, pattern: '^[^\\s-]\\S*$' },
    token: { type: 'string', pattern: '^\\S*$' },
    branch: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9._][A-Za-z0-9._/-]*$' },
    ...targetProperties,
    appPort: { type: 'integer', minimum: 1, maximum: 65535 }
  }
} as const
