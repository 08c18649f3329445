/**
 * JSON Schema for the final object printed by `--json` deploy runs.
 */
export const deploySummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'host', 'appPort', 'strategy', 'validation', 'durationMs', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'deploy' },
    host: { type: 'string', minLength: 1 },
    appPort: { type: 'integer', minimum: 1, maximum: 65535 },
    strategy: { enum: ['compose', 'dockerfile'] },
    validation: {
      type: 'object',
      required: ['local', 'external'],
      properties: {
        local: { type: 'boolean' },
        external: { type: 'boolean' }
      }
    },
    logFile: { type: 'string' },
    durationMs: { type: 'integer', minimum: 0 },
    final: { const: true },
    schemaOk: { type: 'boolean' },
    schemaErrors: { type: 'array', items: { type: 'string' } }
  }
} as const
