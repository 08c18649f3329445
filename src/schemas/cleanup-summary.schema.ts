/**
 * JSON Schema for the final object printed by `--json` cleanup runs.
 */
export const cleanupSummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'host', 'state', 'aborted', 'steps', 'logFile', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'cleanup' },
    host: { type: 'string', minLength: 1 },
    state: { enum: ['idle', 'done'] },
    aborted: { type: 'boolean' },
    steps: {
      type: 'array',
      items: {
        type: 'object',
        required: ['title', 'ok'],
        properties: {
          title: { type: 'string', minLength: 1 },
          ok: { type: 'boolean' },
          detail: { type: 'string' }
        }
      }
    },
    logFile: { type: 'string' },
    final: { const: true },
    schemaOk: { type: 'boolean' },
    schemaErrors: { type: 'array', items: { type: 'string' } }
  }
} as const
