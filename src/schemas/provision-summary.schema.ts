/**
 * JSON Schema for the final object printed by `provision --json`.
 */
export const provisionSummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'exitCode', 'steps', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'provision' },
    domain: { type: 'string', minLength: 1 },
    exitCode: { type: 'integer', minimum: 0 },
    dryRun: { type: 'boolean' },
    steps: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'status'],
        properties: {
          name: { type: 'string', minLength: 1 },
          status: { enum: ['ok', 'skipped', 'tolerated', 'fatal'] },
          detail: { type: 'string' }
        }
      }
    },
    urls: {
      type: 'object',
      required: ['frontend', 'api', 'widget'],
      properties: {
        frontend: { type: 'string' },
        api: { type: 'string' },
        widget: { type: 'string' }
      }
    },
    cmdPlan: { type: 'array', items: { type: 'string' } },
    durationMs: { type: 'integer', minimum: 0 },
    code: { type: 'string' },
    message: { type: 'string' },
    final: { const: true }
  }
} as const
