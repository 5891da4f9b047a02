export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded', 'error'] },
    timestamp: { type: 'number' },
    uptime: { type: 'number' },
    version: { type: 'string' },
    configuration: {
      type: 'object',
      properties: {
        loaded: { type: 'boolean' },
        version: { type: 'string' },
        consumers: { type: 'number' },
        error: { type: 'string' }
      },
      required: ['loaded', 'consumers']
    },
    persistence: {
      type: 'object',
      properties: {
        configured: { type: 'boolean' },
        reachable: { type: 'boolean' }
      },
      required: ['configured', 'reachable']
    }
  },
  required: ['status', 'timestamp', 'uptime', 'version', 'configuration', 'persistence']
} as const;

export const healthSchemas = {
  health: {
    response: {
      200: healthResponseSchema,
      503: healthResponseSchema
    }
  }
};
