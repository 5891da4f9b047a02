import { withErrorResponses } from './common.js';

export const resolveBodySchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    path: { type: 'string', description: 'Dotted path, e.g. "jsonPayload.dataObject.items.sku"' },
    event: { description: 'Event to resolve against; flattened keys are re-nested first' }
  },
  required: ['path', 'event']
} as const;

export const resolveSchemas = {
  resolve: withErrorResponses({
    body: resolveBodySchema
  })
};
