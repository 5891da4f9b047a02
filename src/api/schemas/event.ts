/**
 * JSON schémata pro Events API.
 *
 * The body is either one queue record (or bare event) or a batch
 * `{ Records: [...] }`; its content is checked by the record parser, so the
 * schema only pins the outer type.
 */

import { withErrorResponses } from './common.js';

export const recordBodySchema = {
  type: 'object',
  additionalProperties: true
} as const;

export const batchItemSchema = {
  type: 'object',
  properties: {
    messageId: { type: 'string' },
    status: { type: 'string', enum: ['success', 'error'] },
    sessionId: { type: 'string' },
    entities: { type: 'array', items: { type: 'string' } },
    error: { type: 'string' },
    code: { type: 'string' }
  },
  required: ['messageId', 'status']
} as const;

export const batchResponseSchema = {
  type: 'object',
  properties: {
    processed: { type: 'number' },
    failed: { type: 'number' },
    results: { type: 'array', items: batchItemSchema }
  },
  required: ['processed', 'failed', 'results']
} as const;

export const eventsSchemas = {
  process: withErrorResponses({
    body: recordBodySchema,
    response: {
      200: batchResponseSchema,
      207: batchResponseSchema
    }
  }),
  preview: withErrorResponses({
    body: recordBodySchema
  })
};
