export { errorResponseSchema, withErrorResponses } from './common.js';
export { eventsSchemas, recordBodySchema, batchResponseSchema } from './event.js';
export { resolveSchemas, resolveBodySchema } from './resolve.js';
export { healthSchemas, healthResponseSchema } from './health.js';
