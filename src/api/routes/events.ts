import type { FastifyInstance } from 'fastify';
import { processBatch } from '../../core/event-processor.js';
import type { BatchItemResult } from '../../core/event-processor.js';
import type { EntityRecord } from '../../types/entity.js';
import type { RuleEvaluation } from '../../core/rule-engine.js';
import type { PreviewQuery } from '../../core/event-processor.js';
import { isObject } from '../../validation/types.js';
import { BadRequestError } from '../middleware/error-handler.js';
import { eventsSchemas } from '../schemas/event.js';
import { createRequestProcessor } from './context.js';

export interface BatchResponse {
  processed: number;
  failed: number;
  results: BatchItemResult[];
}

export interface PreviewResponse {
  entity: EntityRecord;
  rules: RuleEvaluation[];
  queries: PreviewQuery[];
}

/** `{ Records: [...] }` is a batch; anything else is a single record. */
function toRecords(body: unknown): unknown[] {
  if (isObject(body) && 'Records' in body) {
    const records = body['Records'];
    if (!Array.isArray(records)) {
      throw new BadRequestError('Field Records must be an array');
    }
    return records;
  }
  return [body];
}

export async function registerEventsRoutes(fastify: FastifyInstance): Promise<void> {
  const context = fastify.rulepath;

  // POST /events - zpracování a uložení
  fastify.post<{ Body: unknown }>(
    '/events',
    { schema: eventsSchemas.process },
    async (request, reply): Promise<BatchResponse> => {
      const records = toRecords(request.body);
      const processor = await createRequestProcessor(context, request.log);
      const results = await processBatch(processor, records);

      const failed = results.filter((result) => result.status === 'error').length;
      reply.status(failed === 0 ? 200 : 207);
      return { processed: results.length - failed, failed, results };
    }
  );

  // POST /events/preview - sestavení entity a dotazů bez ukládání
  fastify.post<{ Body: unknown }>(
    '/events/preview',
    { schema: eventsSchemas.preview },
    async (request): Promise<PreviewResponse> => {
      const processor = await createRequestProcessor(context, request.log);
      const preview = processor.preview(request.body);
      return {
        entity: preview.entity.toJSON(),
        rules: preview.rules,
        queries: preview.queries
      };
    }
  );
}
