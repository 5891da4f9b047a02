import type { ConfigService } from '../../config/config-service.js';
import type { PersistenceGateway } from '../../persistence/gateway.js';
import { createEventProcessor } from '../../core/event-processor.js';
import type { EventProcessor, PipelineOptions } from '../../core/event-processor.js';
import type { Logger } from '../../utils/logger.js';

export interface RouteContext {
  configService: ConfigService;
  gateway: PersistenceGateway | undefined;
  pipeline: Omit<PipelineOptions, 'gateway' | 'logger'>;
  version: string;
}

/** Processor over the current configuration, logging through the request logger. */
export async function createRequestProcessor(context: RouteContext, logger: Logger): Promise<EventProcessor> {
  const config = await context.configService.getConfig();
  return createEventProcessor(config, {
    ...context.pipeline,
    ...(context.gateway !== undefined && { gateway: context.gateway }),
    logger,
  });
}
