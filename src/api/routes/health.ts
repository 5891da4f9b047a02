import type { FastifyInstance } from 'fastify';
import { errorMessage } from '../../errors/index.js';
import { healthSchemas } from '../schemas/health.js';

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: number;
  uptime: number;
  version: string;
  configuration: {
    loaded: boolean;
    version?: string;
    consumers: number;
    error?: string;
  };
  persistence: {
    configured: boolean;
    reachable: boolean;
  };
}

export async function registerHealthRoutes(fastify: FastifyInstance): Promise<void> {
  const context = fastify.rulepath;

  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: healthSchemas.health },
    async (request, reply): Promise<HealthResponse> => {
      let configuration: HealthResponse['configuration'];
      try {
        const config = await context.configService.getConfig();
        configuration = {
          loaded: true,
          ...(config.version !== undefined && { version: config.version }),
          consumers: config.consumers.length
        };
      } catch (err) {
        request.log.error({ err }, 'Configuration could not be loaded');
        configuration = { loaded: false, consumers: 0, error: errorMessage(err) };
      }

      let reachable = false;
      if (context.gateway !== undefined) {
        try {
          reachable = await context.gateway.ping();
        } catch (err) {
          request.log.warn({ err }, 'Persistence ping failed');
        }
      }

      const status: HealthResponse['status'] = !configuration.loaded
        ? 'error'
        : context.gateway !== undefined && !reachable ? 'degraded' : 'ok';

      reply.status(status === 'error' ? 503 : 200);
      return {
        status,
        timestamp: Date.now(),
        uptime: process.uptime(),
        version: context.version,
        configuration,
        persistence: {
          configured: context.gateway !== undefined,
          reachable
        }
      };
    }
  );
}
