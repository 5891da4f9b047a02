import type { FastifyInstance } from 'fastify';
import { toJsonValue } from '../../types/json.js';
import { unflatten } from '../../utils/flatten.js';
import { PathResolver } from '../../utils/path-resolver.js';
import type { ResolveResult } from '../../utils/path-resolver.js';
import { BadRequestError } from '../middleware/error-handler.js';
import { resolveSchemas } from '../schemas/resolve.js';

interface ResolveBody {
  path: string;
  event: unknown;
}

export type ResolveResponse = ResolveResult & { path: string };

export async function registerResolveRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /resolve - vyhodnocení cesty nad eventem
  fastify.post<{ Body: ResolveBody }>(
    '/resolve',
    { schema: resolveSchemas.resolve },
    async (request): Promise<ResolveResponse> => {
      const { path, event } = request.body;

      const value = toJsonValue(event);
      if (value === undefined) {
        throw new BadRequestError('Field event must be JSON');
      }

      const resolver = new PathResolver({ logger: request.log });
      return { path, ...resolver.resolve(path, unflatten(value)) };
    }
  );
}
