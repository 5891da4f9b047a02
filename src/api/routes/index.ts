import type { FastifyInstance } from 'fastify';
import type { RouteContext } from './context.js';
import { registerHealthRoutes } from './health.js';
import { registerEventsRoutes } from './events.js';
import { registerResolveRoutes } from './resolve.js';

export type { RouteContext } from './context.js';

export async function registerRoutes(
  fastify: FastifyInstance,
  context: RouteContext
): Promise<void> {
  fastify.decorate('rulepath', context);

  await registerHealthRoutes(fastify);
  await registerEventsRoutes(fastify);
  await registerResolveRoutes(fastify);
}

declare module 'fastify' {
  interface FastifyInstance {
    rulepath: RouteContext;
  }
}
