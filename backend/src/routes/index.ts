import { FastifyInstance } from 'fastify';
import { renderRoute } from './render';
import { statusRoute } from './status';
import { downloadRoute } from './download';
import { cancelRoute } from './cancel';
import { presetsRoute } from './presets';
import { healthRoute } from './health';
import type { RouteOptions } from './context';

export async function registerRoutes(fastify: FastifyInstance, options: RouteOptions) {
  await fastify.register(renderRoute, options);
  await fastify.register(statusRoute, options);
  await fastify.register(downloadRoute, options);
  await fastify.register(cancelRoute, options);
  await fastify.register(presetsRoute);
  await fastify.register(healthRoute);
}
