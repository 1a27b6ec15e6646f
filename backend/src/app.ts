import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { ZodError } from 'zod';
import { config } from './config';
import { RenderError } from './errors';
import { loggerOptions } from './logger';
import type { RenderService } from './renderService';
import { registerRoutes } from './routes';

export interface AppOptions {
  service: RenderService;
  /** Pass false to silence request logging, as the tests do. */
  logger?: boolean;
}

export async function buildApp({ service, logger = true }: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: logger ? loggerOptions : false });

  await fastify.register(cors, { origin: '*' });
  await fastify.register(multipart, { limits: { fileSize: config.maxUploadSize } });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
        code: 'VALIDATION_ERROR',
      });
    }

    if (error instanceof RenderError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message, code: error.code ?? 'BAD_REQUEST' });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  await registerRoutes(fastify, { service });
  return fastify;
}
