import { buildApp } from './app';
import { config } from './config';
import { createJobRepository } from './db';
import { FfmpegToolkit } from './ffmpeg';
import { logger } from './logger';
import { createRenderQueue } from './queue';
import { RenderService } from './renderService';
import { defaultLayout } from './storage';

const start = async () => {
  const repository = createJobRepository(config.databaseUrl);
  const queue = createRenderQueue(config.redisUrl, config.workerConcurrency);

  try {
    await repository.init();

    const service = new RenderService({
      repository,
      queue,
      toolkit: new FfmpegToolkit(config.ffmpegPath, config.ffprobePath),
      layout: defaultLayout,
      hardwareEncoder: config.hardwareEncoder,
      loudnessTimeoutMs: config.loudnessTimeoutMs,
    });
    service.start();

    const fastify = await buildApp({ service });
    await fastify.listen({ port: config.port, host: config.host });
    logger.info(
      {
        port: config.port,
        repository: config.databaseUrl ? 'postgres' : 'memory',
        queue: config.redisUrl ? 'redis' : 'local',
      },
      'Render service listening'
    );

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      await fastify.close();
      await queue.close();
      await repository.close();
      process.exit(0);
    };
    const onSignal = (signal: NodeJS.Signals) => {
      shutdown(signal).catch(err => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  } catch (err) {
    logger.error({ err }, 'Failed to start');
    process.exit(1);
  }
};

void start();
