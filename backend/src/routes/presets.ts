import { FastifyInstance } from 'fastify';
import { listPresets } from '../presets';

export async function presetsRoute(fastify: FastifyInstance) {
  fastify.get('/presets', async () => {
    return { presets: listPresets() };
  });
}
