import { FastifyInstance } from 'fastify';
import { createReadStream } from 'fs';
import path from 'path';
import { JobStatus } from '../db';
import { fileExists } from '../storage';
import { profileIdFrom, type RouteOptions } from './context';

export async function downloadRoute(fastify: FastifyInstance, { service }: RouteOptions) {
  fastify.get<{ Params: { jobId: string } }>('/jobs/:jobId/download', async (request, reply) => {
    const job = await service.getStatus(request.params.jobId, profileIdFrom(request));

    const outputPath = job.data.result?.outputPath;
    if (job.status !== JobStatus.COMPLETED || !outputPath) {
      return reply.code(409).send({
        error: `Job not completed. Current status: ${job.status}`,
        code: 'JOB_NOT_COMPLETED',
      });
    }

    if (!(await fileExists(outputPath))) {
      return reply.code(404).send({ error: 'Output file not found', code: 'OUTPUT_MISSING' });
    }

    return reply
      .header('Content-Disposition', `attachment; filename="${path.basename(outputPath)}"`)
      .type('video/mp4')
      .send(createReadStream(outputPath));
  });
}
