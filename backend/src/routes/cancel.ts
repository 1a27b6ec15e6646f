import { FastifyInstance } from 'fastify';
import { profileIdFrom, toStatusResponse, type RouteOptions } from './context';

export async function cancelRoute(fastify: FastifyInstance, { service }: RouteOptions) {
  fastify.post<{ Params: { jobId: string } }>('/jobs/:jobId/cancel', async request => {
    const job = await service.cancel(request.params.jobId, profileIdFrom(request));
    return {
      ...toStatusResponse(job),
      message: 'Job cancelled successfully',
    };
  });
}
