import { FastifyInstance } from 'fastify';
import { profileIdFrom, toStatusResponse, type RouteOptions } from './context';

export async function statusRoute(fastify: FastifyInstance, { service }: RouteOptions) {
  fastify.get<{ Params: { jobId: string } }>('/jobs/:jobId', async request => {
    const job = await service.getStatus(request.params.jobId, profileIdFrom(request));
    return toStatusResponse(job);
  });
}
