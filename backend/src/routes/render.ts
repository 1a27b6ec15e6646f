import { FastifyInstance, FastifyRequest } from 'fastify';
import { parseRenderForm, toRenderRequest } from './renderForm';
import { profileIdFrom, type RouteOptions } from './context';

async function readFields(request: FastifyRequest): Promise<Record<string, unknown>> {
  if (!request.isMultipart()) {
    const body = request.body;
    return typeof body === 'object' && body !== null ? { ...body } : {};
  }

  const fields: Record<string, unknown> = {};
  for await (const part of request.parts()) {
    if (part.type === 'field') {
      fields[part.fieldname] = part.value;
    } else {
      // sources are referenced by path; uploaded files are not read
      part.file.resume();
    }
  }
  return fields;
}

export async function renderRoute(fastify: FastifyInstance, { service }: RouteOptions) {
  fastify.post<{ Params: { clipId: string } }>('/clips/:clipId/render', async (request, reply) => {
    const { clipId } = request.params;
    const form = parseRenderForm(await readFields(request));
    const job = await service.submit(toRenderRequest(clipId, form), profileIdFrom(request));

    return reply.code(202).send({ job_id: job.jobId, status: job.status });
  });
}
