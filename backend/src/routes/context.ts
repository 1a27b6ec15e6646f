import type { FastifyRequest } from 'fastify';
import type { RenderJob } from '../db';
import type { RenderService } from '../renderService';

export type RouteOptions = {
  service: RenderService;
};

export const PROFILE_HEADER = 'x-profile-id';
export const DEFAULT_PROFILE_ID = 'default';

export function profileIdFrom(request: FastifyRequest): string {
  const header = request.headers[PROFILE_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() ? value.trim() : DEFAULT_PROFILE_ID;
}

export interface JobStatusResponse {
  job_id: string;
  status: RenderJob['status'];
  progress: number;
  result?: {
    output_path: string;
    preset: string;
    encoder: string;
    filter_chain: string[];
    file_size_bytes: number;
    loudness?: {
      input_i: number;
      input_tp: number;
      input_lra: number;
    };
  };
  error?: string;
}

export function toStatusResponse(job: RenderJob): JobStatusResponse {
  const response: JobStatusResponse = {
    job_id: job.jobId,
    status: job.status,
    progress: job.progress,
  };

  const result = job.data.result;
  if (result) {
    response.result = {
      output_path: result.outputPath,
      preset: result.preset,
      encoder: result.encoder,
      filter_chain: result.filterChain,
      file_size_bytes: result.fileSizeBytes,
    };
    if (result.loudness) {
      response.result.loudness = {
        input_i: result.loudness.inputI,
        input_tp: result.loudness.inputTp,
        input_lra: result.loudness.inputLra,
      };
    }
  }
  if (job.errorMessage) {
    response.error = job.errorMessage;
  }
  return response;
}
