import type { JobStatus } from './stateMachine';

/**
 * Base class for every error the render service reports on purpose.
 * `statusCode` is what the HTTP layer answers with.
 */
export class RenderError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RenderError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A filter or style value outside its valid range.
 */
export class InvalidParameterError extends RenderError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`, 'INVALID_PARAMETER', 400, { field, message });
    this.name = 'InvalidParameterError';
    this.field = field;
  }
}

export class SourceNotFoundError extends RenderError {
  constructor(kind: 'video' | 'audio' | 'subtitles', filePath: string) {
    super(`Source ${kind} not found: ${filePath}`, 'SOURCE_NOT_FOUND', 404, { kind, filePath });
    this.name = 'SourceNotFoundError';
  }
}

export class ExternalProcessError extends RenderError {
  public readonly exitCode: number | null;
  public readonly stderrExcerpt: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const excerpt = stderr.substring(0, 500);
    super(
      excerpt ? `${command} failed (exit ${exitCode}): ${excerpt}` : `${command} failed (exit ${exitCode})`,
      'EXTERNAL_PROCESS_FAILURE',
      500,
      { command, exitCode }
    );
    this.name = 'ExternalProcessError';
    this.exitCode = exitCode;
    this.stderrExcerpt = excerpt;
  }
}

export class JobNotFoundError extends RenderError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'NOT_FOUND', 404, { jobId });
    this.name = 'JobNotFoundError';
  }
}

export class EncodingPresetUnknownError extends RenderError {
  constructor(presetName: string, known: string[]) {
    super(
      `Unknown encoding preset '${presetName}'. Expected one of: ${known.join(', ')}`,
      'ENCODING_PRESET_UNKNOWN',
      400,
      { presetName, known }
    );
    this.name = 'EncodingPresetUnknownError';
  }
}

export class RenderInProgressError extends RenderError {
  constructor(clipId: string, activeJobId: string) {
    super(
      `Clip ${clipId} already has an active render (${activeJobId}). Wait for it to finish.`,
      'RENDER_IN_PROGRESS',
      409,
      { clipId, activeJobId }
    );
    this.name = 'RenderInProgressError';
  }
}

export class JobNotCancellableError extends RenderError {
  constructor(jobId: string, status: JobStatus) {
    super(`Job ${jobId} is already ${status}`, 'JOB_NOT_CANCELLABLE', 409, { jobId, status });
    this.name = 'JobNotCancellableError';
  }
}

export class StateTransitionError extends RenderError {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(
      `Invalid state transition from ${from} to ${to}`,
      'STATE_TRANSITION_ERROR',
      409,
      { jobId, from, to }
    );
    this.name = 'StateTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
