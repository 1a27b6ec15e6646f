/**
 * Render orchestration: submission, background execution, status and
 * cancellation. Routes and the queue worker both go through this service.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  JobStatus,
  type JobRepository,
  type RenderJob,
  type RenderRequest,
  type RenderResult,
} from './db';
import {
  ExternalProcessError,
  JobNotCancellableError,
  JobNotFoundError,
  RenderError,
  RenderInProgressError,
  SourceNotFoundError,
  errorMessage,
} from './errors';
import type { MediaToolkit } from './ffmpeg';
import { buildChain } from './filters/filterChain';
import { VideoFilters } from './filters/videoFilters';
import { createLogger } from './logger';
import { buildLoudnormFilter, measureLoudness, type LoudnessMeasurement, type LoudnessTargets } from './loudness';
import { getPreset, type EncodingPreset } from './presets';
import { VideoProcessor, loopTargetFor, selectEncoder } from './processor';
import { ProgressStore, toPercent } from './progressStore';
import type { RenderQueue } from './queue';
import { isTerminal } from './stateMachine';
import { sanitizeSrtText, validateSrt } from './srt';
import {
  cleanupJobTemp,
  createJobTempDir,
  ensureOutputDir,
  fileExists,
  fileSize,
  getOutputPath,
  removeJobOutput,
  writeSubtitleFile,
  type StorageLayout,
} from './storage';

const log = createLogger({ module: 'render-service' });

export const CANCELLED_MESSAGE = 'Cancelled by user';

export interface RenderServiceDeps {
  repository: JobRepository;
  queue: RenderQueue;
  toolkit: MediaToolkit;
  layout: StorageLayout;
  hardwareEncoder: boolean;
  loudnessTimeoutMs: number;
}

function loudnessTargets(preset: EncodingPreset): LoudnessTargets {
  return {
    integratedLufs: preset.targetLufs,
    truePeak: preset.targetTruePeak,
    loudnessRange: preset.targetLra,
  };
}

function failureReason(error: unknown): string {
  if (error instanceof ExternalProcessError) {
    return error.stderrExcerpt || error.message;
  }
  return errorMessage(error);
}

class RenderCancelledError extends RenderError {
  constructor(jobId: string) {
    super(CANCELLED_MESSAGE, 'CANCELLED', 409, { jobId });
    this.name = 'RenderCancelledError';
  }
}

export class RenderService {
  private readonly controllers = new Map<string, AbortController>();
  // clipId -> jobId reserved while a submission is in flight
  private readonly clipReservations = new Map<string, string>();
  private readonly progress = new ProgressStore();

  constructor(private readonly deps: RenderServiceDeps) {}

  /** Attaches `execute` to the queue's worker side. */
  start(): void {
    this.deps.queue.start(jobId => this.execute(jobId));
  }

  /**
   * Accepts a render and returns the pending job without waiting for it.
   * Rejects before creating a job when the preset is unknown, the video is
   * missing, or the clip already has an active render.
   */
  async submit(request: RenderRequest, profileId: string): Promise<RenderJob> {
    getPreset(request.presetName);

    if (!(await fileExists(request.videoPath))) {
      throw new SourceNotFoundError('video', request.videoPath);
    }

    const reserved = this.clipReservations.get(request.clipId);
    if (reserved) {
      throw new RenderInProgressError(request.clipId, reserved);
    }

    const jobId = uuidv4();
    this.clipReservations.set(request.clipId, jobId);
    try {
      const active = await this.deps.repository.findActiveForClip(request.clipId);
      if (active) {
        throw new RenderInProgressError(request.clipId, active.jobId);
      }

      const job = await this.deps.repository.create({ jobId, profileId, request });
      try {
        await this.deps.queue.enqueue(jobId);
      } catch (error) {
        await this.failJob(jobId, `Could not queue render: ${errorMessage(error)}`);
        throw error;
      }

      log.info({ jobId, clipId: request.clipId, preset: request.presetName, profileId }, 'Render submitted');
      return job;
    } finally {
      this.clipReservations.delete(request.clipId);
    }
  }

  async getStatus(jobId: string, profileId: string): Promise<RenderJob> {
    const job = await this.deps.repository.get(jobId);
    if (!job || job.profileId !== profileId) {
      throw new JobNotFoundError(jobId);
    }

    if (job.status === JobStatus.PROCESSING) {
      const live = this.progress.get(jobId);
      if (live !== undefined && live > job.progress) {
        return { ...job, progress: live };
      }
    }
    return job;
  }

  async cancel(jobId: string, profileId: string): Promise<RenderJob> {
    const job = await this.getStatus(jobId, profileId);
    if (isTerminal(job.status)) {
      throw new JobNotCancellableError(jobId, job.status);
    }

    if (job.status === JobStatus.PENDING) {
      const removed = await this.deps.queue.remove(jobId);
      log.info({ jobId, removed }, 'Cancelling pending render');
    }

    const cancelled = await this.failJob(jobId, CANCELLED_MESSAGE);
    if (!cancelled) {
      // finished between the read and the update
      const current = await this.getStatus(jobId, profileId);
      throw new JobNotCancellableError(jobId, current.status);
    }

    const controller = this.controllers.get(jobId);
    if (controller) {
      log.info({ jobId }, 'Aborting running encode');
      controller.abort();
    }
    return cancelled;
  }

  /**
   * Worker-side half of a render. Never rejects for a render failure; the
   * outcome is recorded on the job.
   */
  async execute(jobId: string): Promise<void> {
    const job = await this.deps.repository.transition(jobId, JobStatus.PROCESSING);
    if (!job) {
      log.warn({ jobId }, 'Job is no longer pending, skipping');
      return;
    }

    const jobLog = log.child({ jobId, clipId: job.clipId });
    const request = job.data.request;
    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    const outputPath = getOutputPath(this.deps.layout, jobId, request.clipId, request.presetName);

    try {
      const result = await this.render(jobId, request, outputPath, controller.signal);
      const completed = await this.deps.repository.transition(jobId, JobStatus.COMPLETED, { progress: 100, result });
      if (completed) {
        jobLog.info({ outputPath, encoder: result.encoder, fileSizeBytes: result.fileSizeBytes }, 'Render completed');
      } else {
        jobLog.warn('Job left processing during the encode, discarding output');
        await removeJobOutput(outputPath);
      }
    } catch (error) {
      const reason = controller.signal.aborted ? CANCELLED_MESSAGE : failureReason(error);
      jobLog.error({ err: error }, `Render failed: ${reason}`);
      await this.deps.repository.transition(jobId, JobStatus.FAILED, { errorMessage: reason });
      await removeJobOutput(outputPath);
    } finally {
      this.controllers.delete(jobId);
      this.progress.clear(jobId);
      await cleanupJobTemp(this.deps.layout, jobId).catch(error => {
        jobLog.warn({ err: error }, 'Could not remove job temp dir');
      });
    }
  }

  /**
   * Moves a job to FAILED. A pending job is first claimed into PROCESSING; if
   * a worker claimed it first, the failure lands on the worker's run.
   */
  private async failJob(jobId: string, reason: string): Promise<RenderJob | null> {
    await this.deps.repository.transition(jobId, JobStatus.PROCESSING);
    return this.deps.repository.transition(jobId, JobStatus.FAILED, { errorMessage: reason });
  }

  private async render(jobId: string, request: RenderRequest, outputPath: string, signal: AbortSignal): Promise<RenderResult> {
    const { toolkit } = this.deps;
    const preset = getPreset(request.presetName);

    await this.requireSource('video', request.videoPath);
    if (request.audioPath) await this.requireSource('audio', request.audioPath);
    if (request.srtPath) await this.requireSource('subtitles', request.srtPath);

    const tempDir = await createJobTempDir(this.deps.layout, jobId);
    const subtitlePath = request.srtPath ?? (await this.writeInlineSubtitles(jobId, tempDir, request.srtContent));

    const filterChain = await buildChain({
      scale: { width: preset.width, height: preset.height },
      filters: preset.videoFilters.merge(VideoFilters.parseOptions(request.filters)),
      subtitle: subtitlePath ? { path: subtitlePath, settings: request.subtitleSettings } : undefined,
    });

    let loudness: LoudnessMeasurement | undefined;
    let audioFilter: string | undefined;
    if (request.audioPath && preset.normalizeAudio) {
      const targets = loudnessTargets(preset);
      const measured = await measureLoudness(toolkit, request.audioPath, targets, {
        signal,
        timeoutMs: this.deps.loudnessTimeoutMs,
      });
      if (measured) {
        loudness = measured;
        audioFilter = buildLoudnormFilter(measured, targets);
      }
    }

    if (signal.aborted) {
      throw new RenderCancelledError(jobId);
    }

    const encoder = selectEncoder(filterChain, this.deps.hardwareEncoder);
    await ensureOutputDir(outputPath);
    const videoDuration = await toolkit.probeDuration(request.videoPath);
    const audioDuration = request.audioPath ? await toolkit.probeDuration(request.audioPath) : null;
    const loopToSeconds = loopTargetFor(videoDuration, audioDuration);
    if (loopToSeconds !== undefined) {
      log.info({ jobId, videoDuration, audioDuration }, 'Voice-over outlasts the video, looping it');
    }
    // without a loop, -shortest ends the output with the shorter input
    const duration =
      loopToSeconds ??
      (audioDuration !== null && videoDuration !== null ? Math.min(videoDuration, audioDuration) : videoDuration);

    const processor = new VideoProcessor(toolkit, jobId, {
      videoPath: request.videoPath,
      audioPath: request.audioPath,
      outputPath,
      preset,
      filterChain,
      audioFilter,
      encoder,
      loopToSeconds,
    });
    await processor.process({
      signal,
      onProgress: seconds => this.reportProgress(jobId, seconds, duration),
    });

    return {
      outputPath,
      preset: request.presetName,
      encoder,
      filterChain,
      fileSizeBytes: await fileSize(outputPath),
      ...(loudness ? { loudness } : {}),
    };
  }

  private async requireSource(kind: 'video' | 'audio' | 'subtitles', filePath: string): Promise<void> {
    if (!(await fileExists(filePath))) {
      throw new SourceNotFoundError(kind, filePath);
    }
  }

  private async writeInlineSubtitles(jobId: string, tempDir: string, content: string | undefined): Promise<string | undefined> {
    if (!content) return undefined;
    const text = sanitizeSrtText(content);
    if (!text) return undefined;

    const validation = validateSrt(text);
    if (!validation.valid) {
      log.warn({ jobId, errors: validation.errors.slice(0, 5) }, 'Inline subtitles have problems, rendering what parses');
    }
    return writeSubtitleFile(tempDir, text);
  }

  private reportProgress(jobId: string, outTimeSeconds: number, duration: number | null): void {
    const percent = toPercent(outTimeSeconds, duration);
    if (percent === null || !this.progress.set(jobId, percent)) return;

    void this.deps.repository.updateProgress(jobId, percent).catch(error => {
      log.warn({ jobId, err: error }, 'Could not persist progress');
    });
  }
}
