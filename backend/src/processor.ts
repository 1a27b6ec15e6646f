import type { EncoderName } from './db';
import { ExternalProcessError } from './errors';
import type { MediaToolkit, RunOptions } from './ffmpeg';
import { hasEnhancements } from './filters/filterChain';
import { createLogger, type Logger } from './logger';
import { toFfmpegParams, type EncodingPreset } from './presets';

export interface RenderPlan {
  videoPath: string;
  /** Voice-over track. Without one a silent stereo track is muxed in. */
  audioPath?: string;
  outputPath: string;
  preset: EncodingPreset;
  filterChain: string[];
  /** Second-pass loudnorm filter for the voice-over. */
  audioFilter?: string;
  encoder: EncoderName;
  /** Loop the video and cut the output here, for a voice-over longer than the clip. */
  loopToSeconds?: number;
}

// Length differences below this are left to `-shortest`.
export const SYNC_TOLERANCE_SECONDS = 0.5;

/**
 * Output length when the video has to loop to cover the voice-over, or
 * undefined when trimming with `-shortest` is enough.
 */
export function loopTargetFor(videoSeconds: number | null, audioSeconds: number | null): number | undefined {
  if (videoSeconds === null || audioSeconds === null) return undefined;
  return audioSeconds - videoSeconds >= SYNC_TOLERANCE_SECONDS ? audioSeconds : undefined;
}

/**
 * Hardware encoding only when the chain is nothing but scale and crop;
 * CPU-side filters would force frames back and forth between GPU and host.
 */
export function selectEncoder(filterChain: readonly string[], hardwareAvailable: boolean): EncoderName {
  return hardwareAvailable && !hasEnhancements(filterChain) ? 'h264_nvenc' : 'libx264';
}

export function buildRenderArgs(plan: RenderPlan): string[] {
  const { preset } = plan;
  const args = ['-y', '-hide_banner', '-loglevel', 'error', '-nostats', '-progress', 'pipe:1'];
  if (plan.loopToSeconds !== undefined) {
    args.push('-stream_loop', '-1');
  }
  args.push('-i', plan.videoPath);

  if (plan.audioPath) {
    args.push('-i', plan.audioPath);
  } else {
    args.push('-f', 'lavfi', '-i', `anullsrc=r=${preset.audioSampleRate}:cl=stereo`);
  }

  args.push('-vf', plan.filterChain.join(','));
  if (plan.audioPath && plan.audioFilter) {
    args.push('-af', plan.audioFilter);
  }

  args.push('-r', String(preset.fps));
  args.push(...toFfmpegParams(preset, plan.encoder === 'h264_nvenc'));
  if (plan.loopToSeconds !== undefined) {
    args.push('-t', String(plan.loopToSeconds));
  }
  args.push('-map', '0:v:0', '-map', '1:a:0', '-shortest');
  args.push(...preset.extraFlags);
  args.push(plan.outputPath);
  return args;
}

export class VideoProcessor {
  private readonly log: Logger;

  constructor(
    private readonly toolkit: MediaToolkit,
    jobId: string,
    private readonly plan: RenderPlan
  ) {
    this.log = createLogger({ module: 'processor', jobId });
  }

  /**
   * Runs the final encode. Rejects with ExternalProcessError on a non-zero
   * exit or when FFmpeg could not be started.
   */
  async process(options: RunOptions = {}): Promise<void> {
    const args = buildRenderArgs(this.plan);
    this.log.info(
      { encoder: this.plan.encoder, filterChain: this.plan.filterChain, loopToSeconds: this.plan.loopToSeconds },
      'Starting encode'
    );

    const result = await this.toolkit.ffmpeg(args, options);

    if (result.spawnError) {
      throw new ExternalProcessError('ffmpeg', null, result.spawnError);
    }
    if (result.exitCode !== 0) {
      this.log.error({ exitCode: result.exitCode, aborted: result.aborted }, 'Encode failed');
      throw new ExternalProcessError('ffmpeg', result.exitCode, result.stderr);
    }

    this.log.info({ outputPath: this.plan.outputPath }, 'Encode finished');
  }
}
