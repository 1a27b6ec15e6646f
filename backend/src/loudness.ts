/**
 * Two-pass EBU R128 loudness normalization with FFmpeg's `loudnorm`.
 * Pass one measures the voice-over; pass two is folded into the final encode
 * as a linear-mode `-af` filter built from those measurements.
 */

import { z } from 'zod';
import type { MediaToolkit } from './ffmpeg';
import { createLogger } from './logger';

const log = createLogger({ module: 'loudness' });

export interface LoudnessTargets {
  integratedLufs: number;
  truePeak: number;
  loudnessRange: number;
}

const MeasurementSchema = z.object({
  input_i: z.coerce.number(),
  input_tp: z.coerce.number(),
  input_lra: z.coerce.number(),
  input_thresh: z.coerce.number(),
  target_offset: z.coerce.number(),
});

export interface LoudnessMeasurement {
  inputI: number;
  inputTp: number;
  inputLra: number;
  inputThresh: number;
  targetOffset: number;
}

function targetArgs(targets: LoudnessTargets): string {
  return `I=${targets.integratedLufs}:TP=${targets.truePeak}:LRA=${targets.loudnessRange}`;
}

/**
 * Pulls the JSON block `loudnorm` prints at the end of stderr.
 */
export function parseLoudnormOutput(stderr: string): LoudnessMeasurement | null {
  const block = /\{[^{}]*"input_i"[^{}]*\}/.exec(stderr);
  if (!block) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(block[0]);
  } catch {
    return null;
  }

  const parsed = MeasurementSchema.safeParse(raw);
  if (!parsed.success) return null;
  const values = [parsed.data.input_i, parsed.data.input_tp, parsed.data.input_lra, parsed.data.input_thresh, parsed.data.target_offset];
  // silent input reports -inf, which loudnorm cannot take back as a measurement
  if (!values.every(Number.isFinite)) return null;

  return {
    inputI: parsed.data.input_i,
    inputTp: parsed.data.input_tp,
    inputLra: parsed.data.input_lra,
    inputThresh: parsed.data.input_thresh,
    targetOffset: parsed.data.target_offset,
  };
}

export async function measureLoudness(
  toolkit: MediaToolkit,
  audioPath: string,
  targets: LoudnessTargets,
  options: { signal?: AbortSignal; timeoutMs?: number } = {}
): Promise<LoudnessMeasurement | null> {
  const result = await toolkit.ffmpeg(
    [
      '-hide_banner',
      '-nostats',
      '-i', audioPath,
      '-af', `loudnorm=${targetArgs(targets)}:print_format=json`,
      '-f', 'null',
      '-',
    ],
    options
  );

  if (result.aborted) return null;

  const measurement = parseLoudnormOutput(result.stderr);
  if (!measurement) {
    log.error({ audioPath, exitCode: result.exitCode, stderrTail: result.stderr.slice(-500) }, 'No loudnorm measurement in FFmpeg output');
    return null;
  }

  log.info({ audioPath, ...measurement }, 'Loudness measured');
  return measurement;
}

export function buildLoudnormFilter(measurement: LoudnessMeasurement, targets: LoudnessTargets): string {
  return (
    `loudnorm=${targetArgs(targets)}:` +
    `measured_I=${measurement.inputI}:measured_TP=${measurement.inputTp}:` +
    `measured_LRA=${measurement.inputLra}:measured_thresh=${measurement.inputThresh}:` +
    `offset=${measurement.targetOffset}:linear=true`
  );
}
