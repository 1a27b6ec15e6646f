/**
 * Platform encoding presets. Built once at start-up, frozen, and shared
 * read-only by every job.
 */

import { z } from 'zod';
import { EncodingPresetUnknownError } from './errors';
import { VideoFilters, type PerformanceImpact, type VideoFiltersOptions } from './filters/videoFilters';

const X264_SPEEDS = ['ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow'] as const;

const EncodingPresetSchema = z.object({
  name: z.string(),
  platform: z.enum(['tiktok', 'reels', 'youtube_shorts', 'generic']),
  description: z.string(),
  width: z.number().int().positive().default(1080),
  height: z.number().int().positive().default(1920),
  fps: z.number().int().positive().default(30),
  codec: z.string().default('libx264'),
  crf: z.number().int().min(0).max(51).default(20),
  speed: z.enum(X264_SPEEDS).default('medium'),
  // 2 s keyframe interval at 30 fps
  gopSize: z.number().int().min(1).default(60),
  keyintMin: z.number().int().min(1).default(60),
  audioCodec: z.string().default('aac'),
  audioBitrate: z.string().regex(/^\d+k$/).default('192k'),
  audioSampleRate: z.number().int().positive().default(48000),
  normalizeAudio: z.boolean().default(true),
  targetLufs: z.number().min(-70).max(-5).default(-14),
  targetTruePeak: z.number().min(-9).max(0).default(-1.5),
  targetLra: z.number().min(1).max(50).default(7),
  targetBitrateMbps: z.number().positive().default(5),
  maxFileSizeMb: z.number().int().positive().nullable().default(null),
  extraFlags: z.array(z.string()).default(['-movflags', '+faststart']),
});

type EncodingPresetInput = z.input<typeof EncodingPresetSchema> & { videoFilters?: VideoFiltersOptions };
export type EncodingPresetFields = z.output<typeof EncodingPresetSchema>;

export interface EncodingPreset extends Readonly<EncodingPresetFields> {
  readonly videoFilters: VideoFilters;
}

export interface PresetSummary {
  id: string;
  name: string;
  platform: EncodingPresetFields['platform'];
  description: string;
  width: number;
  height: number;
  fps: number;
  crf: number;
  audioBitrate: string;
  normalizeAudio: boolean;
  targetLufs: number;
  maxFileSizeMb: number | null;
  videoFiltersEnabled: boolean;
  performanceImpact: PerformanceImpact;
}

function definePreset(input: EncodingPresetInput): EncodingPreset {
  const { videoFilters, ...fields } = input;
  return Object.freeze({
    ...EncodingPresetSchema.parse(fields),
    videoFilters: new VideoFilters(videoFilters),
  });
}

export const PRESETS: Readonly<Record<string, EncodingPreset>> = Object.freeze({
  tiktok: definePreset({
    name: 'TikTok',
    platform: 'tiktok',
    description: 'Optimized for TikTok (9:16, CRF 20, -14 LUFS audio)',
    crf: 20,
    speed: 'medium',
    targetBitrateMbps: 5,
    maxFileSizeMb: 500,
  }),
  instagram_reels: definePreset({
    name: 'Instagram Reels',
    platform: 'reels',
    description: 'Optimized for Instagram Reels (9:16, CRF 18, -14 LUFS audio)',
    crf: 18,
    speed: 'slow',
    targetBitrateMbps: 6,
    maxFileSizeMb: 4000,
  }),
  youtube_shorts: definePreset({
    name: 'YouTube Shorts',
    platform: 'youtube_shorts',
    description: 'Optimized for YouTube Shorts (9:16, CRF 18, -14 LUFS audio)',
    crf: 18,
    speed: 'slow',
    targetBitrateMbps: 8,
  }),
  generic: definePreset({
    name: 'Generic',
    platform: 'generic',
    description: 'Balanced settings for any platform (CRF 20, -14 LUFS audio)',
    crf: 20,
    speed: 'medium',
  }),
});

export function presetNames(): string[] {
  return Object.keys(PRESETS);
}

export function findPreset(name: string): EncodingPreset | undefined {
  return Object.prototype.hasOwnProperty.call(PRESETS, name.toLowerCase()) ? PRESETS[name.toLowerCase()] : undefined;
}

export function getPreset(name: string): EncodingPreset {
  const preset = findPreset(name);
  if (!preset) {
    throw new EncodingPresetUnknownError(name, presetNames());
  }
  return preset;
}

/**
 * Encoder flags for a preset. The hardware path (NVENC) takes the same CRF as
 * its constant-quality target.
 */
export function toFfmpegParams(preset: EncodingPreset, useHardware: boolean = false): string[] {
  const params = useHardware
    ? ['-c:v', 'h264_nvenc', '-preset', 'p4', '-cq', String(preset.crf)]
    : ['-c:v', preset.codec, '-preset', preset.speed, '-crf', String(preset.crf)];

  params.push(
    '-g', String(preset.gopSize),
    '-keyint_min', String(preset.keyintMin),
    '-sc_threshold', '0',
    '-bf', '2',
    '-c:a', preset.audioCodec,
    '-b:a', preset.audioBitrate,
    '-ar', String(preset.audioSampleRate),
    '-pix_fmt', 'yuv420p',
  );
  return params;
}

export function listPresets(): PresetSummary[] {
  return Object.entries(PRESETS).map(([id, preset]) => ({
    id,
    name: preset.name,
    platform: preset.platform,
    description: preset.description,
    width: preset.width,
    height: preset.height,
    fps: preset.fps,
    crf: preset.crf,
    audioBitrate: preset.audioBitrate,
    normalizeAudio: preset.normalizeAudio,
    targetLufs: preset.targetLufs,
    maxFileSizeMb: preset.maxFileSizeMb,
    videoFiltersEnabled: preset.videoFilters.hasAnyEnabled(),
    performanceImpact: preset.videoFilters.estimatePerformanceImpact(),
  }));
}
