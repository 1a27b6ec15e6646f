import { promises as fs } from 'fs';
import { createLogger } from '../logger';
import { parseSrt, stripMarkup } from '../srt';

const log = createLogger({ module: 'adaptive-sizing' });

export interface AdaptiveSizingOptions {
  baseSize: number;
  minSize: number;
  /** Lines at or under this many characters keep `baseSize`. */
  lowThreshold?: number;
  /** Lines at or over this many characters get `minSize`. */
  highThreshold?: number;
}

export interface AdaptiveSizingResult {
  fontSize: number;
  maxLineLength: number;
}

export const DEFAULT_LOW_THRESHOLD = 40;
export const DEFAULT_HIGH_THRESHOLD = 60;

/**
 * Default minimum for a base size: 16px smaller, never under 16px.
 */
export function defaultMinFontSize(baseSize: number): number {
  return Math.max(16, baseSize - 16);
}

function decodeTrack(track: Buffer | string): string {
  if (typeof track === 'string') return track;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(track);
  } catch {
    log.warn('Subtitle track is not valid UTF-8, decoding as latin1');
    return track.toString('latin1');
  }
}

/**
 * Longest rendered line across the whole track, after markup is stripped.
 * Counts code points, so accented and emoji characters count once.
 */
export function measureLongestLine(content: string): number {
  let longest = 0;
  for (const cue of parseSrt(content)) {
    for (const line of cue.lines) {
      longest = Math.max(longest, Array.from(stripMarkup(line).trim()).length);
    }
  }
  return longest;
}

export function interpolateFontSize(maxLineLength: number, options: AdaptiveSizingOptions): number {
  const low = options.lowThreshold ?? DEFAULT_LOW_THRESHOLD;
  const high = options.highThreshold ?? DEFAULT_HIGH_THRESHOLD;
  const { baseSize, minSize } = options;

  if (maxLineLength <= low) return baseSize;
  if (maxLineLength >= high) return minSize;
  return Math.trunc(baseSize - ((baseSize - minSize) * (maxLineLength - low)) / (high - low));
}

/**
 * Shrinks the subtitle font as the longest line grows. Lines are never
 * re-wrapped; a long line gets a smaller size instead.
 */
export function computeFontSize(track: Buffer | string, options: AdaptiveSizingOptions): AdaptiveSizingResult {
  try {
    const maxLineLength = measureLongestLine(decodeTrack(track));
    return { fontSize: interpolateFontSize(maxLineLength, options), maxLineLength };
  } catch (error) {
    log.error({ err: error }, 'Subtitle parsing failed for adaptive sizing');
    return { fontSize: options.baseSize, maxLineLength: 0 };
  }
}

export async function computeFontSizeFromFile(filePath: string, options: AdaptiveSizingOptions): Promise<AdaptiveSizingResult> {
  let track: Buffer;
  try {
    track = await fs.readFile(filePath);
  } catch (error) {
    log.error({ err: error, filePath }, 'Could not read subtitle file for adaptive sizing');
    return { fontSize: options.baseSize, maxLineLength: 0 };
  }
  return computeFontSize(track, options);
}
