/**
 * Assembles the `-vf` chain for a render.
 *
 * Stage order is fixed and never caller-controlled:
 *   scale → crop → denoise → sharpen → color → subtitles
 * Denoise runs before sharpen so noise is not amplified, and subtitles are
 * burned in last so no enhancement filter touches the text.
 */

import { createLogger } from '../logger';
import { computeFontSizeFromFile, defaultMinFontSize } from './adaptiveSizing';
import { resolveSubtitleSettings, toStyleString, type SubtitleSettingsInput } from './subtitleStyle';
import type { VideoFilters } from './videoFilters';

const log = createLogger({ module: 'filter-chain' });

export interface ScaleParams {
  width: number;
  height: number;
}

export interface SubtitleTrack {
  path: string;
  settings?: SubtitleSettingsInput;
}

export interface ChainInput {
  scale: ScaleParams;
  filters: VideoFilters;
  subtitle?: SubtitleTrack;
}

/**
 * Makes a file path safe inside a filtergraph argument: separators become
 * `/`, then `'`, `:`, `[` and `]` are escaped in that order.
 */
export function escapeFilterPath(filePath: string): string {
  return filePath
    .replace(/\\/g, '/')
    .replace(/'/g, "'\\''")
    .replace(/:/g, '\\:')
    .replace(/\[/g, '\\[')
    .replace(/\]/g, '\\]');
}

export function unescapeFilterPath(escaped: string): string {
  return escaped
    .replace(/\\\]/g, ']')
    .replace(/\\\[/g, '[')
    .replace(/\\:/g, ':')
    .replace(/'\\''/g, "'");
}

export function scaleToken({ width, height }: ScaleParams): string {
  // fill the frame and crop the overflow; never letterbox
  return `scale=${width}:${height}:force_original_aspect_ratio=increase`;
}

export function cropToken({ width, height }: ScaleParams): string {
  return `crop=${width}:${height}`;
}

export async function buildSubtitleToken(track: SubtitleTrack, scale: ScaleParams): Promise<string> {
  const settings = resolveSubtitleSettings(track.settings);

  if (settings.adaptiveSizing) {
    const baseSize = settings.fontSize;
    const { fontSize, maxLineLength } = await computeFontSizeFromFile(track.path, {
      baseSize,
      minSize: settings.minFontSize ?? defaultMinFontSize(baseSize),
    });
    log.info({ maxLineLength, fontSize, baseSize }, 'Adaptive subtitle sizing applied');
    settings.fontSize = fontSize;
  }

  const style = toStyleString(settings, scale.width, scale.height);
  return `subtitles='${escapeFilterPath(track.path)}':force_style='${style}'`;
}

export async function buildChain(input: ChainInput): Promise<string[]> {
  const tokens: string[] = [scaleToken(input.scale), cropToken(input.scale)];

  for (const builder of [input.filters.denoise, input.filters.sharpen, input.filters.color]) {
    const token = builder.toFilterToken();
    if (token) tokens.push(token);
  }

  if (input.subtitle) {
    tokens.push(await buildSubtitleToken(input.subtitle, input.scale));
  }

  return tokens;
}

/**
 * True when the chain does more than resize, which rules out the hardware
 * encoder path.
 */
export function hasEnhancements(tokens: readonly string[]): boolean {
  return tokens.some(token => !token.startsWith('scale=') && !token.startsWith('crop='));
}
