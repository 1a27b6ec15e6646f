/**
 * Builds the ASS `force_style` argument for FFmpeg's `subtitles` filter.
 *
 * libass has no glow primitive. Glow is simulated by widening the outline and
 * giving it 50% alpha, which reads as a soft halo at phone viewing sizes.
 */

import { z } from 'zod';
import { createLogger } from '../logger';

const log = createLogger({ module: 'subtitle-style' });

const HEX_COLOR = /^#?[0-9a-fA-F]{6}$/;
const GENERIC_FAMILIES = new Set(['sans-serif', 'serif', 'monospace', 'cursive', 'fantasy', 'system-ui']);

export const ALIGN_BOTTOM_CENTER = 2;
export const ALIGN_TOP_CENTER = 8;
export const MIN_MARGIN_V = 50;
// positionY at or below this percentage anchors text to the top edge
const TOP_ANCHOR_MAX_PERCENT = 20;

/**
 * Reduces a CSS font stack such as `var(--font-mont), 'Montserrat', sans-serif`
 * to the first concrete family name.
 */
export function extractFontFamily(value: string): string {
  for (const part of value.split(',')) {
    const name = part.trim().replace(/^['"]|['"]$/g, '').trim();
    if (name && !name.startsWith('var(') && !GENERIC_FAMILIES.has(name.toLowerCase())) {
      return name;
    }
  }
  return 'Montserrat';
}

const colorField = (fallback: string) => z.string().trim().regex(HEX_COLOR).default(fallback);

export const SubtitleSettingsSchema = z.object({
  fontFamily: z
    .string()
    .transform(extractFontFamily)
    // commas and quotes would terminate the force_style value
    .pipe(z.string().regex(/^[^,'":\\[\]]+$/))
    .default('Montserrat'),
  fontSize: z.number().int().min(8).max(200).default(48),
  minFontSize: z.number().int().min(8).max(200).optional(),
  textColor: colorField('#FFFFFF'),
  outlineColor: colorField('#000000'),
  outlineWidth: z.number().int().min(0).max(10).default(3),
  bold: z.boolean().default(true),
  positionY: z.number().min(0).max(100).default(85),
  shadowDepth: z.number().int().min(0).max(4).default(0),
  shadowColor: colorField('#000000'),
  enableGlow: z.boolean().default(false),
  glowIntensity: z.number().int().min(0).max(10).default(0),
  adaptiveSizing: z.boolean().default(false),
});

export type SubtitleSettings = z.output<typeof SubtitleSettingsSchema>;
export type SubtitleSettingsInput = z.input<typeof SubtitleSettingsSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses loose settings. Fields that fail validation are replaced by their
 * defaults and reported in a warning; styling never fails a render.
 */
export function resolveSubtitleSettings(input: unknown): SubtitleSettings {
  const parsed = SubtitleSettingsSchema.safeParse(input ?? {});
  if (parsed.success) return parsed.data;

  const raw: Record<string, unknown> = isRecord(input) ? { ...input } : {};
  const rejected = new Set<string>();
  for (const issue of parsed.error.issues) {
    const key = issue.path[0];
    if (typeof key === 'string') {
      rejected.add(key);
      delete raw[key];
    }
  }
  log.warn({ rejected: [...rejected] }, 'Malformed subtitle settings; falling back to defaults');
  return SubtitleSettingsSchema.parse(raw);
}

/**
 * `#RRGGBB` → `&H00BBGGRR` (libass stores colors as alpha + BGR, alpha 00 is opaque).
 */
export function hexToAssColor(hex: string, alpha: number = 0): string {
  const clean = hex.replace(/^#/, '').toUpperCase();
  if (!HEX_COLOR.test(clean)) {
    throw new Error(`Not a #RRGGBB color: ${hex}`);
  }
  const a = Math.max(0, Math.min(255, Math.round(alpha))).toString(16).toUpperCase().padStart(2, '0');
  return `&H${a}${clean.slice(4, 6)}${clean.slice(2, 4)}${clean.slice(0, 2)}`;
}

export interface VerticalPlacement {
  alignment: number;
  marginV: number;
}

export function computeVerticalPlacement(positionY: number, shadowDepth: number, videoHeight: number): VerticalPlacement {
  let alignment: number;
  let marginV: number;
  if (positionY <= TOP_ANCHOR_MAX_PERCENT) {
    alignment = ALIGN_TOP_CENTER;
    marginV = Math.floor((positionY * videoHeight) / 100);
  } else {
    alignment = ALIGN_BOTTOM_CENTER;
    marginV = Math.floor(((100 - positionY) * videoHeight) / 100);
  }

  // deep shadows get clipped at the frame edge without extra room
  if (shadowDepth > 2) {
    marginV += shadowDepth * 2;
  }

  return { alignment, marginV: Math.max(MIN_MARGIN_V, marginV) };
}

export function toStyleString(input: SubtitleSettingsInput, videoWidth: number, videoHeight: number): string {
  const settings = resolveSubtitleSettings(input);
  const { alignment, marginV } = computeVerticalPlacement(settings.positionY, settings.shadowDepth, videoHeight);
  const outlineColor = hexToAssColor(settings.outlineColor);

  const parts = [
    `PlayResX=${videoWidth}`,
    `PlayResY=${videoHeight}`,
    `FontName=${settings.fontFamily}`,
    `FontSize=${settings.fontSize}`,
    // always opaque: the glow alpha must never bleed into the text fill
    `PrimaryColour=${hexToAssColor(settings.textColor)}`,
    `Bold=${settings.bold ? 1 : 0}`,
    `Alignment=${alignment}`,
    `MarginV=${marginV}`,
  ];

  if (settings.enableGlow && settings.glowIntensity > 0) {
    parts.push(`Outline=${settings.outlineWidth + settings.glowIntensity}`);
    parts.push(`OutlineColour=${hexToAssColor(settings.outlineColor, 0x80)}`);
  } else {
    parts.push(`Outline=${settings.outlineWidth}`);
    parts.push(`OutlineColour=${outlineColor}`);
  }

  if (settings.shadowDepth > 0) {
    parts.push(`Shadow=${settings.shadowDepth}`);
    parts.push(`BackColour=${hexToAssColor(settings.shadowColor)}`);
  } else {
    parts.push('Shadow=0');
  }
  // 1 = outline + drop shadow, the only style that renders both
  parts.push('BorderStyle=1');

  return parts.join(',');
}
