import { z } from 'zod';
import type { RenderRequest } from '../db';

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

/**
 * HTML form booleans: `true`, `1`, `yes` and `on` in any case are true,
 * anything else is false.
 */
export function parseFormBoolean(value: string | boolean): boolean {
  if (typeof value === 'boolean') return value;
  return TRUTHY.has(value.trim().toLowerCase());
}

const formBoolean = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform(value => (value === undefined ? undefined : parseFormBoolean(value)));

const formNumber = z.coerce.number().finite().optional();
const formInt = z.coerce.number().int().optional();
const formText = z.string().optional();

export const RenderFormSchema = z.object({
  preset_name: z.string().min(1).default('instagram_reels'),
  video_path: z.string().min(1, 'video_path is required'),
  audio_path: formText,
  srt_path: formText,
  srt_content: formText,

  enable_denoise: formBoolean,
  denoise_strength: formNumber,
  enable_sharpen: formBoolean,
  sharpen_amount: formNumber,
  enable_color: formBoolean,
  brightness: formNumber,
  contrast: formNumber,
  saturation: formNumber,
  gamma: formNumber,

  font_family: formText,
  font_size: formInt,
  text_color: formText,
  outline_color: formText,
  outline_width: formInt,
  position_y: formNumber,
  shadow_depth: formInt,
  shadow_color: formText,
  enable_glow: formBoolean,
  glow_blur: formInt,
  adaptive_sizing: formBoolean,
});

export type RenderForm = z.output<typeof RenderFormSchema>;

/**
 * Empty form values count as absent.
 */
export function parseRenderForm(fields: Record<string, unknown>): RenderForm {
  const present = Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== ''));
  return RenderFormSchema.parse(present);
}

export function toRenderRequest(clipId: string, form: RenderForm): RenderRequest {
  return {
    clipId,
    presetName: form.preset_name.toLowerCase(),
    videoPath: form.video_path,
    audioPath: form.audio_path,
    srtPath: form.srt_path,
    srtContent: form.srt_content,
    filters: {
      denoise: { enabled: form.enable_denoise, lumaSpatial: form.denoise_strength },
      sharpen: { enabled: form.enable_sharpen, lumaAmount: form.sharpen_amount },
      color: {
        enabled: form.enable_color,
        brightness: form.brightness,
        contrast: form.contrast,
        saturation: form.saturation,
        gamma: form.gamma,
      },
    },
    subtitleSettings: {
      fontFamily: form.font_family,
      fontSize: form.font_size,
      textColor: form.text_color,
      outlineColor: form.outline_color,
      outlineWidth: form.outline_width,
      positionY: form.position_y,
      shadowDepth: form.shadow_depth,
      shadowColor: form.shadow_color,
      enableGlow: form.enable_glow,
      glowIntensity: form.glow_blur,
      adaptiveSizing: form.adaptive_sizing,
    },
  };
}
