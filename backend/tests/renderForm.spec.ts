import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod';
import { parseFormBoolean, parseRenderForm, toRenderRequest } from '../src/routes/renderForm';

describe('render form', () => {
  describe('parseFormBoolean', () => {
    test('should read the usual truthy spellings', () => {
      for (const value of ['true', 'TRUE', '1', 'yes', ' on ']) {
        expect(parseFormBoolean(value)).toBe(true);
      }
    });

    test('should treat anything else as false', () => {
      for (const value of ['false', '0', 'no', 'off', 'maybe']) {
        expect(parseFormBoolean(value)).toBe(false);
      }
    });
  });

  describe('parseRenderForm', () => {
    test('should default the preset and coerce numbers', () => {
      const form = parseRenderForm({ video_path: '/clips/a.mp4', brightness: '0.1', font_size: '52' });
      expect(form.preset_name).toBe('instagram_reels');
      expect(form.brightness).toBe(0.1);
      expect(form.font_size).toBe(52);
    });

    test('should treat empty strings as absent', () => {
      const form = parseRenderForm({ video_path: '/clips/a.mp4', audio_path: '', gamma: '' });
      expect(form.audio_path).toBeUndefined();
      expect(form.gamma).toBeUndefined();
    });

    test('should reject non-numeric values', () => {
      expect(() => parseRenderForm({ video_path: '/clips/a.mp4', contrast: 'high' })).toThrow(ZodError);
    });

    test('should reject a fractional font size', () => {
      expect(() => parseRenderForm({ video_path: '/clips/a.mp4', font_size: '40.5' })).toThrow(ZodError);
    });
  });

  describe('toRenderRequest', () => {
    test('should map form fields onto filter and subtitle settings', () => {
      const form = parseRenderForm({
        preset_name: 'YouTube_Shorts',
        video_path: '/clips/a.mp4',
        enable_denoise: 'yes',
        denoise_strength: '4',
        enable_glow: 'true',
        glow_blur: '3',
        position_y: '10',
      });

      const request = toRenderRequest('clip-9', form);

      expect(request.clipId).toBe('clip-9');
      expect(request.presetName).toBe('youtube_shorts');
      expect(request.filters.denoise).toEqual({ enabled: true, lumaSpatial: 4 });
      expect(request.filters.sharpen).toEqual({ enabled: undefined, lumaAmount: undefined });
      expect(request.subtitleSettings?.enableGlow).toBe(true);
      expect(request.subtitleSettings?.glowIntensity).toBe(3);
      expect(request.subtitleSettings?.positionY).toBe(10);
    });
  });
});
