/**
 * Video enhancement filters: hqdn3d (denoise), unsharp (sharpen), eq (color).
 *
 * Every config is disabled by default. A config that is disabled, invalid or
 * sitting at identity values yields no token, so the FFmpeg command only
 * carries filters that change pixels.
 */

import { z } from 'zod';
import { InvalidParameterError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger({ module: 'video-filters' });

// Values closer than this to their identity are treated as unchanged.
const IDENTITY_EPSILON = 0.01;

export interface FilterBuilder {
  readonly enabled: boolean;
  validate(): true;
  toFilterToken(): string | null;
}

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new InvalidParameterError(field, `${value} (must be ${min} to ${max})`);
  }
}

function tokenOrNull(builder: FilterBuilder, filterName: string, build: () => string | null): string | null {
  if (!builder.enabled) return null;
  try {
    builder.validate();
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      log.warn({ filter: filterName, field: error.field }, `Skipping ${filterName}: ${error.message}`);
      return null;
    }
    throw error;
  }
  return build();
}

export interface DenoiseOptions {
  enabled?: boolean;
  lumaSpatial?: number;
  chromaSpatial?: number;
  lumaTemporal?: number;
  chromaTemporal?: number;
}

export interface DenoiseParameters {
  lumaSpatial: number;
  chromaSpatial: number;
  lumaTemporal: number;
  chromaTemporal: number;
}

export class DenoiseConfig implements FilterBuilder {
  readonly enabled: boolean;
  readonly lumaSpatial: number;
  readonly chromaSpatial?: number;
  readonly lumaTemporal?: number;
  readonly chromaTemporal?: number;

  constructor(options: DenoiseOptions = {}) {
    this.enabled = options.enabled ?? false;
    // FFmpeg's own default of 4.0 smears fine detail on phone footage
    this.lumaSpatial = options.lumaSpatial ?? 2.0;
    this.chromaSpatial = options.chromaSpatial;
    this.lumaTemporal = options.lumaTemporal;
    this.chromaTemporal = options.chromaTemporal;
  }

  validate(): true {
    checkRange('luma_spatial', this.lumaSpatial, 0, 10);
    if (this.chromaSpatial !== undefined) checkRange('chroma_spatial', this.chromaSpatial, 0, 10);
    if (this.lumaTemporal !== undefined) checkRange('luma_temporal', this.lumaTemporal, 0, 15);
    if (this.chromaTemporal !== undefined) checkRange('chroma_temporal', this.chromaTemporal, 0, 15);
    return true;
  }

  /**
   * Unset parameters are derived from `lumaSpatial`:
   * chroma spatial = luma × 0.75, luma temporal = luma × 1.5,
   * chroma temporal = chroma spatial × 1.5.
   */
  resolveParameters(): DenoiseParameters {
    const chromaSpatial = this.chromaSpatial ?? this.lumaSpatial * 0.75;
    return {
      lumaSpatial: this.lumaSpatial,
      chromaSpatial,
      lumaTemporal: this.lumaTemporal ?? this.lumaSpatial * 1.5,
      chromaTemporal: this.chromaTemporal ?? chromaSpatial * 1.5,
    };
  }

  toFilterToken(): string | null {
    return tokenOrNull(this, 'denoise', () => {
      const p = this.resolveParameters();
      return `hqdn3d=${p.lumaSpatial.toFixed(1)}:${p.chromaSpatial.toFixed(2)}:${p.lumaTemporal.toFixed(1)}:${p.chromaTemporal.toFixed(2)}`;
    });
  }
}

export interface SharpenOptions {
  enabled?: boolean;
  lumaAmount?: number;
  matrixSize?: number;
}

export class SharpenConfig implements FilterBuilder {
  /** Chroma is never sharpened; sharpening it produces color fringing. */
  static readonly CHROMA_AMOUNT = 0;

  readonly enabled: boolean;
  readonly lumaAmount: number;
  readonly matrixSize: number;

  constructor(options: SharpenOptions = {}) {
    this.enabled = options.enabled ?? false;
    this.lumaAmount = options.lumaAmount ?? 0.5;
    this.matrixSize = options.matrixSize ?? 5;
  }

  validate(): true {
    checkRange('luma_amount', this.lumaAmount, -2, 5);
    if (!Number.isInteger(this.matrixSize) || this.matrixSize < 3 || this.matrixSize > 23 || this.matrixSize % 2 === 0) {
      throw new InvalidParameterError('matrix_size', `${this.matrixSize} (must be odd, 3 to 23)`);
    }
    return true;
  }

  toFilterToken(): string | null {
    return tokenOrNull(this, 'sharpen', () => {
      const m = this.matrixSize;
      return `unsharp=${m}:${m}:${this.lumaAmount.toFixed(2)}:${m}:${m}:${SharpenConfig.CHROMA_AMOUNT.toFixed(1)}`;
    });
  }
}

export interface ColorOptions {
  enabled?: boolean;
  brightness?: number;
  contrast?: number;
  saturation?: number;
  gamma?: number;
}

export class ColorConfig implements FilterBuilder {
  readonly enabled: boolean;
  readonly brightness: number;
  readonly contrast: number;
  readonly saturation: number;
  readonly gamma?: number;

  constructor(options: ColorOptions = {}) {
    this.enabled = options.enabled ?? false;
    this.brightness = options.brightness ?? 0;
    this.contrast = options.contrast ?? 1;
    this.saturation = options.saturation ?? 1;
    this.gamma = options.gamma;
  }

  validate(): true {
    checkRange('brightness', this.brightness, -1, 1);
    checkRange('contrast', this.contrast, 0, 3);
    checkRange('saturation', this.saturation, 0, 3);
    if (this.gamma !== undefined) checkRange('gamma', this.gamma, 0.1, 10);
    return true;
  }

  toFilterToken(): string | null {
    return tokenOrNull(this, 'color', () => {
      const params: string[] = [];
      if (Math.abs(this.brightness) > IDENTITY_EPSILON) params.push(`brightness=${this.brightness.toFixed(2)}`);
      if (Math.abs(this.contrast - 1) > IDENTITY_EPSILON) params.push(`contrast=${this.contrast.toFixed(2)}`);
      if (Math.abs(this.saturation - 1) > IDENTITY_EPSILON) params.push(`saturation=${this.saturation.toFixed(2)}`);
      if (this.gamma !== undefined && Math.abs(this.gamma - 1) > IDENTITY_EPSILON) params.push(`gamma=${this.gamma.toFixed(2)}`);
      return params.length > 0 ? `eq=${params.join(':')}` : null;
    });
  }
}

export interface VideoFiltersOptions {
  denoise?: DenoiseOptions;
  sharpen?: SharpenOptions;
  color?: ColorOptions;
}

const DenoiseInputSchema = z.object({
  enabled: z.boolean().optional(),
  lumaSpatial: z.number().optional(),
  chromaSpatial: z.number().optional(),
  lumaTemporal: z.number().optional(),
  chromaTemporal: z.number().optional(),
});

const SharpenInputSchema = z.object({
  enabled: z.boolean().optional(),
  lumaAmount: z.number().optional(),
  matrixSize: z.number().optional(),
});

const ColorInputSchema = z.object({
  enabled: z.boolean().optional(),
  brightness: z.number().optional(),
  contrast: z.number().optional(),
  saturation: z.number().optional(),
  gamma: z.number().optional(),
});

function parseFamily<T>(family: string, schema: z.ZodType<T>, value: unknown): T | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    log.warn({ filter: family, issues: parsed.error.issues }, `Ignoring malformed ${family} settings`);
    return undefined;
  }
  return parsed.data;
}

export type PerformanceImpact = 'None' | 'Low (<10%)' | 'Medium (10-20%)' | 'High (>20%)';

export class VideoFilters {
  readonly denoise: DenoiseConfig;
  readonly sharpen: SharpenConfig;
  readonly color: ColorConfig;

  constructor(options: VideoFiltersOptions = {}) {
    this.denoise = new DenoiseConfig(options.denoise);
    this.sharpen = new SharpenConfig(options.sharpen);
    this.color = new ColorConfig(options.color);
  }

  /**
   * Reads filter options from untrusted input. Unknown keys are dropped and a
   * malformed family is left unset. Range checks stay with the builders.
   */
  static parseOptions(input: unknown): VideoFiltersOptions {
    if (typeof input !== 'object' || input === null) return {};
    const record: Record<string, unknown> = { ...input };
    return {
      denoise: parseFamily('denoise', DenoiseInputSchema, record.denoise),
      sharpen: parseFamily('sharpen', SharpenInputSchema, record.sharpen),
      color: parseFamily('color', ColorInputSchema, record.color),
    };
  }

  static fromInput(input: unknown): VideoFilters {
    return new VideoFilters(VideoFilters.parseOptions(input));
  }

  /**
   * A copy with each set field of `overrides` laid over these settings.
   */
  merge(overrides: VideoFiltersOptions): VideoFilters {
    const { denoise: d = {}, sharpen: s = {}, color: c = {} } = overrides;
    return new VideoFilters({
      denoise: {
        enabled: d.enabled ?? this.denoise.enabled,
        lumaSpatial: d.lumaSpatial ?? this.denoise.lumaSpatial,
        chromaSpatial: d.chromaSpatial ?? this.denoise.chromaSpatial,
        lumaTemporal: d.lumaTemporal ?? this.denoise.lumaTemporal,
        chromaTemporal: d.chromaTemporal ?? this.denoise.chromaTemporal,
      },
      sharpen: {
        enabled: s.enabled ?? this.sharpen.enabled,
        lumaAmount: s.lumaAmount ?? this.sharpen.lumaAmount,
        matrixSize: s.matrixSize ?? this.sharpen.matrixSize,
      },
      color: {
        enabled: c.enabled ?? this.color.enabled,
        brightness: c.brightness ?? this.color.brightness,
        contrast: c.contrast ?? this.color.contrast,
        saturation: c.saturation ?? this.color.saturation,
        gamma: c.gamma ?? this.color.gamma,
      },
    });
  }

  hasAnyEnabled(): boolean {
    return this.denoise.enabled || this.sharpen.enabled || this.color.enabled;
  }

  // Rough per-filter overhead measured on 1080p encodes.
  estimatePerformanceImpact(): PerformanceImpact {
    if (!this.hasAnyEnabled()) return 'None';

    let overhead = 0;
    if (this.denoise.enabled) overhead += 5;
    if (this.sharpen.enabled) overhead += 10;
    if (this.color.enabled) overhead += 2;

    if (overhead < 10) return 'Low (<10%)';
    if (overhead < 20) return 'Medium (10-20%)';
    return 'High (>20%)';
  }
}
