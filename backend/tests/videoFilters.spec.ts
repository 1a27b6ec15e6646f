import { describe, expect, test } from 'vitest';
import { InvalidParameterError } from '../src/errors';
import { ColorConfig, DenoiseConfig, SharpenConfig, VideoFilters } from '../src/filters/videoFilters';

describe('DenoiseConfig', () => {
  test('should derive chroma and temporal strengths from luma spatial', () => {
    for (let luma = 0; luma <= 10; luma += 0.5) {
      const params = new DenoiseConfig({ enabled: true, lumaSpatial: luma }).resolveParameters();
      expect(params.chromaSpatial).toBeCloseTo(luma * 0.75, 10);
      expect(params.lumaTemporal).toBeCloseTo(luma * 1.5, 10);
      expect(params.chromaTemporal).toBeCloseTo(params.chromaSpatial * 1.5, 10);
    }
  });

  test('should format the default strength as hqdn3d=2.0:1.50:3.0:2.25', () => {
    expect(new DenoiseConfig({ enabled: true }).toFilterToken()).toBe('hqdn3d=2.0:1.50:3.0:2.25');
  });

  test('should keep explicit overrides instead of deriving them', () => {
    const config = new DenoiseConfig({ enabled: true, lumaSpatial: 4, chromaSpatial: 1, lumaTemporal: 2 });
    expect(config.toFilterToken()).toBe('hqdn3d=4.0:1.00:2.0:1.50');
  });

  test('should emit nothing when disabled', () => {
    expect(new DenoiseConfig({ lumaSpatial: 5 }).toFilterToken()).toBeNull();
  });

  test('should name the offending field when out of range', () => {
    const config = new DenoiseConfig({ enabled: true, lumaSpatial: 11 });
    expect(() => config.validate()).toThrow(InvalidParameterError);
    try {
      config.validate();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      if (error instanceof InvalidParameterError) {
        expect(error.field).toBe('luma_spatial');
      }
    }
  });

  test('should skip an invalid config instead of throwing', () => {
    expect(new DenoiseConfig({ enabled: true, lumaSpatial: 11 }).toFilterToken()).toBeNull();
    expect(new DenoiseConfig({ enabled: true, lumaTemporal: 16 }).toFilterToken()).toBeNull();
  });
});

describe('SharpenConfig', () => {
  test('should format the default as unsharp=5:5:0.50:5:5:0.0', () => {
    expect(new SharpenConfig({ enabled: true }).toFilterToken()).toBe('unsharp=5:5:0.50:5:5:0.0');
  });

  test('should never sharpen chroma for any valid amount and matrix size', () => {
    for (const lumaAmount of [-2, -1, 0, 0.5, 1.25, 2.5, 5]) {
      for (let matrixSize = 3; matrixSize <= 23; matrixSize += 2) {
        const token = new SharpenConfig({ enabled: true, lumaAmount, matrixSize }).toFilterToken();
        expect(token).not.toBeNull();
        const fields = (token ?? '').replace('unsharp=', '').split(':');
        expect(fields).toHaveLength(6);
        expect(fields[5]).toBe('0.0');
      }
    }
  });

  test('should reject even and out-of-range matrix sizes', () => {
    for (const matrixSize of [1, 4, 24, 25, 5.5]) {
      const config = new SharpenConfig({ enabled: true, matrixSize });
      expect(() => config.validate()).toThrow(/matrix_size/);
      expect(config.toFilterToken()).toBeNull();
    }
  });

  test('should expose chroma amount only as a constant', () => {
    expect(SharpenConfig.CHROMA_AMOUNT).toBe(0);
  });
});

describe('ColorConfig', () => {
  test('should emit nothing at identity values', () => {
    expect(new ColorConfig({ enabled: true }).toFilterToken()).toBeNull();
    expect(new ColorConfig({ enabled: true, brightness: 0.005, contrast: 1.009, gamma: 1 }).toFilterToken()).toBeNull();
  });

  test('should include only parameters that move away from identity', () => {
    expect(new ColorConfig({ enabled: true, brightness: 0.1 }).toFilterToken()).toBe('eq=brightness=0.10');
    expect(new ColorConfig({ enabled: true, brightness: -0.05, contrast: 1.1 }).toFilterToken()).toBe(
      'eq=brightness=-0.05:contrast=1.10'
    );
    expect(new ColorConfig({ enabled: true, contrast: 1.2, saturation: 1.3, gamma: 0.9 }).toFilterToken()).toBe(
      'eq=contrast=1.20:saturation=1.30:gamma=0.90'
    );
  });

  test('should skip out-of-range values', () => {
    expect(new ColorConfig({ enabled: true, saturation: 3.5 }).toFilterToken()).toBeNull();
    expect(new ColorConfig({ enabled: true, gamma: 0.05 }).toFilterToken()).toBeNull();
  });
});

describe('VideoFilters', () => {
  test('should disable every filter by default', () => {
    const filters = new VideoFilters();
    expect(filters.hasAnyEnabled()).toBe(false);
    expect(filters.estimatePerformanceImpact()).toBe('None');
  });

  test('should produce byte-identical tokens for identical input', () => {
    const options = { denoise: { enabled: true, lumaSpatial: 3.3 }, sharpen: { enabled: true, lumaAmount: 1.1 } };
    const first = new VideoFilters(options);
    const second = new VideoFilters(options);
    expect(first.denoise.toFilterToken()).toBe(second.denoise.toFilterToken());
    expect(first.sharpen.toFilterToken()).toBe(second.sharpen.toFilterToken());
  });

  test('should estimate overhead from the enabled filters', () => {
    expect(new VideoFilters({ denoise: { enabled: true } }).estimatePerformanceImpact()).toBe('Low (<10%)');
    expect(new VideoFilters({ sharpen: { enabled: true } }).estimatePerformanceImpact()).toBe('Medium (10-20%)');
    expect(
      new VideoFilters({ denoise: { enabled: true }, sharpen: { enabled: true }, color: { enabled: true } }).estimatePerformanceImpact()
    ).toBe('Medium (10-20%)');
  });

  describe('fromInput', () => {
    test('should keep well-typed families and drop unknown keys', () => {
      const filters = VideoFilters.fromInput({ denoise: { enabled: true, lumaSpatial: 3 }, upscale: { factor: 2 } });
      expect(filters.denoise.enabled).toBe(true);
      expect(filters.denoise.lumaSpatial).toBe(3);
      expect(filters.sharpen.enabled).toBe(false);
    });

    test('should fall back to defaults for a malformed family', () => {
      const filters = VideoFilters.fromInput({ sharpen: { enabled: 'yes' }, color: 'bright' });
      expect(filters.sharpen.enabled).toBe(false);
      expect(filters.color.enabled).toBe(false);
    });

    test('should accept non-object input as empty', () => {
      expect(VideoFilters.fromInput(null).hasAnyEnabled()).toBe(false);
      expect(VideoFilters.fromInput('denoise').hasAnyEnabled()).toBe(false);
    });
  });

  describe('merge', () => {
    const base = new VideoFilters({ denoise: { enabled: true, lumaSpatial: 3 } });

    test('should lay set fields over the base', () => {
      const merged = base.merge({ denoise: { lumaSpatial: 5 } });
      expect(merged.denoise.enabled).toBe(true);
      expect(merged.denoise.lumaSpatial).toBe(5);
    });

    test('should leave the base untouched for unset fields', () => {
      const merged = base.merge({ denoise: { enabled: undefined }, sharpen: { enabled: true } });
      expect(merged.denoise.enabled).toBe(true);
      expect(merged.denoise.lumaSpatial).toBe(3);
      expect(merged.sharpen.enabled).toBe(true);
      expect(base.sharpen.enabled).toBe(false);
    });

    test('should let an override switch a filter off', () => {
      expect(base.merge({ denoise: { enabled: false } }).denoise.toFilterToken()).toBeNull();
    });
  });
});
