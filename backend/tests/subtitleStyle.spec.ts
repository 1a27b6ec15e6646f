import { describe, expect, test } from 'vitest';
import {
  ALIGN_BOTTOM_CENTER,
  ALIGN_TOP_CENTER,
  computeVerticalPlacement,
  extractFontFamily,
  hexToAssColor,
  resolveSubtitleSettings,
  toStyleString,
} from '../src/filters/subtitleStyle';

const DEFAULT_STYLE = [
  'PlayResX=1080',
  'PlayResY=1920',
  'FontName=Montserrat',
  'FontSize=48',
  'PrimaryColour=&H00FFFFFF',
  'Bold=1',
  'Alignment=2',
  'MarginV=288',
  'Outline=3',
  'OutlineColour=&H00000000',
  'Shadow=0',
  'BorderStyle=1',
].join(',');

describe('hexToAssColor', () => {
  test('should reverse the channels behind an alpha byte', () => {
    expect(hexToAssColor('#FF8000')).toBe('&H000080FF');
    expect(hexToAssColor('ff8000', 0x80)).toBe('&H800080FF');
  });

  test('should reject anything that is not #RRGGBB', () => {
    expect(() => hexToAssColor('red')).toThrow('Not a #RRGGBB color: red');
  });
});

describe('computeVerticalPlacement', () => {
  test('should anchor to the bottom above 20%', () => {
    expect(computeVerticalPlacement(85, 0, 1920)).toEqual({ alignment: ALIGN_BOTTOM_CENTER, marginV: 288 });
    expect(computeVerticalPlacement(21, 0, 1920)).toEqual({ alignment: ALIGN_BOTTOM_CENTER, marginV: 1516 });
  });

  test('should anchor to the top at or below 20%', () => {
    expect(computeVerticalPlacement(10, 0, 1920)).toEqual({ alignment: ALIGN_TOP_CENTER, marginV: 192 });
    expect(computeVerticalPlacement(20, 0, 1920)).toEqual({ alignment: ALIGN_TOP_CENTER, marginV: 384 });
  });

  test('should add twice the depth for shadows deeper than 2', () => {
    expect(computeVerticalPlacement(85, 2, 1920).marginV).toBe(288);
    expect(computeVerticalPlacement(85, 3, 1920).marginV).toBe(294);
    expect(computeVerticalPlacement(85, 4, 1920).marginV).toBe(296);
  });

  test('should never go below the 50px floor', () => {
    expect(computeVerticalPlacement(99, 0, 1920).marginV).toBe(50);
    expect(computeVerticalPlacement(0, 0, 1920)).toEqual({ alignment: ALIGN_TOP_CENTER, marginV: 50 });
  });
});

describe('extractFontFamily', () => {
  test('should take the first concrete family from a CSS stack', () => {
    expect(extractFontFamily("var(--font-mont), 'Montserrat', sans-serif")).toBe('Montserrat');
    expect(extractFontFamily('"Bebas Neue", Impact')).toBe('Bebas Neue');
  });

  test('should fall back to Montserrat for generic-only stacks', () => {
    expect(extractFontFamily('sans-serif')).toBe('Montserrat');
  });
});

describe('toStyleString', () => {
  test('should emit the default style in field order', () => {
    expect(toStyleString({}, 1080, 1920)).toBe(DEFAULT_STYLE);
  });

  test('should add shadow fields and margin for a deep shadow', () => {
    const style = toStyleString({ shadowDepth: 3, shadowColor: '#112233' }, 1080, 1920);
    expect(style).toContain('MarginV=294');
    expect(style.endsWith('Shadow=3,BackColour=&H00332211,BorderStyle=1')).toBe(true);
  });

  test('should simulate glow with a wider half-transparent outline', () => {
    const style = toStyleString({ enableGlow: true, glowIntensity: 4 }, 1080, 1920);
    expect(style).toContain('Outline=7,OutlineColour=&H80000000');
    expect(style).toContain('PrimaryColour=&H00FFFFFF');
  });

  test('should ignore glow with zero intensity', () => {
    expect(toStyleString({ enableGlow: true, glowIntensity: 0 }, 1080, 1920)).toBe(DEFAULT_STYLE);
  });

  test('should keep the text opaque whatever colors are chosen', () => {
    const style = toStyleString({ textColor: '#00FF00', outlineColor: '#FF0000', enableGlow: true, glowIntensity: 2 }, 1080, 1920);
    expect(style).toContain('PrimaryColour=&H0000FF00');
    expect(style).toContain('OutlineColour=&H800000FF');
  });
});

describe('resolveSubtitleSettings', () => {
  test('should replace malformed fields with defaults and keep the rest', () => {
    const settings = resolveSubtitleSettings({ textColor: 'red', fontSize: 500, positionY: 10 });
    expect(settings.textColor).toBe('#FFFFFF');
    expect(settings.fontSize).toBe(48);
    expect(settings.positionY).toBe(10);
  });

  test('should reject font names that would break out of force_style', () => {
    expect(resolveSubtitleSettings({ fontFamily: 'Font:Bad' }).fontFamily).toBe('Montserrat');
  });

  test('should treat non-object input as empty', () => {
    expect(resolveSubtitleSettings('bold please').fontSize).toBe(48);
  });
});
