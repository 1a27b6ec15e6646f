import { describe, expect, test } from 'vitest';
import { fixCommonIssues, parseSrt, sanitizeSrtText, stripMarkup, timestampToSeconds, validateSrt } from '../src/srt';
import { SAMPLE_SRT } from './helpers/fixtures';

describe('timestampToSeconds', () => {
  test('should accept comma and dot millisecond separators', () => {
    expect(timestampToSeconds('00:01:02,500')).toBe(62.5);
    expect(timestampToSeconds('01:00:00.250')).toBe(3600.25);
  });

  test('should reject malformed timestamps', () => {
    expect(() => timestampToSeconds('1:2:3')).toThrow('Invalid timestamp: 1:2:3');
  });
});

describe('parseSrt', () => {
  test('should parse cues with multiple lines', () => {
    expect(parseSrt(SAMPLE_SRT)).toEqual([
      { index: 1, startSeconds: 1, endSeconds: 3, lines: ['Short line'] },
      { index: 2, startSeconds: 3.5, endSeconds: 6, lines: ['<i>A second cue</i>', 'with two lines'] },
    ]);
  });

  test('should tolerate CRLF, a byte order mark and missing indexes', () => {
    const cues = parseSrt('\uFEFF00:00:01.000 --> 00:00:02.000\r\nHello\r\n');
    expect(cues).toEqual([{ index: 1, startSeconds: 1, endSeconds: 2, lines: ['Hello'] }]);
  });

  test('should skip blocks without usable timing', () => {
    const cues = parseSrt('1\nno timing here\n\n2\n00:00:01,000 --> 00:00:02,000\nKept\n\n3\naa:bb --> cc\nDropped\n');
    expect(cues.map(c => c.lines)).toEqual([['Kept']]);
  });
});

describe('stripMarkup', () => {
  test('should drop HTML-style tags and ASS override blocks', () => {
    expect(stripMarkup('<i>Hi</i> <font color="red">there</font>{\\an8}')).toBe('Hi there');
  });
});

describe('validateSrt', () => {
  test('should accept a well-formed file', () => {
    expect(validateSrt(SAMPLE_SRT)).toEqual({ valid: true, errors: [] });
  });

  test('should report empty content', () => {
    expect(validateSrt('  \n')).toEqual({ valid: false, errors: ['SRT content is empty'] });
  });

  test('should report a cue without text', () => {
    expect(validateSrt('1\n00:00:01,000 --> 00:00:02,000\n')).toEqual({
      valid: false,
      errors: ['Entry 1: Missing subtitle text'],
    });
  });

  test('should report an end time before the start', () => {
    expect(validateSrt('1\n00:00:05,000 --> 00:00:02,000\nHi\n').errors).toEqual([
      'Entry 1: End time (00:00:02,000) must be after start time (00:00:05,000)',
    ]);
  });

  test('should report out-of-sequence indexes', () => {
    expect(validateSrt('2\n00:00:01,000 --> 00:00:02,000\nHi\n').errors).toEqual(['Line 1: Expected index 1, got 2']);
  });

  test('should flag dot separators until they are fixed', () => {
    const dotted = '1\n00:00:01.000 --> 00:00:02.000\nHi\n';
    expect(validateSrt(dotted).errors).toEqual([
      "Entry 1: Invalid start timestamp '00:00:01.000'",
      "Entry 1: Invalid end timestamp '00:00:02.000'",
    ]);
    expect(validateSrt(fixCommonIssues(dotted)).valid).toBe(true);
  });
});

describe('sanitizeSrtText', () => {
  test('should normalise line endings, drop the BOM and fix separators', () => {
    expect(sanitizeSrtText('\uFEFF1\r\n00:00:01.000 --> 00:00:02.500\r\nHello\r\n\r\n')).toBe(
      '1\n00:00:01,000 --> 00:00:02,500\nHello\n'
    );
  });

  test('should leave dots in subtitle text alone', () => {
    expect(fixCommonIssues('1\n00:00:01,000 --> 00:00:02,000\nAt 10:00:00.500 sharp')).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nAt 10:00:00.500 sharp'
    );
  });

  test('should return an empty string for blank input', () => {
    expect(sanitizeSrtText('   ')).toBe('');
  });
});
