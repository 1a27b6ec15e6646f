/**
 * SubRip (.srt) helpers: a tolerant cue parser for measuring text, a strict
 * validator for reporting problems, and a fixer for the mistakes other tools
 * commonly write (dot millisecond separators, CRLF, byte order marks).
 */

export interface SubtitleCue {
  index: number;
  startSeconds: number;
  endSeconds: number;
  lines: string[];
}

export interface SrtValidationResult {
  valid: boolean;
  errors: string[];
}

const STRICT_TIMESTAMP = /^(\d{2}):(\d{2}):(\d{2}),(\d{3})$/;
const LOOSE_TIMESTAMP = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})$/;
const ARROW = /^(.+?)\s+-->\s+(\S+)/;
const MARKUP_TAG = /<\/?(?:i|b|u|s|font)(?:\s[^>]*)?>/gi;
const ASS_OVERRIDE = /\{\\[^}]*\}/g;

function normalizeNewlines(content: string): string {
  return content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

export function timestampToSeconds(timestamp: string): number {
  const match = LOOSE_TIMESTAMP.exec(timestamp.trim());
  if (!match) {
    throw new Error(`Invalid timestamp: ${timestamp}`);
  }
  const [, hh, mm, ss, ms] = match;
  return parseInt(hh, 10) * 3600 + parseInt(mm, 10) * 60 + parseInt(ss, 10) + parseInt(ms.padEnd(3, '0'), 10) / 1000;
}

/**
 * Removes inline styling (`<i>`, `<b>`, `<u>`, `<s>`, `<font …>`, `{\an8}`) so
 * only the rendered characters remain.
 */
export function stripMarkup(line: string): string {
  return line.replace(MARKUP_TAG, '').replace(ASS_OVERRIDE, '');
}

/**
 * Parses cues without rejecting the file for numbering or timing mistakes.
 * Blocks with no timing line are skipped.
 */
export function parseSrt(content: string): SubtitleCue[] {
  const cues: SubtitleCue[] = [];
  const blocks = normalizeNewlines(content).split(/\n[ \t]*\n/);

  for (const block of blocks) {
    const lines = block.split('\n').filter(line => line.trim() !== '');
    const timingAt = lines.findIndex(line => ARROW.test(line.trim()));
    if (timingAt === -1) continue;

    const arrow = ARROW.exec(lines[timingAt].trim());
    if (!arrow) continue;

    let startSeconds: number;
    let endSeconds: number;
    try {
      startSeconds = timestampToSeconds(arrow[1]);
      endSeconds = timestampToSeconds(arrow[2]);
    } catch {
      continue;
    }

    const indexLine = timingAt > 0 ? lines[timingAt - 1].trim() : '';
    cues.push({
      index: /^\d+$/.test(indexLine) ? parseInt(indexLine, 10) : cues.length + 1,
      startSeconds,
      endSeconds,
      lines: lines.slice(timingAt + 1),
    });
  }

  return cues;
}

function isValidStrictTimestamp(timestamp: string): boolean {
  const match = STRICT_TIMESTAMP.exec(timestamp.trim());
  if (!match) return false;
  return parseInt(match[2], 10) < 60 && parseInt(match[3], 10) < 60;
}

export function validateSrt(content: string): SrtValidationResult {
  if (!content || !content.trim()) {
    return { valid: false, errors: ['SRT content is empty'] };
  }

  const errors: string[] = [];
  const lines = normalizeNewlines(content).trim().split('\n');
  let i = 0;
  let expectedIndex = 1;
  let entries = 0;

  while (i < lines.length) {
    const line = lines[i].trim();
    if (!line) {
      i++;
      continue;
    }

    if (!/^\d+$/.test(line)) {
      errors.push(`Line ${i + 1}: Expected entry index (number), got '${line}'`);
      i++;
      continue;
    }

    const index = parseInt(line, 10);
    if (index !== expectedIndex) {
      errors.push(`Line ${i + 1}: Expected index ${expectedIndex}, got ${index}`);
    }
    i++;

    if (i >= lines.length) {
      errors.push(`Entry ${index}: Missing timestamp line`);
      break;
    }

    const timing = ARROW.exec(lines[i].trim());
    if (!timing) {
      errors.push(`Line ${i + 1}: Invalid timestamp format '${lines[i].trim()}'`);
      i++;
      continue;
    }

    const [, start, end] = timing;
    const startOk = isValidStrictTimestamp(start);
    const endOk = isValidStrictTimestamp(end);
    if (!startOk) errors.push(`Entry ${index}: Invalid start timestamp '${start.trim()}'`);
    if (!endOk) errors.push(`Entry ${index}: Invalid end timestamp '${end.trim()}'`);
    if (startOk && endOk && timestampToSeconds(end) <= timestampToSeconds(start)) {
      errors.push(`Entry ${index}: End time (${end.trim()}) must be after start time (${start.trim()})`);
    }
    i++;

    let textLines = 0;
    while (i < lines.length && lines[i].trim()) {
      textLines++;
      i++;
    }
    if (textLines === 0) {
      errors.push(`Entry ${index}: Missing subtitle text`);
    }

    entries++;
    expectedIndex++;
  }

  if (entries === 0) {
    errors.push('No valid SRT entries found');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Normalizes line endings and rewrites `00:00:01.500` timing separators to the
 * comma form libass expects.
 */
export function fixCommonIssues(content: string): string {
  return normalizeNewlines(content)
    .split('\n')
    .map(line => (line.includes('-->') ? line.replace(/(\d{2}:\d{2}:\d{2})\.(\d{3})/g, '$1,$2') : line))
    .join('\n');
}

export function sanitizeSrtText(content: string): string {
  const fixed = fixCommonIssues(content).trim();
  return fixed ? `${fixed}\n` : '';
}
