import { promises as fs } from 'fs';
import path from 'path';
import { config } from './config';

/**
 * Where a job's files live. Outputs are exclusive to one job; the temp dir
 * holds intermediates and is removed once the job is terminal.
 */
export interface StorageLayout {
  outputDir: string;
  tempDir: string;
}

export const defaultLayout: StorageLayout = {
  outputDir: config.outputDir,
  tempDir: config.tempDir,
};

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

export function getOutputPath(layout: StorageLayout, jobId: string, clipId: string, presetName: string): string {
  return path.join(layout.outputDir, 'finals', jobId, `final_${safeSegment(clipId)}_${safeSegment(presetName)}.mp4`);
}

export async function createJobTempDir(layout: StorageLayout, jobId: string): Promise<string> {
  const dir = path.join(layout.tempDir, jobId);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function ensureOutputDir(outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function fileSize(filePath: string): Promise<number> {
  const stat = await fs.stat(filePath);
  return stat.size;
}

export async function writeSubtitleFile(tempDir: string, content: string): Promise<string> {
  const srtPath = path.join(tempDir, 'subtitles.srt');
  await fs.writeFile(srtPath, content, 'utf-8');
  return srtPath;
}

export async function cleanupJobTemp(layout: StorageLayout, jobId: string): Promise<void> {
  await fs.rm(path.join(layout.tempDir, jobId), { recursive: true, force: true });
}

/**
 * Removes a job's output along with its `finals/<jobId>` directory, which
 * holds nothing else.
 */
export async function removeJobOutput(outputPath: string): Promise<void> {
  await fs.rm(path.dirname(outputPath), { recursive: true, force: true });
}
