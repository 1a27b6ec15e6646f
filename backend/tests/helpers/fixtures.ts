import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { StorageLayout } from '../../src/storage';

export interface Workspace {
  root: string;
  layout: StorageLayout;
  videoPath: string;
  audioPath: string;
  write(name: string, content: string | Buffer): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<Workspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'clip-render-test-'));
  const write = async (name: string, content: string | Buffer) => {
    const filePath = path.join(root, 'sources', name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  };

  return {
    root,
    layout: { outputDir: path.join(root, 'outputs'), tempDir: path.join(root, 'temp') },
    videoPath: await write('clip.mp4', 'not really a video'),
    audioPath: await write('voice.wav', 'not really audio'),
    write,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export const SAMPLE_SRT = `1
00:00:01,000 --> 00:00:03,000
Short line

2
00:00:03,500 --> 00:00:06,000
<i>A second cue</i>
with two lines
`;
