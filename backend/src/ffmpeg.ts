import { spawn } from 'child_process';
import { createLogger } from './logger';

const log = createLogger({ module: 'ffmpeg' });

// stderr beyond this is dropped; the head is what explains a failure
const MAX_CAPTURE_CHARS = 1024 * 1024;

export interface RunOptions {
  /** Aborting kills the process with SIGKILL. */
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Called with the encoder's output position in seconds. */
  onProgress?: (outTimeSeconds: number) => void;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  aborted: boolean;
  /** Set when the binary could not be started at all. */
  spawnError?: string;
}

/**
 * The two external binaries the pipeline needs. Tests swap in a fake.
 */
export interface MediaToolkit {
  ffmpeg(args: string[], options?: RunOptions): Promise<ProcessResult>;
  probeDuration(filePath: string): Promise<number | null>;
}

/**
 * Reads the last output position from an FFmpeg `-progress` block.
 * `out_time_us`/`out_time_ms` are both microseconds; `out_time` is HH:MM:SS.micro.
 */
export function parseProgressTime(chunk: string): number | null {
  const micro = [...chunk.matchAll(/out_time_(?:us|ms)=(\d+)/g)].pop();
  if (micro) {
    return parseInt(micro[1], 10) / 1_000_000;
  }
  const clock = [...chunk.matchAll(/out_time=(\d+):(\d+):(\d+(?:\.\d+)?)/g)].pop();
  if (clock) {
    return parseInt(clock[1], 10) * 3600 + parseInt(clock[2], 10) * 60 + parseFloat(clock[3]);
  }
  return null;
}

/**
 * Feeds `-progress` output to `onProgress` one complete line at a time. A
 * chunk can end mid-line, so the tail after the last newline waits for the
 * next chunk.
 */
export function createProgressReader(onProgress: (outTimeSeconds: number) => void): (chunk: string) => void {
  let pending = '';
  return chunk => {
    const text = pending + chunk;
    const lastNewline = text.lastIndexOf('\n');
    if (lastNewline === -1) {
      pending = text;
      return;
    }
    pending = text.slice(lastNewline + 1);
    const seconds = parseProgressTime(text.slice(0, lastNewline + 1));
    if (seconds !== null) onProgress(seconds);
  };
}

function append(buffer: string, chunk: string): string {
  return buffer.length >= MAX_CAPTURE_CHARS ? buffer : (buffer + chunk).slice(0, MAX_CAPTURE_CHARS);
}

export function runProcess(binary: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
  return new Promise(resolve => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    log.debug({ binary, args }, 'Spawning process');
    const child = spawn(binary, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
    });

    const readProgress = options.onProgress ? createProgressReader(options.onProgress) : null;

    child.stdout.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stdout = append(stdout, text);
      readProgress?.(text);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr = append(stderr, chunk.toString());
    });

    child.on('error', error => {
      if (error.name === 'AbortError') {
        // 'close' still follows and reports the exit
        return;
      }
      log.error({ err: error, binary }, 'Failed to start process');
      finish({ exitCode: null, stdout, stderr, aborted: false, spawnError: error.message });
    });

    child.on('close', code => {
      finish({ exitCode: code, stdout, stderr, aborted: options.signal?.aborted ?? false });
    });
  });
}

export class FfmpegToolkit implements MediaToolkit {
  constructor(
    private readonly ffmpegPath: string = 'ffmpeg',
    private readonly ffprobePath: string = 'ffprobe'
  ) {}

  ffmpeg(args: string[], options?: RunOptions): Promise<ProcessResult> {
    return runProcess(this.ffmpegPath, args, options);
  }

  async probeDuration(filePath: string): Promise<number | null> {
    const result = await runProcess(this.ffprobePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ]);
    const duration = parseFloat(result.stdout.trim());
    if (result.exitCode !== 0 || !Number.isFinite(duration) || duration <= 0) {
      log.warn({ filePath, exitCode: result.exitCode }, 'ffprobe could not read duration');
      return null;
    }
    return duration;
  }
}
