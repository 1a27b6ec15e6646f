import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface AppConfig {
  port: number;
  host: string;
  // empty string means "use the in-memory job repository"
  databaseUrl: string;
  // empty string means "use the in-process render queue"
  redisUrl: string;
  outputDir: string;
  tempDir: string;
  ffmpegPath: string;
  ffprobePath: string;
  workerConcurrency: number;
  hardwareEncoder: boolean;
  maxUploadSize: number;
  logLevel: string;
  loudnessTimeoutMs: number;
}

export const config: AppConfig = {
  port: intFromEnv('PORT', 8000),
  host: process.env.HOST || '0.0.0.0',
  databaseUrl: process.env.DATABASE_URL || '',
  redisUrl: process.env.REDIS_URL || '',
  outputDir: process.env.OUTPUT_DIR || '/tmp/outputs',
  tempDir: process.env.TEMP_DIR || '/tmp/render-temp',
  ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
  ffprobePath: process.env.FFPROBE_PATH || 'ffprobe',
  workerConcurrency: intFromEnv('WORKER_CONCURRENCY', 2),
  hardwareEncoder: process.env.USE_HARDWARE_ENCODER === 'true',
  maxUploadSize: intFromEnv('MAX_UPLOAD_SIZE', 524288000),
  logLevel: process.env.LOG_LEVEL || 'info',
  loudnessTimeoutMs: intFromEnv('LOUDNESS_TIMEOUT_MS', 300000),
};
