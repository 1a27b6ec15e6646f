import { Pool } from 'pg';
import type { VideoFiltersOptions } from './filters/videoFilters';
import type { SubtitleSettingsInput } from './filters/subtitleStyle';
import type { LoudnessMeasurement } from './loudness';
import { JobStatus, sourceStatesFor } from './stateMachine';

export { JobStatus };

/**
 * Everything a render needs, as accepted at submission. Stored with the job.
 */
export interface RenderRequest {
  clipId: string;
  presetName: string;
  videoPath: string;
  audioPath?: string;
  srtPath?: string;
  /** Inline SRT text; written into the job's temp dir before encoding. */
  srtContent?: string;
  filters: VideoFiltersOptions;
  subtitleSettings?: SubtitleSettingsInput;
}

export type EncoderName = 'libx264' | 'h264_nvenc';

export interface RenderResult {
  outputPath: string;
  preset: string;
  encoder: EncoderName;
  filterChain: string[];
  fileSizeBytes: number;
  loudness?: LoudnessMeasurement;
}

export interface RenderJobData {
  request: RenderRequest;
  result?: RenderResult;
}

export interface RenderJob {
  jobId: string;
  jobType: 'render';
  status: JobStatus;
  progress: number;
  data: RenderJobData;
  errorMessage: string | null;
  profileId: string;
  clipId: string;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface NewRenderJob {
  jobId: string;
  profileId: string;
  request: RenderRequest;
}

export interface TransitionPatch {
  errorMessage?: string;
  result?: RenderResult;
  progress?: number;
}

export interface JobRepository {
  init(): Promise<void>;
  create(job: NewRenderJob): Promise<RenderJob>;
  get(jobId: string): Promise<RenderJob | null>;
  /**
   * Moves a job to `to` only if its current status is a legal source state.
   * Resolves to null when the job is missing or the move is not allowed.
   */
  transition(jobId: string, to: JobStatus, patch?: TransitionPatch): Promise<RenderJob | null>;
  /** Ignored unless the job is processing. */
  updateProgress(jobId: string, progress: number): Promise<void>;
  findActiveForClip(clipId: string): Promise<RenderJob | null>;
  close(): Promise<void>;
}

const ACTIVE_STATUSES: readonly JobStatus[] = [JobStatus.PENDING, JobStatus.PROCESSING];

interface JobRow {
  job_id: string;
  job_type: 'render';
  status: JobStatus;
  progress: number;
  data: RenderJobData;
  error_message: string | null;
  profile_id: string;
  clip_id: string;
  created_at: Date;
  updated_at: Date | null;
}

function fromRow(row: JobRow): RenderJob {
  return {
    jobId: row.job_id,
    jobType: row.job_type,
    status: row.status,
    progress: row.progress,
    data: row.data,
    errorMessage: row.error_message,
    profileId: row.profile_id,
    clipId: row.clip_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgJobRepository implements JobRepository {
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString });
  }

  async init(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS jobs (
          job_id VARCHAR(36) PRIMARY KEY,
          job_type VARCHAR(20) NOT NULL DEFAULT 'render',
          status VARCHAR(20) NOT NULL DEFAULT 'pending',
          progress INTEGER NOT NULL DEFAULT 0,
          data JSONB NOT NULL DEFAULT '{}'::jsonb,
          error_message TEXT,
          profile_id VARCHAR(64) NOT NULL,
          clip_id VARCHAR(128) NOT NULL,
          created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
          updated_at TIMESTAMP
        );

        CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
        CREATE INDEX IF NOT EXISTS idx_jobs_clip_status ON jobs(clip_id, status);
        CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at);
      `);
    } finally {
      client.release();
    }
  }

  async create({ jobId, profileId, request }: NewRenderJob): Promise<RenderJob> {
    const data: RenderJobData = { request };
    const result = await this.pool.query<JobRow>(
      `INSERT INTO jobs (job_id, job_type, status, progress, data, profile_id, clip_id)
       VALUES ($1, 'render', $2, 0, $3, $4, $5)
       RETURNING *`,
      [jobId, JobStatus.PENDING, JSON.stringify(data), profileId, request.clipId]
    );
    return fromRow(result.rows[0]);
  }

  async get(jobId: string): Promise<RenderJob | null> {
    const result = await this.pool.query<JobRow>('SELECT * FROM jobs WHERE job_id = $1', [jobId]);
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }

  async transition(jobId: string, to: JobStatus, patch: TransitionPatch = {}): Promise<RenderJob | null> {
    const resultPatch = patch.result ? JSON.stringify({ result: patch.result }) : '{}';
    const result = await this.pool.query<JobRow>(
      `UPDATE jobs
       SET status = $1,
           error_message = COALESCE($2, error_message),
           progress = COALESCE($3, progress),
           data = data || $4::jsonb,
           updated_at = CURRENT_TIMESTAMP
       WHERE job_id = $5 AND status = ANY($6)
       RETURNING *`,
      [to, patch.errorMessage ?? null, patch.progress ?? null, resultPatch, jobId, sourceStatesFor(to)]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }

  async updateProgress(jobId: string, progress: number): Promise<void> {
    await this.pool.query(
      'UPDATE jobs SET progress = $1, updated_at = CURRENT_TIMESTAMP WHERE job_id = $2 AND status = $3 AND progress < $1',
      [progress, jobId, JobStatus.PROCESSING]
    );
  }

  async findActiveForClip(clipId: string): Promise<RenderJob | null> {
    const result = await this.pool.query<JobRow>(
      'SELECT * FROM jobs WHERE clip_id = $1 AND status = ANY($2) ORDER BY created_at DESC LIMIT 1',
      [clipId, ACTIVE_STATUSES]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Process-local repository for development and tests. Jobs do not survive a
 * restart.
 */
export class MemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, RenderJob>();

  async init(): Promise<void> {}

  async create({ jobId, profileId, request }: NewRenderJob): Promise<RenderJob> {
    const job: RenderJob = {
      jobId,
      jobType: 'render',
      status: JobStatus.PENDING,
      progress: 0,
      data: { request },
      errorMessage: null,
      profileId,
      clipId: request.clipId,
      createdAt: new Date(),
      updatedAt: null,
    };
    this.jobs.set(jobId, job);
    return structuredClone(job);
  }

  async get(jobId: string): Promise<RenderJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async transition(jobId: string, to: JobStatus, patch: TransitionPatch = {}): Promise<RenderJob | null> {
    const job = this.jobs.get(jobId);
    if (!job || !sourceStatesFor(to).includes(job.status)) return null;

    job.status = to;
    job.errorMessage = patch.errorMessage ?? job.errorMessage;
    job.progress = patch.progress ?? job.progress;
    if (patch.result) job.data = { ...job.data, result: patch.result };
    job.updatedAt = new Date();
    return structuredClone(job);
  }

  async updateProgress(jobId: string, progress: number): Promise<void> {
    const job = this.jobs.get(jobId);
    if (job && job.status === JobStatus.PROCESSING && progress > job.progress) {
      job.progress = progress;
      job.updatedAt = new Date();
    }
  }

  async findActiveForClip(clipId: string): Promise<RenderJob | null> {
    for (const job of this.jobs.values()) {
      if (job.clipId === clipId && ACTIVE_STATUSES.includes(job.status)) {
        return structuredClone(job);
      }
    }
    return null;
  }

  async close(): Promise<void> {
    this.jobs.clear();
  }
}

export function createJobRepository(databaseUrl: string): JobRepository {
  return databaseUrl ? new PgJobRepository(databaseUrl) : new MemoryJobRepository();
}
