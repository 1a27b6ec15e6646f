import { Queue, Worker } from 'bullmq';
import IORedis from 'ioredis';
import { createLogger } from './logger';
import { errorMessage } from './errors';

const log = createLogger({ module: 'queue' });

export const RENDER_QUEUE_NAME = 'render-jobs';

export type RenderHandler = (jobId: string) => Promise<void>;

export interface RenderJobPayload {
  jobId: string;
}

/**
 * Hand-off between submission and execution. `remove` only succeeds for work
 * no worker has picked up yet.
 */
export interface RenderQueue {
  start(handler: RenderHandler): void;
  enqueue(jobId: string): Promise<void>;
  remove(jobId: string): Promise<boolean>;
  close(): Promise<void>;
}

export class BullRenderQueue implements RenderQueue {
  private readonly connection: IORedis;
  private readonly queue: Queue<RenderJobPayload>;
  private worker: Worker<RenderJobPayload> | null = null;

  constructor(redisUrl: string, private readonly concurrency: number) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
    this.queue = new Queue<RenderJobPayload>(RENDER_QUEUE_NAME, { connection: this.connection });
  }

  start(handler: RenderHandler): void {
    const worker = new Worker<RenderJobPayload>(
      RENDER_QUEUE_NAME,
      async job => {
        await handler(job.data.jobId);
      },
      { connection: this.connection, concurrency: this.concurrency }
    );

    worker.on('completed', job => {
      log.info({ jobId: job.data.jobId }, 'Queue entry completed');
    });

    worker.on('failed', (job, err) => {
      log.error({ jobId: job?.data.jobId, err }, 'Queue entry failed');
    });

    this.worker = worker;
  }

  async enqueue(jobId: string): Promise<void> {
    // the render job id doubles as the queue id so cancel can find it
    await this.queue.add('render', { jobId }, { jobId, removeOnComplete: true, removeOnFail: 100 });
  }

  async remove(jobId: string): Promise<boolean> {
    const job = await this.queue.getJob(jobId);
    if (!job) return false;

    const state = await job.getState();
    if (state !== 'waiting' && state !== 'delayed' && state !== 'prioritized') {
      return false;
    }
    await job.remove();
    return true;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
    await this.connection.quit();
  }
}

/**
 * In-process FIFO with bounded concurrency, used when no Redis URL is set.
 */
export class LocalRenderQueue implements RenderQueue {
  private readonly waiting: string[] = [];
  private running = 0;
  private handler: RenderHandler | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {}

  start(handler: RenderHandler): void {
    this.handler = handler;
    this.drain();
  }

  async enqueue(jobId: string): Promise<void> {
    this.waiting.push(jobId);
    // hand off on the next tick so the caller returns first
    setImmediate(() => this.drain());
  }

  async remove(jobId: string): Promise<boolean> {
    const index = this.waiting.indexOf(jobId);
    if (index === -1) return false;
    this.waiting.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  get size(): number {
    return this.waiting.length;
  }

  /** Resolves once nothing is waiting or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.waiting.length = 0;
    this.handler = null;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.running === 0 && (this.waiting.length === 0 || this.handler === null);
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler) return;

    while (this.running < this.concurrency && this.waiting.length > 0) {
      const jobId = this.waiting.shift();
      if (jobId === undefined) break;
      this.running += 1;
      void handler(jobId)
        .catch(error => {
          log.error({ jobId, error: errorMessage(error) }, 'Render handler threw');
        })
        .finally(() => {
          this.running -= 1;
          this.drain();
          this.notifyIfIdle();
        });
    }
  }
}

export function createRenderQueue(redisUrl: string, concurrency: number): RenderQueue {
  return redisUrl ? new BullRenderQueue(redisUrl, concurrency) : new LocalRenderQueue(concurrency);
}
