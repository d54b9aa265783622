/**
 * File-backed Job Queue
 *
 * The JSON document on disk is the queue, so an API process and separate
 * worker processes can share it. Every operation re-reads the file under a
 * lock file; idle consumers poll it. A delivered job that is not settled
 * within the visibility timeout is handed out again, which covers consumers
 * that died holding it.
 */

import { v4 as uuidv4 } from 'uuid';
import { InternalError } from '../core/errors.js';
import type { JobQueue, QueueJob } from './JobQueue.js';
import {
  WriteChain,
  loadFromFile,
  saveToFile,
  withFileLock,
  type FileLockOptions,
} from '../store/persistence.js';

export interface FileJobQueueOptions {
  /** How often an idle consumer re-reads the file */
  pollIntervalMs?: number;
  /** A delivered job still unsettled after this long is redelivered */
  visibilityTimeoutMs?: number;
  lock?: FileLockOptions;
}

const DEFAULT_POLL_INTERVAL_MS = 250;
const DEFAULT_VISIBILITY_TIMEOUT_MS = 5 * 60 * 1000;

interface StoredJob extends QueueJob {
  state: 'ready' | 'delivered';
  deliveredAt: string | null;
  /** Queue instance holding the delivery */
  consumer: string | null;
}

interface QueueDocument {
  version: 1;
  jobs: StoredJob[];
}

function isStoredJob(value: unknown): value is StoredJob {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === 'string' &&
    typeof record.taskId === 'string' &&
    typeof record.deliveries === 'number' &&
    typeof record.enqueuedAt === 'string' &&
    (record.state === 'ready' || record.state === 'delivered') &&
    (record.deliveredAt === null || typeof record.deliveredAt === 'string') &&
    (record.consumer === null || typeof record.consumer === 'string')
  );
}

function parseDocument(raw: unknown, filePath: string): StoredJob[] {
  if (raw === null) return [];
  if (typeof raw !== 'object' || !('jobs' in raw) || !Array.isArray(raw.jobs)) {
    throw new InternalError(`Queue file ${filePath} is malformed`);
  }
  const jobs: unknown[] = raw.jobs;
  if (!jobs.every(isStoredJob)) {
    throw new InternalError(`Queue file ${filePath} contains malformed jobs`);
  }
  return jobs;
}

const toQueueJob = ({ id, taskId, deliveries, enqueuedAt }: StoredJob): QueueJob => ({
  id,
  taskId,
  deliveries,
  enqueuedAt,
});

export class FileJobQueue implements JobQueue {
  private readonly mutations = new WriteChain();
  private readonly consumer = uuidv4();
  private readonly pollIntervalMs: number;
  private readonly visibilityTimeoutMs: number;
  private readonly lockOptions: FileLockOptions;
  private readonly sleepers = new Set<() => void>();
  private closed = false;

  private constructor(
    private readonly filePath: string,
    options: FileJobQueueOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.lockOptions = options.lock ?? {};
  }

  static async open(filePath: string, options: FileJobQueueOptions = {}): Promise<FileJobQueue> {
    const queue = new FileJobQueue(filePath, options);
    await queue.read();
    return queue;
  }

  async enqueue(taskId: string): Promise<QueueJob> {
    if (this.closed) {
      throw new Error('Queue is closed');
    }

    const job: StoredJob = {
      id: uuidv4(),
      taskId,
      deliveries: 0,
      enqueuedAt: new Date().toISOString(),
      state: 'ready',
      deliveredAt: null,
      consumer: null,
    };
    await this.mutate((jobs) => {
      jobs.push(job);
      return job;
    });
    this.wake();
    return toQueueJob(job);
  }

  async dequeue(signal?: AbortSignal): Promise<QueueJob | null> {
    while (!this.closed && !signal?.aborted) {
      const job = await this.claimNext();
      if (job) return job;
      await this.idle(signal);
    }
    return null;
  }

  async ack(jobId: string): Promise<void> {
    await this.mutate((jobs) => {
      const index = jobs.findIndex((job) => job.id === jobId);
      if (index === -1) return null;
      return jobs.splice(index, 1);
    });
  }

  async nack(jobId: string): Promise<void> {
    const returned = await this.mutate((jobs) => {
      const index = jobs.findIndex((job) => job.id === jobId && job.state === 'delivered');
      if (index === -1) return null;

      const [job] = jobs.splice(index, 1);
      jobs.push({ ...job, state: 'ready', deliveredAt: null, consumer: null });
      return job;
    });
    if (returned) this.wake();
  }

  async size(): Promise<number> {
    return (await this.read()).filter((job) => job.state === 'ready').length;
  }

  async ping(): Promise<boolean> {
    if (this.closed) return false;
    await this.read();
    return true;
  }

  /**
   * Stop consuming and hand this instance's unsettled deliveries back
   */
  async close(): Promise<void> {
    this.closed = true;
    this.wake();

    await this.mutate((jobs) => {
      const held = jobs.filter((job) => job.state === 'delivered' && job.consumer === this.consumer);
      for (const job of held) {
        job.state = 'ready';
        job.deliveredAt = null;
        job.consumer = null;
      }
      return held.length > 0 ? held : null;
    });
  }

  private async read(): Promise<StoredJob[]> {
    return parseDocument(await loadFromFile(this.filePath), this.filePath);
  }

  private claimNext(): Promise<QueueJob | null> {
    return this.mutate((jobs) => {
      const now = Date.now();
      const job = jobs.find((candidate) => this.isDeliverable(candidate, now));
      if (!job) return null;

      job.state = 'delivered';
      job.deliveries += 1;
      job.deliveredAt = new Date(now).toISOString();
      job.consumer = this.consumer;
      return toQueueJob(job);
    });
  }

  private isDeliverable(job: StoredJob, now: number): boolean {
    if (job.state === 'ready') return true;
    return job.deliveredAt !== null && now - Date.parse(job.deliveredAt) >= this.visibilityTimeoutMs;
  }

  /**
   * Apply `change` to the current document and write it back when it
   * returns non-null
   */
  private mutate<T>(change: (jobs: StoredJob[]) => T | null): Promise<T | null> {
    return this.mutations.run(() =>
      withFileLock(
        this.filePath,
        async () => {
          const jobs = await this.read();
          const result = change(jobs);
          if (result !== null) {
            const document: QueueDocument = { version: 1, jobs };
            await saveToFile(this.filePath, document);
          }
          return result;
        },
        this.lockOptions
      )
    );
  }

  /**
   * Wait for the next poll, a local enqueue or nack, close, or abort
   */
  private idle(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        this.sleepers.delete(done);
        resolve();
      };
      const timer = setTimeout(done, this.pollIntervalMs);
      signal?.addEventListener('abort', done, { once: true });
      this.sleepers.add(done);
    });
  }

  private wake(): void {
    for (const sleeper of [...this.sleepers]) {
      sleeper();
    }
  }
}
