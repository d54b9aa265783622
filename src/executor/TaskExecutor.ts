/**
 * Task Executor
 *
 * A fixed number of workers consume the job queue and hand each task to
 * the runner. The worker count is the backpressure: at most `concurrency`
 * jobs are held at once. A reaper fails tasks left in `processing` by a
 * worker that died.
 */

import { getErrorMessage } from '../core/errors.js';
import { sleep } from '../core/retry.js';
import type { JobQueue, QueueJob } from '../queue/index.js';
import type { TaskStore } from '../store/index.js';
import type { TaskRunner } from '../tasks/TaskRunner.js';
import { logger } from '../services/Logger.js';

export interface TaskExecutorOptions {
  concurrency: number;
  /** Processing tasks whose updated_at is older than this are failed as stale */
  staleAfterMs: number;
  reapIntervalMs: number;
  /** Deliveries after which a job that keeps crashing the worker is dropped */
  maxDeliveries?: number;
  /** Pause after a queue error before dequeuing again */
  errorBackoffMs?: number;
}

export interface TaskExecutorDeps {
  store: TaskStore;
  queue: JobQueue;
  runner: TaskRunner;
}

const DEFAULT_MAX_DELIVERIES = 5;
const DEFAULT_ERROR_BACKOFF_MS = 1000;
const REAP_BATCH_SIZE = 100;

export class TaskExecutor {
  private readonly store: TaskStore;
  private readonly queue: JobQueue;
  private readonly runner: TaskRunner;
  private workers: Promise<void>[] = [];
  private stopping: AbortController | null = null;
  private reapTimer: ReturnType<typeof setInterval> | null = null;
  private reaping: Promise<void> = Promise.resolve();

  constructor(deps: TaskExecutorDeps, private readonly options: TaskExecutorOptions) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.runner = deps.runner;
  }

  isRunning(): boolean {
    return this.stopping !== null;
  }

  start(): void {
    if (this.stopping) return;

    const stopping = new AbortController();
    this.stopping = stopping;
    this.workers = Array.from({ length: this.options.concurrency }, (_, index) =>
      this.workerLoop(index + 1, stopping.signal)
    );

    this.reapTimer = setInterval(() => {
      this.reaping = this.reap()
        .then((count) => {
          if (count > 0) logger.warn(`[Executor] Reaped ${count} stale task(s)`);
        })
        .catch((error: unknown) => {
          logger.error(`[Executor] Reaper failed: ${getErrorMessage(error)}`);
        });
    }, this.options.reapIntervalMs);
    this.reapTimer.unref();

    logger.info(`[Executor] Started ${this.options.concurrency} worker(s)`);
  }

  /**
   * Stop dequeuing and wait for in-flight jobs to settle
   */
  async stop(): Promise<void> {
    if (!this.stopping) return;

    this.stopping.abort();
    if (this.reapTimer) {
      clearInterval(this.reapTimer);
      this.reapTimer = null;
    }

    await Promise.all(this.workers);
    await this.reaping;
    this.workers = [];
    this.stopping = null;
    logger.info('[Executor] Stopped');
  }

  /**
   * Settle one job. Jobs for missing or no-longer-pending tasks are
   * acknowledged without running anything, so duplicates are no-ops.
   */
  async processJob(job: QueueJob): Promise<void> {
    try {
      const task = await this.store.get(job.taskId);
      if (!task) {
        logger.warn(`[Executor] Task ${job.taskId} not found; dropping job ${job.id}`);
        await this.queue.ack(job.id);
        return;
      }
      if (task.status !== 'pending') {
        logger.debug(`[Executor] Task ${task.id} is ${task.status}; skipping job ${job.id}`);
        await this.queue.ack(job.id);
        return;
      }

      const { outcome } = await this.runner.run(task.id);
      logger.debug(`[Executor] Job ${job.id} settled: ${outcome}`);
      await this.queue.ack(job.id);
    } catch (error) {
      await this.handleJobError(job, error);
    }
  }

  /**
   * Fail processing tasks that have not moved for longer than `staleAfterMs`
   */
  async reap(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.options.staleAfterMs).toISOString();
    let reaped = 0;

    for (;;) {
      const { items } = await this.store.list(
        { status: 'processing', updatedBefore: cutoff },
        { page: 1, pageSize: REAP_BATCH_SIZE }
      );
      if (items.length === 0) break;

      let progressed = false;
      for (const task of items) {
        const failed = await this.store.transition(task.id, ['processing'], {
          status: 'failed',
          error: {
            category: 'stale',
            message: `Task exceeded ${this.options.staleAfterMs}ms in processing`,
            retryable: false,
            attempts: task.attempts,
          },
        });
        if (failed) {
          reaped++;
          progressed = true;
          logger.taskFailed(task.id, 'stale', 'no progress within the time limit');
        }
      }
      if (!progressed) break;
    }

    return reaped;
  }

  private async workerLoop(worker: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: QueueJob | null;
      try {
        job = await this.queue.dequeue(signal);
      } catch (error) {
        logger.error(`[Executor] Worker ${worker} could not dequeue: ${getErrorMessage(error)}`);
        await sleep(this.options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS);
        continue;
      }
      if (!job) break;

      await this.processJob(job);
    }
  }

  private async handleJobError(job: QueueJob, error: unknown): Promise<void> {
    const maxDeliveries = this.options.maxDeliveries ?? DEFAULT_MAX_DELIVERIES;
    const message = getErrorMessage(error);

    try {
      if (job.deliveries >= maxDeliveries) {
        logger.error(`[Executor] Job ${job.id} failed ${job.deliveries} time(s); dropping: ${message}`);
        await this.queue.ack(job.id);
      } else {
        logger.error(`[Executor] Job ${job.id} failed; requeueing: ${message}`);
        await this.queue.nack(job.id);
      }
    } catch (settleError) {
      logger.error(`[Executor] Could not settle job ${job.id}: ${getErrorMessage(settleError)}`);
    }
  }
}
