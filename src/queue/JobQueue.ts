/**
 * Job Queue
 * Asynchronous channel between the orchestrator and the executor.
 * Jobs carry nothing but a task id; delivery is at-least-once.
 */

import { v4 as uuidv4 } from 'uuid';

export interface QueueJob {
  id: string;
  taskId: string;
  /** Number of times the job has been handed to a consumer */
  deliveries: number;
  enqueuedAt: string;
}

export interface JobQueue {
  enqueue(taskId: string): Promise<QueueJob>;

  /**
   * Wait for the next job. Resolves null once the queue is closed
   * or `signal` aborts.
   */
  dequeue(signal?: AbortSignal): Promise<QueueJob | null>;

  /** Settle a delivered job */
  ack(jobId: string): Promise<void>;

  /** Return a delivered job to the queue for redelivery */
  nack(jobId: string): Promise<void>;

  /** Jobs waiting for delivery */
  size(): Promise<number>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}

type Waiter = (job: QueueJob | null) => void;

/**
 * In-process queue; nothing outlives the process
 */
export class MemoryJobQueue implements JobQueue {
  private ready: QueueJob[] = [];
  private inFlight = new Map<string, QueueJob>();
  private waiters: Waiter[] = [];
  private closed = false;

  async enqueue(taskId: string): Promise<QueueJob> {
    if (this.closed) {
      throw new Error('Queue is closed');
    }

    const job: QueueJob = {
      id: uuidv4(),
      taskId,
      deliveries: 0,
      enqueuedAt: new Date().toISOString(),
    };
    this.ready.push(job);
    this.dispatch();
    return { ...job };
  }

  dequeue(signal?: AbortSignal): Promise<QueueJob | null> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    const job = this.take();
    if (job) {
      return Promise.resolve(job);
    }

    return new Promise<QueueJob | null>((resolve) => {
      const waiter: Waiter = (delivered) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(delivered);
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async ack(jobId: string): Promise<void> {
    this.inFlight.delete(jobId);
  }

  async nack(jobId: string): Promise<void> {
    const job = this.inFlight.get(jobId);
    if (!job) return;

    this.inFlight.delete(jobId);
    this.ready.push(job);
    this.dispatch();
  }

  async size(): Promise<number> {
    return this.ready.length;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }

  private take(): QueueJob | null {
    const job = this.ready.shift();
    if (!job) return null;

    job.deliveries += 1;
    this.inFlight.set(job.id, job);
    return { ...job };
  }

  /**
   * Hand ready jobs to parked consumers
   */
  private dispatch(): void {
    while (this.waiters.length > 0 && this.ready.length > 0) {
      const waiter = this.waiters.shift();
      const job = this.take();
      if (waiter && job) {
        waiter(job);
      }
    }
  }
}
