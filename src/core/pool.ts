/**
 * Model Relay - Invocation Pool
 * Bounds the number of provider calls in flight; callers beyond the bound
 * wait in arrival order until a slot frees up or their wait times out.
 */

import { PoolExhaustedError, PoolTimeoutError } from './errors.js';

export interface PoolOptions {
  maxConcurrent?: number;
  /** Callers allowed to wait for a slot */
  maxQueueSize?: number;
  /** Longest wait for a slot; 0 waits forever */
  acquireTimeoutMs?: number;
}

export interface PoolStatus {
  active: number;
  queued: number;
  maxConcurrent: number;
  maxQueueSize: number;
  completed: number;
  failed: number;
  timedOut: number;
  peakActive: number;
}

const DEFAULT_POOL_OPTIONS: Required<PoolOptions> = {
  maxConcurrent: 5,
  maxQueueSize: 100,
  acquireTimeoutMs: 30000,
};

interface Waiter {
  grant: () => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class InvocationPool {
  private readonly options: Required<PoolOptions>;
  private active = 0;
  private waiters: Waiter[] = [];
  private completed = 0;
  private failed = 0;
  private timedOut = 0;
  private peakActive = 0;

  constructor(options: PoolOptions = {}) {
    this.options = { ...DEFAULT_POOL_OPTIONS, ...options };
  }

  /**
   * Run `fn` once a slot is free. The slot is released however `fn` settles.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();

    try {
      const result = await fn();
      this.completed++;
      return result;
    } catch (error) {
      this.failed++;
      throw error;
    } finally {
      this.release();
    }
  }

  getStatus(): PoolStatus {
    return {
      active: this.active,
      queued: this.waiters.length,
      maxConcurrent: this.options.maxConcurrent,
      maxQueueSize: this.options.maxQueueSize,
      completed: this.completed,
      failed: this.failed,
      timedOut: this.timedOut,
      peakActive: this.peakActive,
    };
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.maxConcurrent) {
      this.occupy();
      return Promise.resolve();
    }

    if (this.waiters.length >= this.options.maxQueueSize) {
      return Promise.reject(
        new PoolExhaustedError(
          `Pool queue full (${this.waiters.length}/${this.options.maxQueueSize})`,
          this.waiters.length
        )
      );
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          this.occupy();
          resolve();
        },
        timer: null,
      };

      const { acquireTimeoutMs } = this.options;
      if (acquireTimeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
          this.timedOut++;
          reject(new PoolTimeoutError(`No pool slot freed up within ${acquireTimeoutMs}ms`, acquireTimeoutMs));
        }, acquireTimeoutMs);
      }

      this.waiters.push(waiter);
    });
  }

  private occupy(): void {
    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);
  }

  private release(): void {
    this.active--;
    this.waiters.shift()?.grant();
  }
}
