/**
 * Task Runner
 *
 * Provider invocation shared by the synchronous request path and the
 * executor workers: claim, bounded concurrency, per-attempt timeout,
 * retry of transient failures, classification and persistence.
 */

import type { RetryConfig, Task, TaskError, UnifiedResponse } from '../types/index.js';
import {
  PoolExhaustedError,
  PoolTimeoutError,
  ProviderError,
  TimeoutError,
  getErrorCodeSafe,
  getErrorMessage,
} from '../core/errors.js';
import { RETRYABLE_ERROR_CODES, withRetry, withTimeout } from '../core/retry.js';
import { InvocationPool, type PoolStatus } from '../core/pool.js';
import type { BaseProvider, ProviderRegistry } from '../providers/index.js';
import type { TaskStore } from '../store/index.js';
import { logger } from '../services/Logger.js';
import { CancellationRegistry, TaskCancelledError } from './CancellationRegistry.js';

export interface TaskRunnerOptions {
  /** Per-attempt timeout used when the provider configures none */
  timeoutMs: number;
  /** Upper bound on concurrent provider calls from this process */
  concurrency: number;
  retry?: RetryConfig;
}

/**
 * `skipped`: the task could not be claimed (already taken, cancelled or gone)
 */
export type RunOutcome = 'completed' | 'failed' | 'cancelled' | 'skipped';

export interface RunResult {
  outcome: RunOutcome;
  task: Task | null;
}

/**
 * Map an execution failure onto the task error record
 */
export function classifyFailure(error: unknown, attempts: number): TaskError {
  const message = getErrorMessage(error);

  if (error instanceof ProviderError) {
    return { category: error.category, message, retryable: error.retryable, attempts };
  }
  if (error instanceof PoolTimeoutError || error instanceof PoolExhaustedError) {
    return { category: 'capacity', message, retryable: error.retryable, attempts };
  }
  if (error instanceof TimeoutError) {
    return { category: 'timeout', message, retryable: true, attempts };
  }
  const code = getErrorCodeSafe(error);
  if (code !== undefined && RETRYABLE_ERROR_CODES.includes(code)) {
    return { category: 'network', message, retryable: true, attempts };
  }
  return { category: 'internal', message, retryable: false, attempts };
}

export class TaskRunner {
  private readonly pool: InvocationPool;

  constructor(
    private readonly store: TaskStore,
    private readonly providers: ProviderRegistry,
    private readonly cancellations: CancellationRegistry,
    private readonly options: TaskRunnerOptions
  ) {
    this.pool = new InvocationPool({
      maxConcurrent: options.concurrency,
      acquireTimeoutMs: options.timeoutMs,
    });
  }

  /**
   * Claim a pending task and execute it to a terminal state
   */
  async run(taskId: string): Promise<RunResult> {
    const task = await this.store.transition(taskId, ['pending'], { status: 'processing' });
    if (!task) {
      return { outcome: 'skipped', task: await this.store.get(taskId) };
    }

    const startedAt = Date.now();
    let attempts = 0;

    try {
      const provider = this.providers.require(task.provider);

      const response = await withRetry(
        async (attempt) => {
          // Checkpoint between attempts
          if (attempt > 0 && (await this.isCancelled(taskId))) {
            throw new TaskCancelledError(taskId);
          }
          // Only calls that reach the provider count as attempts
          return this.pool.execute(() => {
            attempts += 1;
            logger.taskStarted(taskId, attempts);
            return this.attempt(task, provider);
          });
        },
        {
          ...this.options.retry,
          onRetry: ({ attempt, maxRetries, delay, error }) => {
            logger.taskRetry(taskId, attempt, maxRetries, delay, error.message);
          },
        }
      );

      // Checkpoint after the call returns
      if (await this.isCancelled(taskId)) {
        throw new TaskCancelledError(taskId);
      }

      const completed = await this.store.transition(taskId, ['processing'], {
        status: 'completed',
        result: response,
        attempts,
      });
      if (!completed) {
        return this.lostRace(taskId);
      }

      logger.taskCompleted(taskId, Date.now() - startedAt);
      return { outcome: 'completed', task: completed };
    } catch (error) {
      if (error instanceof TaskCancelledError) {
        logger.taskCancelled(taskId);
        return { outcome: 'cancelled', task: await this.store.get(taskId) };
      }

      const failure = classifyFailure(error, attempts);
      const failed = await this.store.transition(taskId, ['processing'], {
        status: 'failed',
        error: failure,
        attempts,
      });
      if (!failed) {
        return this.lostRace(taskId);
      }

      logger.taskFailed(taskId, failure.category, failure.message);
      return { outcome: 'failed', task: failed };
    }
  }

  getPoolStatus(): PoolStatus {
    return this.pool.getStatus();
  }

  /**
   * One provider call under the per-attempt timeout
   */
  private async attempt(task: Task, provider: BaseProvider): Promise<UnifiedResponse> {
    const timeoutMs = provider.getTimeoutMs() ?? this.options.timeoutMs;
    const controller = this.cancellations.register(task.id);

    try {
      return await withTimeout(
        () => provider.complete(task.model, task.parameters, { signal: controller.signal }),
        timeoutMs,
        `Provider ${task.provider} did not answer within ${timeoutMs}ms`,
        controller
      );
    } catch (error) {
      if (CancellationRegistry.wasCancelled(controller)) {
        throw new TaskCancelledError(task.id);
      }
      throw error;
    } finally {
      this.cancellations.release(task.id, controller);
    }
  }

  private async isCancelled(taskId: string): Promise<boolean> {
    const current = await this.store.get(taskId);
    return current === null || current.status === 'cancelled';
  }

  /**
   * The final conditional update found the task no longer processing;
   * whatever was produced is discarded.
   */
  private async lostRace(taskId: string): Promise<RunResult> {
    const current = await this.store.get(taskId);
    if (current?.status === 'cancelled') {
      logger.taskCancelled(taskId);
      return { outcome: 'cancelled', task: current };
    }
    return { outcome: 'skipped', task: current };
  }
}
