/**
 * Task Orchestrator
 *
 * Entry point for task operations: validates requests against the
 * provider registry, persists tasks, decides between inline and queued
 * execution, and serves status, result, cancellation and listing.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  Principal,
  Task,
  TaskFilter,
  TaskParameters,
  TaskStatus,
  TaskSummary,
} from '../types/index.js';
import { InternalError, InvalidStateError, NotFoundError, ValidationError, getErrorMessage } from '../core/errors.js';
import { TASK_LIST_LIMITS } from '../config/constants.js';
import type { ProviderRegistry } from '../providers/index.js';
import type { TaskStore } from '../store/index.js';
import type { JobQueue } from '../queue/index.js';
import { logger } from '../services/Logger.js';
import type { CancellationRegistry } from './CancellationRegistry.js';
import type { TaskRunner } from './TaskRunner.js';
import { isTerminal } from './stateMachine.js';
import { type TaskCreatedView, type TaskResultView, isVisibleTo, toResultView, toSummary } from './views.js';

export interface CreateTaskRequest {
  model: string;
  provider: string;
  parameters: TaskParameters;
  is_async: boolean;
}

export interface ListTasksFilters {
  status?: TaskStatus;
  model?: string;
  provider?: string;
}

export interface ListTasksPagination {
  page: number;
  page_size: number;
}

export interface TaskListView {
  items: TaskSummary[];
  total: number;
  page: number;
  page_size: number;
}

export interface TaskOrchestratorDeps {
  store: TaskStore;
  queue: JobQueue;
  providers: ProviderRegistry;
  runner: TaskRunner;
  cancellations: CancellationRegistry;
}

export class TaskOrchestrator {
  private readonly store: TaskStore;
  private readonly queue: JobQueue;
  private readonly providers: ProviderRegistry;
  private readonly runner: TaskRunner;
  private readonly cancellations: CancellationRegistry;

  constructor(deps: TaskOrchestratorDeps) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.providers = deps.providers;
    this.runner = deps.runner;
    this.cancellations = deps.cancellations;
  }

  /**
   * Validate and persist a task, then run it inline or enqueue it.
   * Returns the pending task (async) or the terminal task (sync).
   */
  async createTask(request: CreateTaskRequest, principal: Principal): Promise<Task> {
    const provider = this.providers.require(request.provider);
    provider.validateParameters(request.model, request.parameters);

    const now = new Date().toISOString();
    const task: Task = {
      id: uuidv4(),
      model: request.model,
      provider: request.provider,
      parameters: request.parameters,
      is_async: request.is_async,
      status: 'pending',
      created_at: now,
      updated_at: now,
      started_at: null,
      completed_at: null,
      result: null,
      error: null,
      owner: principal.id,
      tenant_id: principal.tenantId,
      attempts: 0,
    };

    await this.store.insert(task);
    logger.taskCreated(task.id, task.provider, task.model, task.is_async);

    if (task.is_async) {
      await this.enqueue(task);
      return task;
    }

    const { task: finished } = await this.runner.run(task.id);
    if (!finished) {
      throw new InternalError(`Task ${task.id} disappeared during execution`);
    }
    return finished;
  }

  async getTask(id: string, principal: Principal): Promise<Task> {
    const task = await this.store.get(id);
    if (!task || !isVisibleTo(task, principal)) {
      throw new NotFoundError(`Task ${id}`);
    }
    return task;
  }

  async getStatus(id: string, principal: Principal): Promise<TaskSummary> {
    return toSummary(await this.getTask(id, principal));
  }

  async getResult(id: string, principal: Principal): Promise<TaskResultView> {
    return toResultView(await this.getTask(id, principal));
  }

  /**
   * Cancel a pending or processing task. In-flight calls in this process
   * are aborted; workers elsewhere notice at their next checkpoint.
   */
  async cancelTask(id: string, principal: Principal): Promise<TaskCreatedView> {
    const task = await this.getTask(id, principal);
    if (isTerminal(task.status)) {
      throw new InvalidStateError(`Task ${id} is already ${task.status}`);
    }

    const cancelled = await this.store.transition(id, ['pending', 'processing'], { status: 'cancelled' });
    if (!cancelled) {
      // Finished between the read and the update
      const current = await this.getTask(id, principal);
      throw new InvalidStateError(`Task ${id} is already ${current.status}`);
    }

    this.cancellations.cancel(id);
    logger.taskCancelled(id);
    return { task_id: id, status: cancelled.status };
  }

  async listTasks(
    filters: ListTasksFilters,
    pagination: ListTasksPagination,
    principal: Principal
  ): Promise<TaskListView> {
    const { page, page_size: pageSize } = pagination;
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be an integer >= 1', 'page');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > TASK_LIST_LIMITS.maxPageSize) {
      throw new ValidationError(`page_size must be an integer between 1 and ${TASK_LIST_LIMITS.maxPageSize}`, 'page_size');
    }

    const filter: TaskFilter = { ...filters, ...this.scopeFilter(principal) };
    const { items, total } = await this.store.list(filter, { page, pageSize });

    return { items: items.map(toSummary), total, page, page_size: pageSize };
  }

  private scopeFilter(principal: Principal): Pick<TaskFilter, 'owner' | 'tenantId'> {
    if (principal.scope !== 'system') {
      return { owner: principal.id };
    }
    return principal.tenantId === null ? {} : { tenantId: principal.tenantId };
  }

  /**
   * Enqueue failure leaves no orphaned pending task behind
   */
  private async enqueue(task: Task): Promise<void> {
    try {
      await this.queue.enqueue(task.id);
    } catch (error) {
      const message = getErrorMessage(error);
      await this.store.transition(task.id, ['pending'], {
        status: 'failed',
        error: { category: 'internal', message: `Enqueue failed: ${message}`, retryable: false, attempts: 0 },
      });
      logger.taskFailed(task.id, 'internal', message);
      throw new InternalError('Failed to enqueue task', {
        cause: error instanceof Error ? error : undefined,
        context: { taskId: task.id },
      });
    }
  }
}
