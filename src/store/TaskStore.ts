/**
 * Task Store
 * Persistence abstraction over task documents with atomic conditional updates
 */

import type {
  Pagination,
  Task,
  TaskFilter,
  TaskPage,
  TaskStatus,
  TaskTransition,
} from '../types/index.js';
import { InvalidStateError } from '../core/errors.js';
import { applyTransition } from '../tasks/stateMachine.js';

export interface TaskStore {
  insert(task: Task): Promise<void>;

  get(id: string): Promise<Task | null>;

  /**
   * Conditional update. Applies the transition only when the persisted status
   * is one of `expected`; returns the updated task, or null when the task is
   * missing or its status did not match.
   */
  transition(id: string, expected: readonly TaskStatus[], transition: TaskTransition): Promise<Task | null>;

  /** Newest first */
  list(filter: TaskFilter, pagination: Pagination): Promise<TaskPage>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}

export function matchesFilter(task: Task, filter: TaskFilter): boolean {
  if (filter.status && task.status !== filter.status) return false;
  if (filter.model && task.model !== filter.model) return false;
  if (filter.provider && task.provider !== filter.provider) return false;
  if (filter.owner && task.owner !== filter.owner) return false;
  if (filter.tenantId && task.tenant_id !== filter.tenantId) return false;
  if (filter.updatedBefore && !(task.updated_at < filter.updatedBefore)) return false;
  return true;
}

function newestFirst(a: Task, b: Task): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? 1 : -1;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

export function insertTask(tasks: Map<string, Task>, task: Task): void {
  if (tasks.has(task.id)) {
    throw new InvalidStateError(`Task ${task.id} already exists`);
  }
  tasks.set(task.id, structuredClone(task));
}

/**
 * Check-and-set on a task map; returns a copy of the updated task, or null
 * when the task is missing or not in an expected status
 */
export function transitionTask(
  tasks: Map<string, Task>,
  id: string,
  expected: readonly TaskStatus[],
  transition: TaskTransition
): Task | null {
  const current = tasks.get(id);
  if (!current || !expected.includes(current.status)) {
    return null;
  }

  const updated = applyTransition(current, transition);
  tasks.set(id, updated);
  return structuredClone(updated);
}

export function listTasks(tasks: Iterable<Task>, filter: TaskFilter, pagination: Pagination): TaskPage {
  const matching = [...tasks].filter((task) => matchesFilter(task, filter)).sort(newestFirst);
  const start = (pagination.page - 1) * pagination.pageSize;

  return {
    items: matching.slice(start, start + pagination.pageSize).map((task) => structuredClone(task)),
    total: matching.length,
  };
}

/**
 * In-memory store. The check-and-set in `transition` runs without an
 * intervening await, so it is atomic within the process.
 */
export class MemoryTaskStore implements TaskStore {
  private tasks = new Map<string, Task>();

  async insert(task: Task): Promise<void> {
    insertTask(this.tasks, task);
  }

  async get(id: string): Promise<Task | null> {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : null;
  }

  async transition(
    id: string,
    expected: readonly TaskStatus[],
    transition: TaskTransition
  ): Promise<Task | null> {
    return transitionTask(this.tasks, id, expected, transition);
  }

  async list(filter: TaskFilter, pagination: Pagination): Promise<TaskPage> {
    return listTasks(this.tasks.values(), filter, pagination);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  count(): number {
    return this.tasks.size;
  }
}
