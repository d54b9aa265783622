/**
 * File-backed Task Store
 * Every operation works on the JSON document on disk, so several processes
 * may share one file. Mutations read, change and rewrite it under a lock file.
 */

import type { Pagination, Task, TaskFilter, TaskPage, TaskStatus, TaskTransition } from '../types/index.js';
import { TASK_STATUSES } from '../types/index.js';
import { InternalError } from '../core/errors.js';
import { insertTask, listTasks, transitionTask, type TaskStore } from './TaskStore.js';
import {
  WriteChain,
  loadFromFile,
  saveToFile,
  withFileLock,
  type FileLockOptions,
} from './persistence.js';

interface TaskDocument {
  version: 1;
  tasks: Task[];
}

function isTaskRecord(value: unknown): value is Task {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === 'string' &&
    typeof record.provider === 'string' &&
    typeof record.model === 'string' &&
    typeof record.status === 'string' &&
    TASK_STATUSES.some((status) => status === record.status) &&
    typeof record.created_at === 'string' &&
    typeof record.updated_at === 'string'
  );
}

function parseDocument(raw: unknown, filePath: string): Map<string, Task> {
  if (raw === null) return new Map();
  if (typeof raw !== 'object' || !('tasks' in raw) || !Array.isArray(raw.tasks)) {
    throw new InternalError(`Task store file ${filePath} is malformed`);
  }
  const tasks: unknown[] = raw.tasks;
  if (!tasks.every(isTaskRecord)) {
    throw new InternalError(`Task store file ${filePath} contains malformed task records`);
  }
  return new Map(tasks.map((task): [string, Task] => [task.id, task]));
}

export interface FileTaskStoreOptions {
  lock?: FileLockOptions;
}

export class FileTaskStore implements TaskStore {
  /** Orders this instance's mutations so they queue here rather than on the lock */
  private readonly mutations = new WriteChain();

  private constructor(
    private readonly filePath: string,
    private readonly lockOptions: FileLockOptions
  ) {}

  /**
   * Open the store on `filePath`, refusing a malformed existing document
   */
  static async open(filePath: string, options: FileTaskStoreOptions = {}): Promise<FileTaskStore> {
    const store = new FileTaskStore(filePath, options.lock ?? {});
    await store.read();
    return store;
  }

  async insert(task: Task): Promise<void> {
    await this.mutate((tasks) => {
      insertTask(tasks, task);
      return task;
    });
  }

  async get(id: string): Promise<Task | null> {
    return (await this.read()).get(id) ?? null;
  }

  async transition(
    id: string,
    expected: readonly TaskStatus[],
    transition: TaskTransition
  ): Promise<Task | null> {
    return this.mutate((tasks) => transitionTask(tasks, id, expected, transition));
  }

  async list(filter: TaskFilter, pagination: Pagination): Promise<TaskPage> {
    return listTasks((await this.read()).values(), filter, pagination);
  }

  async ping(): Promise<boolean> {
    await this.read();
    return true;
  }

  async close(): Promise<void> {
    await this.mutations.run(async () => undefined);
  }

  private async read(): Promise<Map<string, Task>> {
    return parseDocument(await loadFromFile(this.filePath), this.filePath);
  }

  /**
   * Apply `change` to the current document and write it back when it
   * returns non-null. A failed write leaves the file as it was.
   */
  private mutate<T>(change: (tasks: Map<string, Task>) => T | null): Promise<T | null> {
    return this.mutations.run(() =>
      withFileLock(
        this.filePath,
        async () => {
          const tasks = await this.read();
          const result = change(tasks);
          if (result !== null) {
            const document: TaskDocument = { version: 1, tasks: [...tasks.values()] };
            await saveToFile(this.filePath, document);
          }
          return result;
        },
        this.lockOptions
      )
    );
  }
}
