/**
 * Store Module
 */

import { ConfigurationError } from '../core/errors.js';
import { FileTaskStore } from './FileTaskStore.js';
import { MemoryTaskStore, type TaskStore } from './TaskStore.js';
import { filePathFromUrl } from './persistence.js';

export { MemoryTaskStore, insertTask, listTasks, matchesFilter, transitionTask } from './TaskStore.js';
export type { TaskStore } from './TaskStore.js';
export { FileTaskStore } from './FileTaskStore.js';
export type { FileTaskStoreOptions } from './FileTaskStore.js';

/**
 * Create a task store from a data-store URL (`memory://` or `file://<path>`)
 */
export async function createTaskStore(url: string): Promise<TaskStore> {
  if (url.startsWith('memory://')) {
    return new MemoryTaskStore();
  }
  if (url.startsWith('file://')) {
    return FileTaskStore.open(filePathFromUrl(url));
  }
  throw new ConfigurationError(`Unsupported DATA_STORE_URL: ${url}`);
}
