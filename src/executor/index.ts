/**
 * Executor Module
 */

export { TaskExecutor } from './TaskExecutor.js';
export type { TaskExecutorDeps, TaskExecutorOptions } from './TaskExecutor.js';
