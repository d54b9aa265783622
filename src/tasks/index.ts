/**
 * Tasks Module
 */

export { TaskOrchestrator } from './TaskOrchestrator.js';
export type {
  CreateTaskRequest,
  ListTasksFilters,
  ListTasksPagination,
  TaskListView,
  TaskOrchestratorDeps,
} from './TaskOrchestrator.js';
export { TaskRunner, classifyFailure } from './TaskRunner.js';
export type { RunOutcome, RunResult, TaskRunnerOptions } from './TaskRunner.js';
export { CancellationRegistry, TaskCancelledError } from './CancellationRegistry.js';
export { applyTransition, canTransition, isTerminal } from './stateMachine.js';
export * from './views.js';
