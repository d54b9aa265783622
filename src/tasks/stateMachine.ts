/**
 * Task lifecycle state machine
 *
 *   pending ──► processing ──► completed
 *      │            │     └──► failed
 *      │            └────────► cancelled
 *      ├─────────────────────► cancelled
 *      └─────────────────────► failed     (enqueue failure)
 */

import type { Task, TaskStatus, TerminalTaskStatus, TaskTransition } from '../types/index.js';
import { InvalidStateError } from '../core/errors.js';

const TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['processing', 'cancelled', 'failed'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: TaskStatus): status is TerminalTaskStatus {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Apply a transition to a task document, returning the new document.
 * Keeps result/error consistent with the target status and never moves
 * updated_at backwards.
 */
export function applyTransition(task: Task, transition: TaskTransition, now: Date = new Date()): Task {
  if (!canTransition(task.status, transition.status)) {
    throw new InvalidStateError(
      `Task ${task.id} cannot move from ${task.status} to ${transition.status}`,
      { context: { taskId: task.id, from: task.status, to: transition.status } }
    );
  }

  const nowIso = now.toISOString();
  const updatedAt = nowIso > task.updated_at ? nowIso : task.updated_at;
  const status = transition.status;

  if (status === 'completed' && !transition.result) {
    throw new InvalidStateError(`Task ${task.id} cannot complete without a result`);
  }
  if (status === 'failed' && !transition.error) {
    throw new InvalidStateError(`Task ${task.id} cannot fail without an error`);
  }

  return {
    ...task,
    status,
    updated_at: updatedAt,
    started_at: status === 'processing' ? updatedAt : task.started_at,
    completed_at: isTerminal(status) ? updatedAt : task.completed_at,
    result: status === 'completed' ? transition.result ?? null : null,
    error: status === 'failed' ? transition.error ?? null : null,
    attempts: transition.attempts ?? task.attempts,
  };
}
