/**
 * Caller-facing projections of a task document
 */

import type { Principal, Task, TaskError, TaskStatus, TaskSummary, UnifiedResponse } from '../types/index.js';

export interface TaskCreatedView {
  task_id: string;
  status: TaskStatus;
}

export interface TaskResultView {
  task_id: string;
  status: TaskStatus;
  /** False while the task is pending or processing */
  ready: boolean;
  result: UnifiedResponse | null;
  error: TaskError | null;
}

export interface TaskDetailView extends TaskSummary {
  result: UnifiedResponse | null;
  error: TaskError | null;
  attempts: number;
}

export function toSummary(task: Task): TaskSummary {
  return {
    task_id: task.id,
    provider: task.provider,
    model: task.model,
    status: task.status,
    is_async: task.is_async,
    created_at: task.created_at,
    updated_at: task.updated_at,
  };
}

export function toResultView(task: Task): TaskResultView {
  return {
    task_id: task.id,
    status: task.status,
    ready: task.status !== 'pending' && task.status !== 'processing',
    result: task.status === 'completed' ? task.result : null,
    error: task.status === 'failed' ? task.error : null,
  };
}

export function toDetailView(task: Task): TaskDetailView {
  return {
    ...toSummary(task),
    result: task.result,
    error: task.error,
    attempts: task.attempts,
  };
}

/**
 * Owners see their tasks; system principals see their tenant, or
 * everything when they carry no tenant.
 */
export function isVisibleTo(task: Task, principal: Principal): boolean {
  if (task.owner === principal.id) return true;
  if (principal.scope !== 'system') return false;
  return principal.tenantId === null || task.tenant_id === principal.tenantId;
}
