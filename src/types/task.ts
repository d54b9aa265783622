/**
 * Task types - Canonical definitions
 *
 * Single source of truth for task-related types
 * used across the orchestrator, store, executor and HTTP layer.
 *
 * @module types/task
 */

import type { ProviderErrorCategory } from '../core/errors.js';
import type { TaskParameters, UnifiedResponse } from './provider.js';

// ============================================================================
// Task Status
// ============================================================================

export const TASK_STATUSES = ['pending', 'processing', 'completed', 'failed', 'cancelled'] as const;

/**
 * Lifecycle status of a task
 */
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

// ============================================================================
// Task Error
// ============================================================================

/**
 * Failure categories recorded on a task. Provider categories plus
 * `capacity` (no invocation slot, provider not called), `internal`
 * (unexpected exception) and `stale` (reaped while processing).
 */
export type TaskErrorCategory = ProviderErrorCategory | 'capacity' | 'internal' | 'stale';

export interface TaskError {
  category: TaskErrorCategory;
  message: string;
  retryable: boolean;
  attempts: number;
}

// ============================================================================
// Task Document
// ============================================================================

export interface Task {
  id: string;
  model: string;
  provider: string;
  parameters: TaskParameters;
  is_async: boolean;
  status: TaskStatus;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  result: UnifiedResponse | null;
  error: TaskError | null;
  owner: string;
  tenant_id: string | null;
  attempts: number;
}

/**
 * Fields a status transition may write alongside the new status
 */
export interface TaskTransition {
  status: TaskStatus;
  result?: UnifiedResponse | null;
  error?: TaskError | null;
  attempts?: number;
}

export interface TaskSummary {
  task_id: string;
  provider: string;
  model: string;
  status: TaskStatus;
  is_async: boolean;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Listing
// ============================================================================

export interface TaskFilter {
  status?: TaskStatus;
  model?: string;
  provider?: string;
  owner?: string;
  tenantId?: string;
  /** Only tasks whose updated_at is strictly older than this ISO timestamp */
  updatedBefore?: string;
}

export interface Pagination {
  page: number;
  pageSize: number;
}

export interface TaskPage {
  items: Task[];
  total: number;
}
