/**
 * Task Validators
 * Shape checks for task requests; provider/model checks happen in the orchestrator
 */

import { TASK_STATUSES } from '../../types/index.js';
import { TASK_LIST_LIMITS } from '../../config/constants.js';
import type { CreateTaskRequest, ListTasksFilters, ListTasksPagination } from '../../tasks/index.js';
import {
  optionalBoolean,
  optionalEnum,
  optionalInteger,
  optionalString,
  requireObject,
  requireString,
} from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════
// Create
// ═══════════════════════════════════════════════════════════════════════════

export function validateCreateTaskRequest(body: unknown): CreateTaskRequest {
  const data = requireObject(body, 'body');

  return {
    model: requireString(data.model, 'model', 1, 200),
    provider: requireString(data.provider, 'provider', 1, 100),
    parameters: requireObject(data.parameters, 'parameters'),
    is_async: optionalBoolean(data.is_async, 'is_async', true),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Params
// ═══════════════════════════════════════════════════════════════════════════

export function validateTaskIdParams(params: unknown): string {
  const data = requireObject(params, 'params');
  return requireString(data.id, 'id', 1, 100);
}

// ═══════════════════════════════════════════════════════════════════════════
// Listing
// ═══════════════════════════════════════════════════════════════════════════

export interface ListTasksQuery {
  filters: ListTasksFilters;
  pagination: ListTasksPagination;
}

export function validateListTasksQuery(query: unknown): ListTasksQuery {
  const data = query === undefined ? {} : requireObject(query, 'query');

  return {
    filters: {
      status: optionalEnum(data.status, 'status', TASK_STATUSES),
      model: optionalString(data.model, 'model', 200),
      provider: optionalString(data.provider, 'provider', 100),
    },
    pagination: {
      page: optionalInteger(data.page, 'page', 1, Number.MAX_SAFE_INTEGER, 1),
      page_size: optionalInteger(
        data.page_size,
        'page_size',
        1,
        TASK_LIST_LIMITS.maxPageSize,
        TASK_LIST_LIMITS.defaultPageSize
      ),
    },
  };
}
