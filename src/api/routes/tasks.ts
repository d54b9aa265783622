/**
 * Task Routes
 * Creation, status, result, cancellation and listing
 */

import type { FastifyRequest } from 'fastify';
import { AuthError } from '../../core/errors.js';
import { toDetailView } from '../../tasks/index.js';
import type { Principal } from '../../types/index.js';
import type { RouteDefinition, ServerDeps } from '../types/index.js';
import { API_ERRORS, SUCCESS_MESSAGES } from '../constants/messages.js';
import { fail, ok } from '../utils/envelope.js';
import {
  validateCreateTaskRequest,
  validateListTasksQuery,
  validateTaskIdParams,
} from '../validators/index.js';

function principalOf(request: FastifyRequest): Principal {
  if (!request.principal) {
    throw new AuthError(API_ERRORS.CREDENTIAL_REQUIRED);
  }
  return request.principal;
}

export function taskRoutes(deps: Pick<ServerDeps, 'orchestrator'>): RouteDefinition[] {
  const { orchestrator } = deps;

  return [
    {
      /**
       * POST /tasks
       * Async: 202 with the task id. Sync: 200 with the completed task,
       * 502 with the failed task.
       */
      method: 'POST',
      url: '/tasks',
      permission: { resource: 'task', action: 'create' },
      handler: async (request, reply) => {
        const input = validateCreateTaskRequest(request.body);
        const task = await orchestrator.createTask(input, principalOf(request));

        if (task.is_async) {
          reply.status(202);
          return ok(SUCCESS_MESSAGES.TASK_QUEUED, { task_id: task.id, status: task.status });
        }

        switch (task.status) {
          case 'failed':
            reply.status(502);
            return fail(SUCCESS_MESSAGES.TASK_FAILED, toDetailView(task));
          case 'cancelled':
            return ok(SUCCESS_MESSAGES.TASK_CANCELLED, toDetailView(task));
          default:
            return ok(SUCCESS_MESSAGES.TASK_COMPLETED, toDetailView(task));
        }
      },
    },
    {
      /**
       * GET /tasks/:id/status
       */
      method: 'GET',
      url: '/tasks/:id/status',
      permission: { resource: 'task', action: 'read' },
      handler: async (request) => {
        const id = validateTaskIdParams(request.params);
        return ok(SUCCESS_MESSAGES.TASK_STATUS, await orchestrator.getStatus(id, principalOf(request)));
      },
    },
    {
      /**
       * GET /tasks/:id/result
       * `ready: false` while the task is still pending or processing
       */
      method: 'GET',
      url: '/tasks/:id/result',
      permission: { resource: 'task', action: 'read' },
      handler: async (request) => {
        const id = validateTaskIdParams(request.params);
        const view = await orchestrator.getResult(id, principalOf(request));
        return ok(view.ready ? SUCCESS_MESSAGES.TASK_RESULT_READY : SUCCESS_MESSAGES.TASK_RESULT_PENDING, view);
      },
    },
    {
      /**
       * POST /tasks/:id/cancel
       */
      method: 'POST',
      url: '/tasks/:id/cancel',
      permission: { resource: 'task', action: 'cancel' },
      handler: async (request) => {
        const id = validateTaskIdParams(request.params);
        return ok(SUCCESS_MESSAGES.TASK_CANCELLED, await orchestrator.cancelTask(id, principalOf(request)));
      },
    },
    {
      /**
       * GET /tasks
       * Filters: status, model, provider. Pagination: page, page_size.
       */
      method: 'GET',
      url: '/tasks',
      permission: { resource: 'task', action: 'list' },
      handler: async (request) => {
        const { filters, pagination } = validateListTasksQuery(request.query);
        return ok(SUCCESS_MESSAGES.TASKS_LISTED, await orchestrator.listTasks(filters, pagination, principalOf(request)));
      },
    },
  ];
}
