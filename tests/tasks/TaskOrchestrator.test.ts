/**
 * Task orchestrator tests: creation paths, visibility, cancellation, listing
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CancellationRegistry,
  TaskOrchestrator,
  TaskRunner,
  type CreateTaskRequest,
} from '../../src/tasks/index.js';
import { ProviderRegistry } from '../../src/providers/registry.js';
import { MemoryTaskStore } from '../../src/store/index.js';
import { MemoryJobQueue } from '../../src/queue/index.js';
import {
  InternalError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../../src/core/errors.js';
import { MockProvider, type MockStep } from '../__mocks__/providers.js';
import { SYSTEM_ACME, SYSTEM_ROOT, USER_ALICE, USER_BOB, makeTask } from '../helpers.js';

function setup(steps: MockStep[] = []) {
  const store = new MemoryTaskStore();
  const queue = new MemoryJobQueue();
  const provider = new MockProvider({ steps });
  const providers = new ProviderRegistry();
  providers.register(provider);
  providers.freeze();
  const cancellations = new CancellationRegistry();
  const runner = new TaskRunner(store, providers, cancellations, {
    timeoutMs: 1000,
    concurrency: 2,
    retry: { maxRetries: 0 },
  });
  const orchestrator = new TaskOrchestrator({ store, queue, providers, runner, cancellations });
  return { store, queue, provider, orchestrator };
}

function request(overrides: Partial<CreateTaskRequest> = {}): CreateTaskRequest {
  return {
    model: 'mock-model',
    provider: 'mock',
    parameters: { prompt: 'Hello' },
    is_async: true,
    ...overrides,
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (error: unknown) => error
  );
}

describe('TaskOrchestrator.createTask', () => {
  it('should persist a pending task and enqueue it when async', async () => {
    const { orchestrator, store, queue, provider } = setup();

    const task = await orchestrator.createTask(request(), USER_ALICE);

    expect(task.status).toBe('pending');
    expect(task.owner).toBe('alice');
    expect(task.tenant_id).toBe('acme');
    expect(task.parameters).toEqual({ prompt: 'Hello' });
    expect((await store.get(task.id))?.status).toBe('pending');
    expect(await queue.size()).toBe(1);
    expect((await queue.dequeue())?.taskId).toBe(task.id);
    expect(provider.calls).toHaveLength(0);
  });

  it('should run inline and return the terminal task when sync', async () => {
    const { orchestrator, queue } = setup([{ kind: 'reply', content: 'Done' }]);

    const task = await orchestrator.createTask(request({ is_async: false }), USER_ALICE);

    expect(task.status).toBe('completed');
    expect(task.result?.choices[0].message.content).toBe('Done');
    expect(await queue.size()).toBe(0);
  });

  it('should return the failed task when an inline run fails', async () => {
    const { orchestrator } = setup([{ kind: 'fail', error: new Error('kaput') }]);

    const task = await orchestrator.createTask(request({ is_async: false }), USER_ALICE);

    expect(task.status).toBe('failed');
    expect(task.error).toEqual({ category: 'internal', message: 'kaput', retryable: false, attempts: 1 });
  });

  it.each([
    [{ provider: 'openai' }, 'provider'],
    [{ model: 'other-model' }, 'model'],
    [{ parameters: { temperature: 0.5 } }, 'parameters'],
    [{ parameters: { prompt: 'x', max_tokens: -1 } }, 'max_tokens'],
  ])('should reject %j without persisting or enqueueing', async (overrides, field) => {
    const { orchestrator, store, queue } = setup();

    const error = await rejection(orchestrator.createTask(request(overrides), USER_ALICE));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field });
    expect(store.count()).toBe(0);
    expect(await queue.size()).toBe(0);
  });

  it('should fail the task when it cannot be enqueued', async () => {
    const { orchestrator, store, queue } = setup();
    await queue.close();

    const error = await rejection(orchestrator.createTask(request(), USER_ALICE));

    expect(error).toBeInstanceOf(InternalError);
    const { items } = await store.list({}, { page: 1, pageSize: 10 });
    expect(items).toHaveLength(1);
    expect(items[0].status).toBe('failed');
    expect(items[0].error).toEqual({
      category: 'internal',
      message: 'Enqueue failed: Queue is closed',
      retryable: false,
      attempts: 0,
    });
  });
});

describe('TaskOrchestrator visibility', () => {
  it('should show a task to its owner and to system principals of the tenant', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask({ provider: 'mock', model: 'mock-model' }));

    expect((await orchestrator.getStatus('task-1', USER_ALICE)).task_id).toBe('task-1');
    expect((await orchestrator.getStatus('task-1', SYSTEM_ACME)).status).toBe('pending');
    expect((await orchestrator.getStatus('task-1', SYSTEM_ROOT)).status).toBe('pending');
  });

  it('should hide a task from other users and other tenants', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask());
    const otherTenant = { ...SYSTEM_ACME, id: 'svc-globex', tenantId: 'globex' };

    await expect(orchestrator.getStatus('task-1', USER_BOB)).rejects.toBeInstanceOf(NotFoundError);
    await expect(orchestrator.getResult('task-1', otherTenant)).rejects.toThrow('Task task-1 not found');
  });

  it('should report unknown ids as not found', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.getTask('missing', SYSTEM_ROOT)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('TaskOrchestrator.getResult', () => {
  it('should report not ready while pending', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask());

    expect(await orchestrator.getResult('task-1', USER_ALICE)).toEqual({
      task_id: 'task-1',
      status: 'pending',
      ready: false,
      result: null,
      error: null,
    });
  });

  it('should return the result once completed', async () => {
    const { orchestrator } = setup([{ kind: 'reply', content: 'Answer' }]);
    const task = await orchestrator.createTask(request({ is_async: false }), USER_ALICE);

    const view = await orchestrator.getResult(task.id, USER_ALICE);

    expect(view.ready).toBe(true);
    expect(view.result?.choices[0].message.content).toBe('Answer');
  });
});

describe('TaskOrchestrator.cancelTask', () => {
  it('should cancel a pending task', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask());

    expect(await orchestrator.cancelTask('task-1', USER_ALICE)).toEqual({ task_id: 'task-1', status: 'cancelled' });
    expect((await store.get('task-1'))?.status).toBe('cancelled');
  });

  it('should refuse to cancel a terminal task', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask({ status: 'cancelled' }));

    const error = await rejection(orchestrator.cancelTask('task-1', USER_ALICE));

    expect(error).toBeInstanceOf(InvalidStateError);
    expect(error).toMatchObject({ message: 'Task task-1 is already cancelled' });
  });

  it('should abort an inline run in progress', async () => {
    const { orchestrator, provider } = setup([{ kind: 'hang' }]);

    const creating = orchestrator.createTask(request({ is_async: false }), USER_ALICE);
    await vi.waitFor(() => expect(provider.calls).toHaveLength(1), { interval: 5 });
    const { items } = await orchestrator.listTasks({}, { page: 1, page_size: 10 }, USER_ALICE);

    await orchestrator.cancelTask(items[0].task_id, USER_ALICE);
    const task = await creating;

    expect(task.status).toBe('cancelled');
    expect(task.result).toBeNull();
    expect(provider.calls[0].signal?.aborted).toBe(true);
  });

  it('should not let another user cancel', async () => {
    const { orchestrator, store } = setup();
    await store.insert(makeTask());

    await expect(orchestrator.cancelTask('task-1', USER_BOB)).rejects.toBeInstanceOf(NotFoundError);
    expect((await store.get('task-1'))?.status).toBe('pending');
  });
});

describe('TaskOrchestrator.listTasks', () => {
  async function seeded() {
    const ctx = setup();
    await ctx.store.insert(makeTask({ id: 'a1', owner: 'alice', created_at: '2024-01-01T00:00:01.000Z' }));
    await ctx.store.insert(
      makeTask({ id: 'a2', owner: 'alice', created_at: '2024-01-01T00:00:02.000Z', status: 'completed' })
    );
    await ctx.store.insert(makeTask({ id: 'b1', owner: 'bob', created_at: '2024-01-01T00:00:03.000Z' }));
    await ctx.store.insert(
      makeTask({ id: 'g1', owner: 'gina', tenant_id: 'globex', created_at: '2024-01-01T00:00:04.000Z' })
    );
    return ctx;
  }

  it('should scope users to their own tasks', async () => {
    const { orchestrator } = await seeded();

    const page = await orchestrator.listTasks({}, { page: 1, page_size: 10 }, USER_ALICE);

    expect(page.items.map((task) => task.task_id)).toEqual(['a2', 'a1']);
    expect(page).toMatchObject({ total: 2, page: 1, page_size: 10 });
  });

  it('should scope system principals to their tenant', async () => {
    const { orchestrator } = await seeded();

    const tenant = await orchestrator.listTasks({}, { page: 1, page_size: 10 }, SYSTEM_ACME);
    const everyone = await orchestrator.listTasks({}, { page: 1, page_size: 10 }, SYSTEM_ROOT);

    expect(tenant.items.map((task) => task.task_id)).toEqual(['b1', 'a2', 'a1']);
    expect(everyone.total).toBe(4);
  });

  it('should apply filters and pagination', async () => {
    const { orchestrator } = await seeded();

    const pending = await orchestrator.listTasks({ status: 'pending' }, { page: 2, page_size: 1 }, SYSTEM_ROOT);

    expect(pending.total).toBe(3);
    expect(pending.items.map((task) => task.task_id)).toEqual(['b1']);
  });

  it('should not let a filter widen the scope', async () => {
    const { orchestrator } = await seeded();

    const page = await orchestrator.listTasks({ status: 'pending' }, { page: 1, page_size: 10 }, USER_BOB);

    expect(page.items.map((task) => task.task_id)).toEqual(['b1']);
  });

  it('should validate pagination', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.listTasks({}, { page: 0, page_size: 10 }, USER_ALICE)).rejects.toMatchObject({
      field: 'page',
    });
    await expect(orchestrator.listTasks({}, { page: 1, page_size: 101 }, USER_ALICE)).rejects.toMatchObject({
      field: 'page_size',
    });
  });
});
