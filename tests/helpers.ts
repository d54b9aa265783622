/**
 * Model Relay - Shared test fixtures
 */

import type {
  Principal,
  ProviderDescriptor,
  Task,
  UnifiedResponse,
} from '../src/types/index.js';

export const USER_ALICE: Principal = { id: 'alice', scope: 'user', tenantId: 'acme', credentialKind: 'bearer' };
export const USER_BOB: Principal = { id: 'bob', scope: 'user', tenantId: 'acme', credentialKind: 'api_key' };
export const SYSTEM_ACME: Principal = { id: 'svc-acme', scope: 'system', tenantId: 'acme', credentialKind: 'api_key' };
export const SYSTEM_ROOT: Principal = { id: 'svc-root', scope: 'system', tenantId: null, credentialKind: 'api_key' };

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    model: 'qwen-turbo',
    provider: 'aliyun',
    parameters: { prompt: 'Hello' },
    is_async: true,
    status: 'pending',
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    started_at: null,
    completed_at: null,
    result: null,
    error: null,
    owner: 'alice',
    tenant_id: 'acme',
    attempts: 0,
    ...overrides,
  };
}

export function makeResponse(content = 'Hi there', model = 'qwen-turbo'): UnifiedResponse {
  return {
    id: 'resp-1',
    model,
    created: 1704067200,
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
  };
}

export function makeDescriptor(overrides: Partial<ProviderDescriptor> = {}): ProviderDescriptor {
  return {
    name: 'aliyun',
    models: ['qwen-turbo', 'qwen-plus'],
    apiKey: 'test-secret',
    baseUrl: 'http://aliyun.test/api/v1/services/aigc/text-generation/generation',
    timeoutMs: 1000,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
