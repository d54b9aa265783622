/**
 * Mock Providers for testing
 * Scripted BaseProvider implementation: each invocation consumes the next step
 */

import { BaseProvider } from '../../src/providers/base-provider.js';
import type {
  InvokeOptions,
  PreparedParameters,
  UnifiedResponse,
} from '../../src/types/provider.js';

export type MockStep =
  | { kind: 'reply'; content: string; delayMs?: number }
  | { kind: 'fail'; error: Error }
  | { kind: 'hang' };

export interface MockInvocation {
  model: string;
  parameters: PreparedParameters;
  signal?: AbortSignal;
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(abortError());
      },
      { once: true }
    );
  });
}

/**
 * Mock provider for testing
 */
export class MockProvider extends BaseProvider<string> {
  readonly calls: MockInvocation[] = [];
  private steps: MockStep[];
  private fallback: MockStep;

  constructor(
    options: {
      name?: string;
      models?: string[];
      steps?: MockStep[];
      fallback?: MockStep;
      timeoutMs?: number;
    } = {}
  ) {
    super({
      name: options.name ?? 'mock',
      models: options.models ?? ['mock-model'],
      apiKey: 'test-secret',
      timeoutMs: options.timeoutMs,
    });
    this.steps = [...(options.steps ?? [])];
    this.fallback = options.fallback ?? { kind: 'reply', content: 'Mock response' };
  }

  /**
   * Queue further steps
   */
  script(...steps: MockStep[]): this {
    this.steps.push(...steps);
    return this;
  }

  protected prepare(_model: string, parameters: PreparedParameters): PreparedParameters {
    return parameters;
  }

  async invoke(model: string, parameters: PreparedParameters, options: InvokeOptions = {}): Promise<string> {
    this.calls.push({ model, parameters, signal: options.signal });
    const step = this.steps.shift() ?? this.fallback;

    switch (step.kind) {
      case 'reply':
        if (step.delayMs) {
          await waitFor(step.delayMs, options.signal);
        }
        return step.content;
      case 'fail':
        throw step.error;
      case 'hang':
        return new Promise<string>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(abortError()), { once: true });
        });
    }
  }

  normalize(native: string, model: string): UnifiedResponse {
    return {
      id: `mock-${this.calls.length}`,
      model,
      created: 1704067200,
      choices: [{ index: 0, message: { role: 'assistant', content: native }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 },
    };
  }
}
