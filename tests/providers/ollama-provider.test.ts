/**
 * Ollama provider tests (client mocked)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { makeDescriptor } from '../helpers.js';

const client = vi.hoisted(() => {
  const chat = vi.fn();
  const configs: Array<{ host?: string; fetch?: typeof fetch }> = [];

  class FakeOllama {
    chat = chat;

    constructor(config: { host?: string; fetch?: typeof fetch }) {
      configs.push(config);
    }
  }

  return { chat, configs, FakeOllama };
});

vi.mock('ollama', () => ({ Ollama: client.FakeOllama }));

import { OllamaProvider } from '../../src/providers/ollama-provider.js';

const descriptor = makeDescriptor({
  name: 'ollama',
  models: ['llama3'],
  apiKey: undefined,
  baseUrl: 'http://ollama.test:11434',
});

beforeEach(() => {
  client.chat.mockReset();
  client.configs.length = 0;
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OllamaProvider', () => {
  it('should be configured without an API key', () => {
    expect(new OllamaProvider(descriptor).isConfigured()).toBe(true);
  });

  it('should refuse content parts', () => {
    expect(() =>
      new OllamaProvider(descriptor).validateParameters('llama3', {
        messages: [{ role: 'user', content: [{ text: 'Hi' }] }],
      })
    ).toThrow('ollama accepts text content only; messages[0].content must be a string');
  });

  it('should pass parameters through as Ollama options', async () => {
    client.chat.mockResolvedValue({
      model: 'llama3',
      created_at: '2024-01-01T00:00:00.000Z',
      message: { role: 'assistant', content: 'Hey' },
      done: true,
      done_reason: 'stop',
      prompt_eval_count: 7,
      eval_count: 3,
    });
    const provider = new OllamaProvider(descriptor);

    const response = await provider.complete('llama3', { prompt: 'Hi', max_tokens: 50, temperature: 0.1 });

    expect(client.configs[0]?.host).toBe('http://ollama.test:11434');
    expect(client.chat).toHaveBeenCalledWith({
      model: 'llama3',
      messages: [{ role: 'user', content: 'Hi' }],
      stream: false,
      options: { num_predict: 50, temperature: 0.1, top_p: undefined },
    });
    expect(response).toMatchObject({
      model: 'llama3',
      created: 1704067200,
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hey' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 7, completion_tokens: 3, total_tokens: 10 },
    });
  });

  it('should default the finish reason to stop', async () => {
    client.chat.mockResolvedValue({
      model: '',
      created_at: 'not a date',
      message: { role: 'assistant', content: 'x' },
      done: true,
      done_reason: '',
      prompt_eval_count: 1,
      eval_count: 1,
    });

    const response = await new OllamaProvider(descriptor).complete('llama3', { prompt: 'Hi' });

    expect(response.model).toBe('llama3');
    expect(response.choices[0].finish_reason).toBe('stop');
    expect(Number.isInteger(response.created)).toBe(true);
  });

  it('should route the abort signal into the client fetch', async () => {
    client.chat.mockResolvedValue({
      model: 'llama3',
      created_at: '2024-01-01T00:00:00.000Z',
      message: { role: 'assistant', content: 'x' },
      done: true,
      done_reason: 'stop',
      prompt_eval_count: 1,
      eval_count: 1,
    });
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();

    await new OllamaProvider(descriptor).complete('llama3', { prompt: 'Hi' }, { signal: controller.signal });
    await client.configs[0]?.fetch?.('http://ollama.test:11434/api/chat', { method: 'POST' });

    expect(fetchMock).toHaveBeenCalledWith('http://ollama.test:11434/api/chat', {
      method: 'POST',
      signal: controller.signal,
    });
  });

  it('should classify connection failures as network errors', async () => {
    client.chat.mockRejectedValue(
      new TypeError('fetch failed', { cause: Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }) })
    );

    await expect(new OllamaProvider(descriptor).complete('llama3', { prompt: 'Hi' })).rejects.toMatchObject({
      category: 'network',
      retryable: true,
    });
  });
});
