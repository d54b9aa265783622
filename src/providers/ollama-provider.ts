/**
 * Model Relay - Ollama Provider
 * Local models served by an Ollama host
 */

import { type ChatResponse, Ollama } from 'ollama';
import { v4 as uuidv4 } from 'uuid';
import type { InvokeOptions, PreparedParameters, UnifiedResponse } from '../types/index.js';
import { DEFAULT_BASE_URLS } from '../config/constants.js';
import { BaseProvider } from './base-provider.js';
import { asProviderError } from './failures.js';
import { requireTextMessages } from './parameters.js';
import { buildUsage, epochSeconds } from './records.js';

export class OllamaProvider extends BaseProvider<ChatResponse> {
  protected prepare(_model: string, parameters: PreparedParameters): PreparedParameters {
    return { ...parameters, messages: requireTextMessages(parameters.messages, this.name) };
  }

  /** Local hosts need no key */
  override isConfigured(): boolean {
    return true;
  }

  async invoke(model: string, parameters: PreparedParameters, options: InvokeOptions = {}): Promise<ChatResponse> {
    const { signal } = options;
    const client = new Ollama({
      host: this.descriptor.baseUrl ?? DEFAULT_BASE_URLS.ollama,
      // Route the abort signal into every request the client makes
      fetch: (...args: Parameters<typeof fetch>) => fetch(args[0], { ...args[1], signal }),
    });

    try {
      return await client.chat({
        model,
        messages: requireTextMessages(parameters.messages, this.name),
        stream: false,
        options: {
          num_predict: parameters.max_tokens,
          temperature: parameters.temperature,
          top_p: parameters.top_p,
        },
      });
    } catch (error) {
      throw asProviderError(this.name, error) ?? error;
    }
  }

  normalize(native: ChatResponse, model: string): UnifiedResponse {
    const created = new Date(native.created_at);
    const completionTokens = native.eval_count ?? 0;
    const promptTokens = native.prompt_eval_count ?? 0;

    return {
      id: uuidv4(),
      model: native.model || model,
      created: Number.isNaN(created.getTime()) ? epochSeconds() : epochSeconds(created),
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: native.message.content },
          finish_reason: native.done_reason || 'stop',
        },
      ],
      usage: buildUsage(promptTokens, completionTokens),
    };
  }
}
