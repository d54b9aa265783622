/**
 * Model Relay - DeepSeek Provider
 * OpenAI-compatible chat completions API. Keys the relay does not interpret
 * (stop, response_format, tools, ...) are forwarded as supplied.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type {
  InvokeOptions,
  PreparedParameters,
  TextMessage,
  UnifiedMessage,
  UnifiedResponse,
} from '../types/index.js';
import { DEFAULT_BASE_URLS } from '../config/constants.js';
import { BaseProvider } from './base-provider.js';
import { asProviderError } from './failures.js';
import { clamp, requireTextMessages } from './parameters.js';
import { buildUsage } from './records.js';

const MAX_TOKENS_LIMIT = 32768;
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TOP_P = 0.9;

/** Reasoning models reject sampling parameters */
const REASONER_MODEL = 'deepseek-reasoner';

/** Replies are never streamed back through the relay */
const NOT_FORWARDED = new Set(['stream', 'stream_options']);

function toMessageParam(message: TextMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

function toUnifiedMessage(message: ChatCompletionMessage): UnifiedMessage {
  const reasoning =
    'reasoning_content' in message && typeof message.reasoning_content === 'string'
      ? message.reasoning_content
      : undefined;

  return {
    role: message.role,
    content: message.content ?? '',
    ...(reasoning ? { reasoning_content: reasoning } : {}),
    ...(message.tool_calls?.length
      ? {
          tool_calls: message.tool_calls.map((call) => ({
            id: call.id,
            type: call.type,
            function: { name: call.function.name, arguments: call.function.arguments },
          })),
        }
      : {}),
    ...(message.function_call
      ? { function_call: { name: message.function_call.name, arguments: message.function_call.arguments } }
      : {}),
  };
}

export class DeepSeekProvider extends BaseProvider<ChatCompletion> {
  private client: OpenAI | null = null;

  protected prepare(model: string, parameters: PreparedParameters): PreparedParameters {
    const maxTokens = Math.min(parameters.max_tokens ?? DEFAULT_MAX_TOKENS, MAX_TOKENS_LIMIT);
    const messages = requireTextMessages(parameters.messages, this.name);

    if (model === REASONER_MODEL) {
      return { messages, max_tokens: maxTokens, extra: parameters.extra };
    }

    return {
      messages,
      max_tokens: maxTokens,
      temperature: clamp(parameters.temperature ?? DEFAULT_TEMPERATURE, 0, 2),
      top_p: clamp(parameters.top_p ?? DEFAULT_TOP_P, 0, 1),
      extra: parameters.extra,
    };
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.requireApiKey(),
        baseURL: this.descriptor.baseUrl ?? DEFAULT_BASE_URLS.deepseek,
        timeout: this.descriptor.timeoutMs,
        // Retries are owned by the task runner
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async invoke(model: string, parameters: PreparedParameters, options: InvokeOptions = {}): Promise<ChatCompletion> {
    const client = this.getClient();
    const forwarded = Object.fromEntries(
      Object.entries(parameters.extra).filter(([key]) => !NOT_FORWARDED.has(key))
    );

    const body: Record<string, unknown> = {
      ...forwarded,
      model,
      messages: requireTextMessages(parameters.messages, this.name).map(toMessageParam),
      max_tokens: parameters.max_tokens,
      temperature: parameters.temperature,
      top_p: parameters.top_p,
      stream: false,
    };

    try {
      // Arbitrary caller keys do not fit the typed create() signature
      return await client.post<Record<string, unknown>, ChatCompletion>('/chat/completions', {
        body,
        signal: options.signal,
      });
    } catch (error) {
      throw asProviderError(this.name, error) ?? error;
    }
  }

  normalize(native: ChatCompletion, model: string): UnifiedResponse {
    return {
      id: native.id,
      model: native.model || model,
      created: native.created,
      choices: native.choices.map((choice) => ({
        index: choice.index,
        message: toUnifiedMessage(choice.message),
        finish_reason: choice.finish_reason,
      })),
      usage: buildUsage(
        native.usage?.prompt_tokens,
        native.usage?.completion_tokens,
        native.usage?.total_tokens
      ),
    };
  }
}
