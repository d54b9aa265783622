/**
 * Model Relay - Aliyun Provider
 * DashScope text-generation REST API (Qwen models)
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  InvokeOptions,
  PreparedParameters,
  ToolCall,
  UnifiedChoice,
  UnifiedResponse,
} from '../types/index.js';
import { ProviderError } from '../core/errors.js';
import { DEFAULT_BASE_URLS } from '../config/constants.js';
import { BaseProvider } from './base-provider.js';
import { asProviderError, providerErrorFromStatus } from './failures.js';
import { clamp } from './parameters.js';
import {
  buildUsage,
  epochSeconds,
  isRecord,
  readNumber,
  readRecord,
  readRecords,
  readString,
} from './records.js';

export type DashScopeResponse = Record<string, unknown>;

const MAX_TOKENS_LIMIT = 6000;
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TOP_P = 0.9;

/**
 * Reply content is a string, or a list of `{ text }` parts from VL models
 */
function readContent(message: Record<string, unknown>): string {
  const content = readString(message, 'content');
  if (content !== undefined) return content;
  return readRecords(message, 'content')
    .map((part) => readString(part, 'text') ?? '')
    .join('');
}

function readToolCalls(message: Record<string, unknown>): ToolCall[] {
  return readRecords(message, 'tool_calls').flatMap((call, index) => {
    const fn = readRecord(call, 'function');
    const name = readString(fn, 'name');
    if (name === undefined) return [];

    const args = fn.arguments;
    return [
      {
        id: readString(call, 'id') ?? `call_${index}`,
        type: readString(call, 'type') ?? 'function',
        function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args ?? {}) },
      },
    ];
  });
}

export class AliyunProvider extends BaseProvider<DashScopeResponse> {
  protected prepare(_model: string, parameters: PreparedParameters): PreparedParameters {
    const extra = { ...parameters.extra };

    const topK = extra.top_k;
    if (topK !== undefined) {
      if (typeof topK !== 'number' || !Number.isFinite(topK)) {
        delete extra.top_k;
      } else {
        extra.top_k = clamp(Math.trunc(topK), 1, 100);
      }
    }
    if (typeof extra.seed === 'number') {
      extra.seed = Math.trunc(extra.seed);
    }
    // Streaming is not relayed
    extra.stream = false;
    if (extra.enable_thinking === undefined) {
      extra.enable_thinking = false;
    }

    return {
      messages: parameters.messages,
      max_tokens: Math.min(parameters.max_tokens ?? DEFAULT_MAX_TOKENS, MAX_TOKENS_LIMIT),
      temperature: clamp(parameters.temperature ?? DEFAULT_TEMPERATURE, 0, 1),
      top_p: clamp(parameters.top_p ?? DEFAULT_TOP_P, 0, 1),
      extra,
    };
  }

  /**
   * Body for the DashScope generation endpoint
   */
  buildRequestBody(model: string, parameters: PreparedParameters): Record<string, unknown> {
    return {
      model,
      input: { messages: parameters.messages },
      parameters: {
        ...parameters.extra,
        max_tokens: parameters.max_tokens,
        temperature: parameters.temperature,
        top_p: parameters.top_p,
      },
    };
  }

  async invoke(model: string, parameters: PreparedParameters, options: InvokeOptions = {}): Promise<DashScopeResponse> {
    const apiKey = this.requireApiKey();
    const url = this.descriptor.baseUrl ?? DEFAULT_BASE_URLS.aliyun ?? '';

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
          'X-DashScope-SSE': 'disable',
          'X-DashScope-DataInspection': 'disable',
        },
        body: JSON.stringify(this.buildRequestBody(model, parameters)),
        signal: options.signal,
      });
    } catch (error) {
      throw asProviderError(this.name, error) ?? error;
    }

    const text = await response.text();
    if (!response.ok) {
      throw providerErrorFromStatus(this.name, response.status, text);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProviderError(`${this.name} returned a non-JSON body`, this.name, 'upstream', {
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (!isRecord(body)) {
      throw new ProviderError(`${this.name} returned an unexpected body`, this.name, 'upstream');
    }
    return body;
  }

  normalize(native: DashScopeResponse, model: string): UnifiedResponse {
    const output = readRecord(native, 'output');
    const choices: UnifiedChoice[] = [];

    const text = readString(output, 'text');
    if (text !== undefined) {
      choices.push({
        index: 0,
        message: { role: 'assistant', content: text },
        finish_reason: readString(output, 'finish_reason') ?? 'stop',
      });
    } else {
      readRecords(output, 'choices').forEach((choice, index) => {
        const message = readRecord(choice, 'message');
        const reasoning = readString(message, 'reasoning_content');
        const toolCalls = readToolCalls(message);
        choices.push({
          index,
          message: {
            role: 'assistant',
            content: readContent(message),
            ...(reasoning ? { reasoning_content: reasoning } : {}),
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: readString(choice, 'finish_reason') ?? 'stop',
        });
      });
    }

    const usage = readRecord(native, 'usage');
    return {
      id: readString(native, 'request_id') ?? uuidv4(),
      model,
      created: epochSeconds(),
      choices,
      usage: buildUsage(
        readNumber(usage, 'input_tokens'),
        readNumber(usage, 'output_tokens'),
        readNumber(usage, 'total_tokens')
      ),
    };
  }
}
