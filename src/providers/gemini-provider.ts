/**
 * Model Relay - Gemini Provider
 * Google Gemini via @google/generative-ai
 */

import {
  type Content,
  FinishReason,
  type GenerateContentResponse,
  GoogleGenerativeAI,
} from '@google/generative-ai';
import { v4 as uuidv4 } from 'uuid';
import type { InvokeOptions, PreparedParameters, UnifiedResponse } from '../types/index.js';
import { BaseProvider } from './base-provider.js';
import { asProviderError } from './failures.js';
import { clamp, requireTextMessages } from './parameters.js';
import { buildUsage, epochSeconds } from './records.js';

const DEFAULT_MAX_TOKENS = 2048;

export function mapFinishReason(reason: FinishReason | undefined): string | null {
  switch (reason) {
    case undefined:
      return null;
    case FinishReason.STOP:
      return 'stop';
    case FinishReason.MAX_TOKENS:
      return 'length';
    case FinishReason.SAFETY:
    case FinishReason.RECITATION:
      return 'content_filter';
    default:
      return String(reason).toLowerCase();
  }
}

export class GeminiProvider extends BaseProvider<GenerateContentResponse> {
  private genAI: GoogleGenerativeAI | null = null;

  protected prepare(_model: string, parameters: PreparedParameters): PreparedParameters {
    return {
      messages: requireTextMessages(parameters.messages, this.name),
      max_tokens: parameters.max_tokens ?? DEFAULT_MAX_TOKENS,
      temperature: parameters.temperature === undefined ? undefined : clamp(parameters.temperature, 0, 2),
      top_p: parameters.top_p === undefined ? undefined : clamp(parameters.top_p, 0, 1),
      extra: parameters.extra,
    };
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.genAI) {
      this.genAI = new GoogleGenerativeAI(this.requireApiKey());
    }
    return this.genAI;
  }

  async invoke(
    model: string,
    parameters: PreparedParameters,
    options: InvokeOptions = {}
  ): Promise<GenerateContentResponse> {
    const genAI = this.getClient();
    const messages = requireTextMessages(parameters.messages, this.name);

    const systemInstruction = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n');

    const contents: Content[] = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    const generativeModel = genAI.getGenerativeModel(
      {
        model,
        ...(systemInstruction ? { systemInstruction } : {}),
        generationConfig: {
          maxOutputTokens: parameters.max_tokens,
          temperature: parameters.temperature,
          topP: parameters.top_p,
        },
      },
      { baseUrl: this.descriptor.baseUrl, timeout: this.descriptor.timeoutMs }
    );

    try {
      const result = await generativeModel.generateContent({ contents }, { signal: options.signal });
      return result.response;
    } catch (error) {
      throw asProviderError(this.name, error) ?? error;
    }
  }

  normalize(native: GenerateContentResponse, model: string): UnifiedResponse {
    const candidates = native.candidates ?? [];
    const usage = native.usageMetadata;

    return {
      id: uuidv4(),
      model,
      created: epochSeconds(),
      choices: candidates.map((candidate, position) => ({
        index: candidate.index ?? position,
        message: {
          role: 'assistant',
          content: (candidate.content?.parts ?? []).map((part) => part.text ?? '').join(''),
        },
        finish_reason: mapFinishReason(candidate.finishReason),
      })),
      usage: buildUsage(usage?.promptTokenCount, usage?.candidatesTokenCount, usage?.totalTokenCount),
    };
  }
}
