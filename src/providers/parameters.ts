/**
 * Parameter shape checks shared by every provider
 */

import type {
  ChatMessage,
  ContentPart,
  MessageContent,
  MessageRole,
  PreparedParameters,
  TaskParameters,
  TextMessage,
} from '../types/index.js';
import { ValidationError } from '../core/errors.js';

const MESSAGE_ROLES: readonly MessageRole[] = ['system', 'user', 'assistant'];

/** Keys the relay interprets; everything else travels in `extra` */
const RESERVED_KEYS = new Set(['prompt', 'messages', 'max_tokens', 'temperature', 'top_p']);

function isContentPart(value: unknown): value is ContentPart {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseContent(value: unknown): MessageContent | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.length > 0 && value.every(isContentPart)) return value;
  return null;
}

function parseMessage(value: unknown): ChatMessage | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('role' in value) || !('content' in value)) return null;

  const knownRole = MESSAGE_ROLES.find((candidate) => candidate === value.role);
  const content = parseContent(value.content);
  if (!knownRole || content === null) return null;

  return { role: knownRole, content };
}

function parseMessages(value: unknown): ChatMessage[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError("Parameter 'messages' must be a non-empty list", 'messages');
  }

  return value.map((item, index) => {
    const message = parseMessage(item);
    if (!message) {
      throw new ValidationError(
        `messages[${index}] must be {role, content} with role one of: ${MESSAGE_ROLES.join(', ')} ` +
          'and content a string or a non-empty list of content parts',
        'messages'
      );
    }
    return message;
  });
}

function optionalNumber(parameters: TaskParameters, key: string): number | undefined {
  const value = parameters[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Parameter '${key}' must be a number`, key);
  }
  return value;
}

/**
 * Validate the generic parameter shape and convert `prompt` into messages
 */
export function checkParameterShape(parameters: TaskParameters): PreparedParameters {
  const { prompt, messages } = parameters;

  if (prompt === undefined && messages === undefined) {
    throw new ValidationError("Parameter 'prompt' or 'messages' is required", 'parameters');
  }
  if (prompt !== undefined && typeof prompt !== 'string') {
    throw new ValidationError("Parameter 'prompt' must be a string", 'prompt');
  }

  const maxTokens = optionalNumber(parameters, 'max_tokens');
  if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens <= 0)) {
    throw new ValidationError("Parameter 'max_tokens' must be a positive integer", 'max_tokens');
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parameters)) {
    if (!RESERVED_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    messages:
      messages !== undefined
        ? parseMessages(messages)
        : [{ role: 'user', content: typeof prompt === 'string' ? prompt : '' }],
    max_tokens: maxTokens,
    temperature: optionalNumber(parameters, 'temperature'),
    top_p: optionalNumber(parameters, 'top_p'),
    extra,
  };
}

/**
 * Narrow messages to plain text for providers that take no content parts
 */
export function requireTextMessages(messages: readonly ChatMessage[], provider: string): TextMessage[] {
  return messages.map(({ role, content }, index) => {
    if (typeof content !== 'string') {
      throw new ValidationError(
        `${provider} accepts text content only; messages[${index}].content must be a string`,
        'messages'
      );
    }
    return { role, content };
  });
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
