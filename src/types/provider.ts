/**
 * Model Relay - Provider Types
 * Type definitions for text-generation providers
 */

// ============================================
// Request Types
// ============================================

export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * One part of a multimodal message, forwarded as supplied
 * (DashScope VL models take `{ image }` and `{ text }` parts)
 */
export type ContentPart = Record<string, unknown>;

export type MessageContent = string | ContentPart[];

/**
 * Chat message structure
 */
export interface ChatMessage {
  role: MessageRole;
  content: MessageContent;
}

/**
 * Message with plain-text content, for providers that take no content parts
 */
export interface TextMessage extends ChatMessage {
  content: string;
}

/**
 * Caller-supplied task parameters. Opaque apart from the keys the
 * relay validates; stored as supplied.
 */
export type TaskParameters = Record<string, unknown>;

/**
 * Parameters after provider validation: messages always present,
 * provider defaults and clamps applied.
 */
export interface PreparedParameters {
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  /** Provider-specific keys forwarded as supplied */
  extra: Record<string, unknown>;
}

// ============================================
// Unified Response (OpenAI-compatible)
// ============================================

export interface FunctionCall {
  name: string;
  /** JSON-encoded arguments, as the model produced them */
  arguments: string;
}

export interface ToolCall {
  id: string;
  type: string;
  function: FunctionCall;
}

export interface UnifiedMessage {
  role: string;
  content: string;
  reasoning_content?: string;
  tool_calls?: ToolCall[];
  /** Legacy single function call */
  function_call?: FunctionCall;
}

export interface UnifiedChoice {
  index: number;
  message: UnifiedMessage;
  finish_reason: string | null;
}

export interface UnifiedUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/**
 * Response schema every provider normalizes into
 */
export interface UnifiedResponse {
  id: string;
  model: string;
  /** Epoch seconds */
  created: number;
  choices: UnifiedChoice[];
  usage: UnifiedUsage;
}

// ============================================
// Provider Configuration
// ============================================

/**
 * Configuration-derived description of a provider
 */
export interface ProviderDescriptor {
  name: string;
  models: readonly string[];
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Options for a single provider invocation
 */
export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Provider statistics
 */
export interface ProviderStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalTokens: number;
  totalLatency: number;
  averageLatency: number;
  lastErrors: Array<{ message: string; timestamp: string }>;
}

// ============================================
// Execution Configuration
// ============================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
