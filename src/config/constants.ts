/**
 * Model Relay - Constants
 * Provider defaults and service-wide limits
 */

export const SERVICE_NAME = 'model-relay';

export const PROVIDER_NAMES = ['aliyun', 'deepseek', 'gemini', 'ollama'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Models each provider accepts when `<PROVIDER>_SUPPORTED_MODELS` is unset
 */
export const DEFAULT_SUPPORTED_MODELS: Record<ProviderName, readonly string[]> = {
  aliyun: [
    'qwen-turbo',
    'qwen-plus',
    'qwen-max',
    'qwen3-235b-a22b',
    'qwen3-30b-a3b',
    'qwen-plus-latest',
    'qwen-turbo-latest',
    'qwen-vl-max',
    'qwen-vl-plus',
  ],
  deepseek: ['deepseek-chat', 'deepseek-reasoner'],
  gemini: ['gemini-2.0-flash', 'gemini-1.5-pro', 'gemini-1.5-flash'],
  ollama: ['llama3.2', 'qwen2.5', 'mistral'],
};

export const DEFAULT_BASE_URLS: Record<ProviderName, string | undefined> = {
  aliyun: 'https://dashscope.aliyuncs.com/api/v1/services/aigc/text-generation/generation',
  deepseek: 'https://api.deepseek.com',
  gemini: undefined,
  ollama: 'http://127.0.0.1:11434',
};

/** Global task time limit in seconds */
export const DEFAULT_TASK_TIME_LIMIT_S = 300;

export const TASK_LIST_LIMITS = {
  defaultPageSize: 20,
  maxPageSize: 100,
} as const;
