/**
 * Model Relay - Provider Module Exports
 */

// Base provider
export * from './base-provider.js';

// Registry
export * from './registry.js';

// Concrete providers
export { AliyunProvider, type DashScopeResponse } from './aliyun-provider.js';
export { DeepSeekProvider } from './deepseek-provider.js';
export { GeminiProvider, mapFinishReason } from './gemini-provider.js';
export { OllamaProvider } from './ollama-provider.js';

// Helpers
export { categoryForStatus, providerErrorFromStatus, asProviderError } from './failures.js';
export { checkParameterShape, clamp } from './parameters.js';
