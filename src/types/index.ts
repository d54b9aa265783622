// Task lifecycle types (TaskStatus, Task, TaskError, ...)
export * from './task.js';

// Provider types (UnifiedResponse, ChatMessage, ProviderDescriptor, ...)
export * from './provider.js';

// Auth types (Principal, Credential, ...)
export * from './auth.js';
