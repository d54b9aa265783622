/**
 * Model Relay - Provider Registry
 * Static name -> provider map, populated once at startup and then frozen
 */

import type { ProviderDescriptor } from '../types/index.js';
import { ConfigurationError, ValidationError } from '../core/errors.js';
import { PROVIDER_NAMES, type ProviderName } from '../config/constants.js';
import { BaseProvider, type ProviderSummary } from './base-provider.js';
import { AliyunProvider } from './aliyun-provider.js';
import { DeepSeekProvider } from './deepseek-provider.js';
import { GeminiProvider } from './gemini-provider.js';
import { OllamaProvider } from './ollama-provider.js';

/**
 * Provider Registry - Manages the configured providers
 */
export class ProviderRegistry {
  private providers: Map<string, BaseProvider> = new Map();
  private frozen = false;

  /**
   * Register a provider with the registry
   */
  register(provider: BaseProvider): void {
    if (this.frozen) {
      throw new ConfigurationError(`Provider registry is frozen; cannot register '${provider.getName()}'`);
    }
    if (this.providers.has(provider.getName())) {
      throw new ConfigurationError(`Provider '${provider.getName()}' is already registered`);
    }
    this.providers.set(provider.getName(), provider);
  }

  /**
   * Close the registry to further registration
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Get a provider by name
   */
  get(name: string): BaseProvider | null {
    return this.providers.get(name) ?? null;
  }

  /**
   * Get a provider by name, rejecting unknown names
   */
  require(name: string): BaseProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ValidationError(
        `Provider '${name}' not supported. Supported providers: ${this.getProviderNames().join(', ')}`,
        'provider'
      );
    }
    return provider;
  }

  /**
   * Check if a provider is registered
   */
  has(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * Get all registered provider names
   */
  getProviderNames(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Get number of registered providers
   */
  get size(): number {
    return this.providers.size;
  }

  describe(): ProviderSummary[] {
    return Array.from(this.providers.values(), (provider) => provider.describe());
  }
}

const PROVIDER_FACTORIES: Record<ProviderName, (descriptor: ProviderDescriptor) => BaseProvider> = {
  aliyun: (descriptor) => new AliyunProvider(descriptor),
  deepseek: (descriptor) => new DeepSeekProvider(descriptor),
  gemini: (descriptor) => new GeminiProvider(descriptor),
  ollama: (descriptor) => new OllamaProvider(descriptor),
};

function toProviderName(name: string): ProviderName {
  const known = PROVIDER_NAMES.find((candidate) => candidate === name);
  if (!known) {
    throw new ConfigurationError(`Unknown provider '${name}'. Known providers: ${PROVIDER_NAMES.join(', ')}`);
  }
  return known;
}

/**
 * Build the frozen registry from configured provider descriptors
 */
export function createProviderRegistry(descriptors: readonly ProviderDescriptor[]): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const descriptor of descriptors) {
    registry.register(PROVIDER_FACTORIES[toProviderName(descriptor.name)](descriptor));
  }
  return registry.freeze();
}
