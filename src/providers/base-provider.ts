/**
 * Model Relay - Base Provider Abstract Class
 * Defines the contract for all text-generation providers
 */

import type {
  InvokeOptions,
  PreparedParameters,
  ProviderDescriptor,
  ProviderStats,
  TaskParameters,
  UnifiedResponse,
} from '../types/index.js';
import { ProviderError, ValidationError, getErrorMessage } from '../core/errors.js';
import { checkParameterShape } from './parameters.js';

/**
 * Public view of a provider, served at GET /providers
 */
export interface ProviderSummary {
  name: string;
  models: string[];
  configured: boolean;
  stats: ProviderStats;
}

/**
 * Error record for statistics
 */
interface ErrorRecord {
  error: string;
  timestamp: Date;
}

/**
 * Internal stats tracker
 */
interface InternalStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalTokens: number;
  totalDuration: number;
  errors: ErrorRecord[];
}

/**
 * Abstract Provider
 * Subclasses supply the provider-specific clamps, the upstream call
 * and the normalization of its reply.
 */
export abstract class BaseProvider<TNative = unknown> {
  readonly name: string;
  protected descriptor: ProviderDescriptor;
  protected _stats: InternalStats = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalTokens: 0,
    totalDuration: 0,
    errors: [],
  };

  constructor(descriptor: ProviderDescriptor) {
    this.name = descriptor.name;
    this.descriptor = descriptor;
  }

  /**
   * Apply provider defaults and clamps to shape-checked parameters
   */
  protected abstract prepare(model: string, parameters: PreparedParameters): PreparedParameters;

  /**
   * Call the upstream API. Failures are thrown as ProviderError.
   */
  abstract invoke(model: string, parameters: PreparedParameters, options?: InvokeOptions): Promise<TNative>;

  /**
   * Convert the native reply into the unified response schema
   */
  abstract normalize(native: TNative, model: string): UnifiedResponse;

  getName(): string {
    return this.name;
  }

  supportedModels(): readonly string[] {
    return this.descriptor.models;
  }

  supportsModel(model: string): boolean {
    return this.descriptor.models.includes(model);
  }

  /**
   * Per-attempt timeout configured for this provider
   */
  getTimeoutMs(): number | undefined {
    return this.descriptor.timeoutMs;
  }

  /**
   * Whether the provider has the credentials it needs
   */
  isConfigured(): boolean {
    return Boolean(this.descriptor.apiKey);
  }

  /**
   * Check the model and the parameter shape, then apply provider rules
   */
  validateParameters(model: string, parameters: TaskParameters): PreparedParameters {
    if (!this.supportsModel(model)) {
      throw new ValidationError(
        `Model '${model}' not supported. Supported models: ${this.descriptor.models.join(', ')}`,
        'model'
      );
    }
    return this.prepare(model, checkParameterShape(parameters));
  }

  /**
   * Validate, invoke and normalize in one step, recording statistics
   */
  async complete(model: string, parameters: TaskParameters, options: InvokeOptions = {}): Promise<UnifiedResponse> {
    const prepared = this.validateParameters(model, parameters);
    const startTime = Date.now();

    try {
      const native = await this.invoke(model, prepared, options);
      const response = this.normalize(native, model);
      this.recordSuccess(response.usage.total_tokens, Date.now() - startTime);
      return response;
    } catch (error) {
      this.recordFailure(getErrorMessage(error), Date.now() - startTime);
      throw error;
    }
  }

  getStats(): ProviderStats {
    return {
      totalRequests: this._stats.totalRequests,
      successfulRequests: this._stats.successfulRequests,
      failedRequests: this._stats.failedRequests,
      totalTokens: this._stats.totalTokens,
      totalLatency: this._stats.totalDuration,
      averageLatency: this._stats.totalRequests > 0
        ? this._stats.totalDuration / this._stats.totalRequests
        : 0,
      lastErrors: this._stats.errors.slice(-10).map(e => ({
        message: e.error,
        timestamp: e.timestamp.toISOString()
      }))
    };
  }

  describe(): ProviderSummary {
    return {
      name: this.name,
      models: [...this.descriptor.models],
      configured: this.isConfigured(),
      stats: this.getStats(),
    };
  }

  /**
   * The configured API key; a missing key is an authentication failure
   */
  protected requireApiKey(): string {
    const apiKey = this.descriptor.apiKey;
    if (!apiKey) {
      throw new ProviderError(`${this.name} API key not configured`, this.name, 'authentication');
    }
    return apiKey;
  }

  private recordSuccess(tokens: number, durationMs: number): void {
    this._stats.totalRequests++;
    this._stats.successfulRequests++;
    this._stats.totalTokens += tokens;
    this._stats.totalDuration += durationMs;
  }

  private recordFailure(message: string, durationMs: number): void {
    this._stats.totalRequests++;
    this._stats.failedRequests++;
    this._stats.totalDuration += durationMs;
    this._stats.errors.push({ error: message, timestamp: new Date() });

    // Keep only last 100 errors
    if (this._stats.errors.length > 100) {
      this._stats.errors = this._stats.errors.slice(-100);
    }
  }
}
