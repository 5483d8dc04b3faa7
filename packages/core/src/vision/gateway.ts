import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_OPENAI_MODEL } from '../config';
import { NoCredentialsError, VisionGatewayError, errorMessage } from '../errors';
import { detectMediaType } from '../image';
import { silentLogger, type Logger } from '../logger';
import type { ActiveProvider, ModelProvider } from '../types';
import { createSdkProvider } from './providers';
import type { ProviderFactory, VisionProvider, VisionRequest } from './types';

export interface VisionGatewayOptions {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  primary?: ActiveProvider;
  fallback?: ModelProvider;
  anthropicModel?: string;
  openaiModel?: string;
  maxTokens?: number;
  logger?: Logger;
  /** Builds the provider for each credential; defaults to the vendor SDKs. */
  providerFactory?: ProviderFactory;
}

export type ProviderAvailability = Record<ActiveProvider, boolean>;

/**
 * Sends an image and a prompt to a vision model, trying the primary
 * provider first and the fallback provider at most once after it.
 */
export class VisionGateway {
  readonly primary: ActiveProvider;
  readonly fallback: ModelProvider;
  private providers = new Map<ActiveProvider, VisionProvider>();
  private logger: Logger;

  constructor(options: VisionGatewayOptions = {}) {
    const factory = options.providerFactory ?? createSdkProvider;
    this.primary = options.primary ?? 'anthropic';
    this.fallback = options.fallback ?? 'openai';
    this.logger = options.logger ?? silentLogger;

    if (options.anthropicApiKey) {
      this.providers.set(
        'anthropic',
        factory('anthropic', {
          apiKey: options.anthropicApiKey,
          model: options.anthropicModel ?? DEFAULT_ANTHROPIC_MODEL,
          maxTokens: options.maxTokens,
        })
      );
    }

    if (options.openaiApiKey) {
      this.providers.set(
        'openai',
        factory('openai', {
          apiKey: options.openaiApiKey,
          model: options.openaiModel ?? DEFAULT_OPENAI_MODEL,
          maxTokens: options.maxTokens,
        })
      );
    }

    if (this.providers.size === 0) {
      throw new NoCredentialsError(
        'No API keys provided. Set ANTHROPIC_API_KEY or OPENAI_API_KEY environment variable, or pass keys to the constructor.'
      );
    }
  }

  availableProviders(): ProviderAvailability {
    return {
      anthropic: this.providers.has('anthropic'),
      openai: this.providers.has('openai'),
    };
  }

  /** Fallback provider in effect, or `null` when there is none. */
  get fallbackProvider(): ActiveProvider | null {
    if (this.fallback === 'none' || this.fallback === this.primary) {
      return null;
    }
    return this.fallback;
  }

  async analyze(imageBytes: Uint8Array, prompt: string, allowFallback = true): Promise<string> {
    const request: VisionRequest = {
      imageBase64: Buffer.from(imageBytes).toString('base64'),
      mediaType: await detectMediaType(imageBytes),
      prompt,
    };

    let primaryError: unknown;
    try {
      return await this.callProvider(this.primary, request);
    } catch (error) {
      primaryError = error;
      this.logger.warn(`Primary model (${this.primary}) failed: ${errorMessage(error)}`);
    }

    const fallback = allowFallback ? this.fallbackProvider : null;
    if (!fallback) {
      throw new VisionGatewayError(
        `Primary model (${this.primary}) failed and no fallback is available: ${errorMessage(primaryError)}`,
        { cause: primaryError }
      );
    }

    this.logger.info(`Attempting fallback model: ${fallback}`);
    try {
      return await this.callProvider(fallback, request);
    } catch (error) {
      this.logger.error(`Fallback model (${fallback}) failed: ${errorMessage(error)}`);
      throw new VisionGatewayError(
        `Both primary and fallback models failed. ${this.primary}: ${errorMessage(primaryError)}; ${fallback}: ${errorMessage(error)}`,
        { cause: new AggregateError([primaryError, error]) }
      );
    }
  }

  private async callProvider(name: ActiveProvider, request: VisionRequest): Promise<string> {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new Error(`${name} API key not configured`);
    }
    this.logger.info(`Calling ${name} model: ${provider.model}`);
    return provider.call(request);
  }
}
