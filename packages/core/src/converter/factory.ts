import type { ImgTexConfig } from '../config';
import type { Logger } from '../logger';
import { VisionGateway, type ProviderFactory } from '../vision';
import { ImageToLatexConverter } from './converter';

export interface CreateConverterOptions {
  logger?: Logger;
  validateOutput?: boolean;
  preprocess?: boolean;
  providerFactory?: ProviderFactory;
}

export interface ConverterBundle {
  gateway: VisionGateway;
  converter: ImageToLatexConverter;
}

/**
 * Wire a gateway and converter from configuration. Throws
 * `NoCredentialsError` when neither API key is set.
 */
export function createConverter(
  config: ImgTexConfig,
  options: CreateConverterOptions = {}
): ConverterBundle {
  const gateway = new VisionGateway({
    anthropicApiKey: config.anthropicApiKey,
    openaiApiKey: config.openaiApiKey,
    primary: config.primaryModel,
    fallback: config.fallbackModel,
    anthropicModel: config.anthropicModel,
    openaiModel: config.openaiModel,
    logger: options.logger,
    providerFactory: options.providerFactory,
  });

  const converter = new ImageToLatexConverter({
    gateway,
    logger: options.logger,
    validateOutput: options.validateOutput,
    preprocess: options.preprocess,
    maxImageSizeBytes: config.maxImageSizeBytes,
    maxImageDimension: config.maxImageDimension,
  });

  return { gateway, converter };
}
