import type { ImageMediaType } from '../image';
import type { ActiveProvider } from '../types';

export interface VisionRequest {
  imageBase64: string;
  mediaType: ImageMediaType;
  prompt: string;
}

/** One vision-capable model behind a uniform call contract. */
export interface VisionProvider {
  readonly name: ActiveProvider;
  readonly model: string;
  call(request: VisionRequest): Promise<string>;
}

export interface ProviderSettings {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export type ProviderFactory = (name: ActiveProvider, settings: ProviderSettings) => VisionProvider;

export const DEFAULT_MAX_TOKENS = 4096;
