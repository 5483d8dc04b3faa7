import type { ProviderFactory } from '../types';
import { AnthropicVisionProvider } from './anthropic';
import { OpenAIVisionProvider } from './openai';

export { AnthropicVisionProvider } from './anthropic';
export { OpenAIVisionProvider } from './openai';

export const createSdkProvider: ProviderFactory = (name, settings) => {
  switch (name) {
    case 'anthropic':
      return new AnthropicVisionProvider(settings);
    case 'openai':
      return new OpenAIVisionProvider(settings);
  }
};
