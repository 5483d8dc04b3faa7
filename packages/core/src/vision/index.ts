export { VisionGateway, type ProviderAvailability, type VisionGatewayOptions } from './gateway';
export { AnthropicVisionProvider, OpenAIVisionProvider, createSdkProvider } from './providers';
export {
  DEFAULT_MAX_TOKENS,
  type ProviderFactory,
  type ProviderSettings,
  type VisionProvider,
  type VisionRequest,
} from './types';
