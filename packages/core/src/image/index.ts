export {
  DEFAULT_MEDIA_TYPE,
  SUPPORTED_FORMATS,
  detectImage,
  detectMediaType,
  isSupportedFormat,
  type DetectedImage,
  type ImageMediaType,
  type SupportedFormat,
} from './format';
export {
  DEFAULT_MAX_IMAGE_SIZE_BYTES,
  getImageInfo,
  validateImage,
  type ValidateImageOptions,
} from './validator';
export { downscaleImage, preprocessImage, processedPathFor, type PreprocessOptions } from './preprocess';
