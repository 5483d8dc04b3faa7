export {
  ImageToLatexConverter,
  type ConverterOptions,
  type DocumentConversionOptions,
  type FormattedConversion,
  type ImageAnalyzer,
} from './converter';
export { CONTENT_PROMPTS, GENERAL_PROMPT, promptFor } from './prompts';
export { createConverter, type ConverterBundle, type CreateConverterOptions } from './factory';
