import { readFile } from 'fs/promises';
import { ConversionError, errorMessage } from '../errors';
import { downscaleImage, validateImage } from '../image';
import {
  createFullDocument,
  detectContentType,
  extractLatexCode,
  validateLatex,
  wrapEquation,
  wrapTable,
} from '../latex';
import { silentLogger, type Logger } from '../logger';
import type { ContentType, ConversionResult } from '../types';
import { promptFor } from './prompts';

/** Anything that can turn image bytes plus a prompt into model text. */
export interface ImageAnalyzer {
  analyze(imageBytes: Uint8Array, prompt: string, allowFallback?: boolean): Promise<string>;
}

export interface ConverterOptions {
  gateway: ImageAnalyzer;
  validateOutput?: boolean;
  allowFallback?: boolean;
  maxImageSizeBytes?: number;
  /** Downscale images whose longest edge exceeds this many pixels before sending. */
  maxImageDimension?: number;
  preprocess?: boolean;
  logger?: Logger;
}

export interface FormattedConversion {
  latexCode: string;
  result: ConversionResult;
}

export interface DocumentConversionOptions {
  title?: string;
  author?: string;
  documentClass?: string;
}

/**
 * Turns an image of scientific content into LaTeX: validate the image,
 * ask a vision model, then extract, classify and check what came back.
 */
export class ImageToLatexConverter {
  readonly gateway: ImageAnalyzer;
  private options: ConverterOptions;
  private logger: Logger;

  constructor(options: ConverterOptions) {
    this.gateway = options.gateway;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async convert(imagePath: string, contentType?: ContentType, autoDetect = true): Promise<ConversionResult> {
    try {
      await validateImage(imagePath, {
        maxSizeBytes: this.options.maxImageSizeBytes,
        logger: this.logger,
      });
    } catch (error) {
      throw new ConversionError(`Image validation failed: ${errorMessage(error)}`, { cause: error });
    }

    const hasKnownType = contentType !== undefined && contentType !== 'unknown';
    if (hasKnownType) {
      this.logger.info(`Using specific prompt for content type: ${contentType}`);
    } else {
      this.logger.info('Using general prompt for content detection');
    }

    const imageBytes = await this.loadImage(imagePath);

    let rawResponse: string;
    try {
      rawResponse = await this.gateway.analyze(
        imageBytes,
        promptFor(contentType),
        this.options.allowFallback ?? true
      );
      this.logger.info(`Received response from vision model (${rawResponse.length} chars)`);
    } catch (error) {
      throw new ConversionError(`Vision model failed: ${errorMessage(error)}`, { cause: error });
    }

    const latexCode = extractLatexCode(rawResponse);

    let resolvedType: ContentType;
    if (autoDetect || contentType === undefined) {
      resolvedType = detectContentType(latexCode);
      this.logger.info(`Detected content type: ${resolvedType}`);
    } else {
      resolvedType = contentType;
    }

    if (this.options.validateOutput === false) {
      return { latexCode, contentType: resolvedType, rawResponse, isValid: true };
    }

    const validation = validateLatex(latexCode);
    if (!validation.isValid) {
      this.logger.warn(`LaTeX validation failed: ${validation.error}`);
      return {
        latexCode,
        contentType: resolvedType,
        rawResponse,
        isValid: false,
        validationError: validation.error,
      };
    }

    return { latexCode, contentType: resolvedType, rawResponse, isValid: true };
  }

  async convertEquation(imagePath: string, inline = false): Promise<FormattedConversion> {
    const result = await this.convert(imagePath, 'equation', false);
    return { latexCode: wrapEquation(result.latexCode, inline), result };
  }

  async convertTable(imagePath: string, caption?: string): Promise<FormattedConversion> {
    const result = await this.convert(imagePath, 'table', false);
    return { latexCode: wrapTable(result.latexCode, caption), result };
  }

  async convertDiagram(imagePath: string): Promise<FormattedConversion> {
    const result = await this.convert(imagePath, 'diagram', false);
    return { latexCode: result.latexCode, result };
  }

  async convertToDocument(
    imagePath: string,
    options: DocumentConversionOptions = {}
  ): Promise<FormattedConversion> {
    const result = await this.convert(imagePath, 'document', false);
    return { latexCode: createFullDocument(result.latexCode, options), result };
  }

  private async loadImage(imagePath: string): Promise<Uint8Array> {
    if (!this.options.preprocess) {
      try {
        return await readFile(imagePath);
      } catch (error) {
        throw new ConversionError(`Failed to read image: ${errorMessage(error)}`, { cause: error });
      }
    }

    try {
      return await downscaleImage(imagePath, {
        maxDimension: this.options.maxImageDimension,
        logger: this.logger,
      });
    } catch (error) {
      throw new ConversionError(`Image preprocessing failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
