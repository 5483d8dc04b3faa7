import { readFile, stat } from 'fs/promises';
import path from 'path';
import { DEFAULT_MAX_IMAGE_SIZE_MB } from '../config';
import { ImageInvalidError, errorMessage } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { ImageInfo } from '../types';
import { SUPPORTED_FORMATS, detectImage, isSupportedFormat } from './format';

export const DEFAULT_MAX_IMAGE_SIZE_BYTES = DEFAULT_MAX_IMAGE_SIZE_MB * 1024 * 1024;

export interface ValidateImageOptions {
  maxSizeBytes?: number;
  logger?: Logger;
}

const toMb = (bytes: number) => bytes / (1024 * 1024);

async function statFile(imagePath: string) {
  try {
    return await stat(imagePath);
  } catch (error) {
    throw new ImageInvalidError(`Image file not found: ${imagePath}`, { cause: error });
  }
}

/**
 * Read format, dimensions and size of an image. The format comes from
 * the file contents; the extension is ignored.
 */
export async function getImageInfo(imagePath: string): Promise<ImageInfo> {
  const stats = await statFile(imagePath);
  if (!stats.isFile()) {
    throw new ImageInvalidError(`Path is not a file: ${imagePath}`);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(imagePath);
  } catch (error) {
    throw new ImageInvalidError(`Failed to open image: ${errorMessage(error)}`, { cause: error });
  }

  const detected = await detectImage(bytes);
  if (!detected) {
    throw new ImageInvalidError(`Failed to open image: ${path.basename(imagePath)} is not a readable image`);
  }

  return {
    path: imagePath,
    format: detected.format,
    width: detected.width,
    height: detected.height,
    fileSizeBytes: stats.size,
    fileSizeMb: toMb(stats.size),
    channels: detected.channels,
    space: detected.space,
  };
}

/**
 * Gate run before any network call: the path must be an existing regular
 * file no larger than `maxSizeBytes` holding a supported image format.
 */
export async function validateImage(
  imagePath: string,
  options: ValidateImageOptions = {}
): Promise<ImageInfo> {
  const { maxSizeBytes = DEFAULT_MAX_IMAGE_SIZE_BYTES, logger = silentLogger } = options;

  const stats = await statFile(imagePath);
  if (!stats.isFile()) {
    throw new ImageInvalidError(`Path is not a file: ${imagePath}`);
  }

  if (stats.size > maxSizeBytes) {
    throw new ImageInvalidError(
      `Image file too large: ${toMb(stats.size).toFixed(2)}MB (max: ${toMb(maxSizeBytes).toFixed(2)}MB)`
    );
  }

  const info = await getImageInfo(imagePath);
  if (!isSupportedFormat(info.format)) {
    throw new ImageInvalidError(
      `Unsupported image format: ${info.format}. Supported: ${SUPPORTED_FORMATS.join(', ')}`
    );
  }

  logger.info(`Validated image: ${path.basename(imagePath)} (${info.format}, ${info.width}x${info.height})`);
  return info;
}
