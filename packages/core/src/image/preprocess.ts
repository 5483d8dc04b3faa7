import { readFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { DEFAULT_MAX_IMAGE_DIMENSION } from '../config';
import { ImageInvalidError, errorMessage } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { getImageInfo } from './validator';

export interface PreprocessOptions {
  maxDimension?: number;
  logger?: Logger;
}

interface ResizeTarget {
  width: number;
  height: number;
}

export function processedPathFor(imagePath: string): string {
  const { dir, name, ext } = path.parse(imagePath);
  return path.join(dir, `${name}_processed${ext}`);
}

/** Target size for an image whose longest edge exceeds `maxDimension`, else `null`. */
async function planResize(
  imagePath: string,
  maxDimension: number,
  logger: Logger
): Promise<ResizeTarget | null> {
  const info = await getImageInfo(imagePath);
  const longest = Math.max(info.width, info.height);

  if (longest <= maxDimension) {
    logger.debug('Image size acceptable, no preprocessing needed');
    return null;
  }

  if (info.format === 'BMP') {
    logger.warn(`Cannot resize BMP image ${path.basename(imagePath)}; sending it unchanged`);
    return null;
  }

  const ratio = maxDimension / longest;
  const width = Math.max(1, Math.floor(info.width * ratio));
  const height = Math.max(1, Math.floor(info.height * ratio));

  logger.info(
    `Resizing image from ${info.width}x${info.height} to ${width}x${height} (maxDimension=${maxDimension})`
  );
  return { width, height };
}

function resizer(imagePath: string, target: ResizeTarget) {
  return sharp(imagePath).resize(target.width, target.height, {
    fit: 'fill',
    kernel: sharp.kernel.lanczos3,
  });
}

/**
 * Downscale an image whose longest edge exceeds `maxDimension`, keeping
 * the aspect ratio. The result is written next to the original as
 * `<name>_processed<ext>` and its path returned; the original is left
 * untouched. Images already within bounds return their own path.
 */
export async function preprocessImage(
  imagePath: string,
  options: PreprocessOptions = {}
): Promise<string> {
  const { maxDimension = DEFAULT_MAX_IMAGE_DIMENSION, logger = silentLogger } = options;
  const target = await planResize(imagePath, maxDimension, logger);
  if (!target) {
    return imagePath;
  }

  const outputPath = processedPathFor(imagePath);
  try {
    await resizer(imagePath, target).toFile(outputPath);
  } catch (error) {
    throw new ImageInvalidError(`Failed to resize image: ${errorMessage(error)}`, { cause: error });
  }
  return outputPath;
}

/**
 * In-memory variant of {@link preprocessImage}: returns the bytes to send,
 * downscaled when needed. Nothing is written to disk.
 */
export async function downscaleImage(
  imagePath: string,
  options: PreprocessOptions = {}
): Promise<Buffer> {
  const { maxDimension = DEFAULT_MAX_IMAGE_DIMENSION, logger = silentLogger } = options;
  const target = await planResize(imagePath, maxDimension, logger);

  try {
    return target ? await resizer(imagePath, target).toBuffer() : await readFile(imagePath);
  } catch (error) {
    throw new ImageInvalidError(`Failed to resize image: ${errorMessage(error)}`, { cause: error });
  }
}
