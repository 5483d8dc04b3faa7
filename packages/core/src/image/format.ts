import sharp from 'sharp';

export const SUPPORTED_FORMATS = ['PNG', 'JPEG', 'GIF', 'WEBP', 'BMP', 'TIFF'] as const;

export type SupportedFormat = (typeof SUPPORTED_FORMATS)[number];

export interface DetectedImage {
  /** Upper-case format name as decoded, e.g. `PNG` or `SVG`. */
  format: string;
  width: number;
  height: number;
  channels?: number;
  space?: string;
}

export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

const MEDIA_TYPES: Partial<Record<string, ImageMediaType>> = {
  PNG: 'image/png',
  JPEG: 'image/jpeg',
  GIF: 'image/gif',
  WEBP: 'image/webp',
};

export const DEFAULT_MEDIA_TYPE: ImageMediaType = 'image/png';

export function isSupportedFormat(format: string): format is SupportedFormat {
  return (SUPPORTED_FORMATS as readonly string[]).includes(format);
}

const DIB_HEADER_SIZES = new Set([12, 40, 52, 56, 108, 124]);

// libvips has no BMP loader, so the header is read directly: "BM" magic,
// pixel-data offset at 10, then the DIB header whose size picks the layout.
// The 12-byte core header stores 16-bit dimensions; the others 32-bit.
function readBmpHeader(bytes: Uint8Array): DetectedImage | null {
  if (bytes.length < 26 || bytes[0] !== 0x42 || bytes[1] !== 0x4d) {
    return null;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const dataOffset = view.getUint32(10, true);
  const headerSize = view.getUint32(14, true);
  if (!DIB_HEADER_SIZES.has(headerSize) || 14 + headerSize > bytes.length) {
    return null;
  }
  if (dataOffset < 14 + headerSize || dataOffset > bytes.length) {
    return null;
  }

  let width: number;
  let height: number;
  let planes: number;
  if (headerSize === 12) {
    width = view.getUint16(18, true);
    height = view.getUint16(20, true);
    planes = view.getUint16(22, true);
  } else {
    width = view.getInt32(18, true);
    height = Math.abs(view.getInt32(22, true));
    planes = view.getUint16(26, true);
  }

  if (planes !== 1 || width <= 0 || height === 0) {
    return null;
  }
  return { format: 'BMP', width, height };
}

/**
 * Decode just enough of an image to learn its real format and size.
 * Returns `null` for data that is not a recognisable image.
 */
export async function detectImage(bytes: Uint8Array): Promise<DetectedImage | null> {
  const bmp = readBmpHeader(bytes);
  if (bmp) return bmp;

  try {
    const metadata = await sharp(bytes).metadata();
    if (!metadata.format) return null;
    return {
      format: metadata.format.toUpperCase(),
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      channels: metadata.channels,
      space: metadata.space,
    };
  } catch {
    return null;
  }
}

/** Media type to send alongside base64 image data. */
export async function detectMediaType(bytes: Uint8Array): Promise<ImageMediaType> {
  const detected = await detectImage(bytes);
  return (detected && MEDIA_TYPES[detected.format]) ?? DEFAULT_MEDIA_TYPE;
}
