export type ErrorCode = 'IMAGE_INVALID' | 'NO_CREDENTIALS' | 'VISION_GATEWAY' | 'CONVERSION' | 'CONFIG';

export class ImgTexError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad path, oversized file or unsupported format. */
export class ImageInvalidError extends ImgTexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IMAGE_INVALID', message, options);
  }
}

export class NoCredentialsError extends ImgTexError {
  constructor(message: string) {
    super('NO_CREDENTIALS', message);
  }
}

export class VisionGatewayError extends ImgTexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VISION_GATEWAY', message, options);
  }
}

export class ConversionError extends ImgTexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONVERSION', message, options);
  }
}

export class ConfigError extends ImgTexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
