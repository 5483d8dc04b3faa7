export const CONTENT_TYPES = ['equation', 'table', 'diagram', 'document', 'unknown'] as const;

/** Kind of scientific content an image holds. */
export type ContentType = (typeof CONTENT_TYPES)[number];

export const MODEL_PROVIDERS = ['anthropic', 'openai', 'none'] as const;

export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

/** A provider that can actually be called. */
export type ActiveProvider = Exclude<ModelProvider, 'none'>;

export interface ConversionResult {
  readonly latexCode: string;
  readonly contentType: ContentType;
  readonly rawResponse: string;
  readonly isValid: boolean;
  readonly validationError?: string;
}

export interface ImageInfo {
  path: string;
  format: string;
  width: number;
  height: number;
  fileSizeBytes: number;
  fileSizeMb: number;
  channels?: number;
  space?: string;
}
