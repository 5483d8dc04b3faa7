import { z } from '@hono/zod-openapi';
import { CONTENT_TYPES } from '@imgtex/core';

export const CONTENT_TYPE_SELECTORS = ['equation', 'table', 'diagram', 'document', 'auto'] as const;

export type ContentTypeSelector = (typeof CONTENT_TYPE_SELECTORS)[number];

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

export const ConvertFormSchema = z.object({
  file: z.instanceof(File).openapi({
    type: 'string',
    format: 'binary',
    description: 'Image file to convert (PNG, JPEG, GIF, WEBP, BMP or TIFF)',
  }),
  contentType: z.enum(CONTENT_TYPE_SELECTORS).default('auto').openapi({
    example: 'equation',
    description: 'Type of content to convert; "auto" detects it from the model output',
  }),
  inline: z
    .enum(['true', 'false'])
    .optional()
    .default('false')
    .transform((val) => val === 'true')
    .openapi({
      example: 'false',
      description: 'Format equations as inline math (equation type only)',
    }),
  caption: optionalText.openapi({
    example: 'Results',
    description: 'Table caption (table type only)',
  }),
  title: optionalText.openapi({
    example: 'My Paper',
    description: 'Document title (document type only)',
  }),
  author: optionalText.openapi({
    example: 'A. Author',
    description: 'Document author (document type only, requires a title)',
  }),
});

export const ConvertResponseSchema = z.object({
  latexCode: z.string().openapi({
    example: '\\begin{equation}\nE = mc^2\n\\end{equation}',
    description: 'Generated LaTeX code',
  }),
  contentType: z.enum(CONTENT_TYPES).openapi({
    example: 'equation',
    description: 'Declared or detected content type',
  }),
  isValid: z.boolean().openapi({
    example: true,
    description: 'Whether the LaTeX passed structural validation',
  }),
  validationError: z.string().nullable().openapi({
    example: null,
    description: 'Validation error message if validation failed',
  }),
});

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: z.string().openapi({ example: 'Conversion failed' }),
  detail: z.string().optional().openapi({ example: 'Image file not found' }),
  errors: z.array(z.string()).optional(),
});

export type ConvertForm = z.infer<typeof ConvertFormSchema>;
export type ConvertResponse = z.infer<typeof ConvertResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
