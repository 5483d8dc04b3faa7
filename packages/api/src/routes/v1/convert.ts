import { rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { v4 as uuidv4 } from 'uuid';
import {
  ConversionError,
  ImageInvalidError,
  errorMessage,
  type ContentType,
  type ConversionResult,
  type ImageToLatexConverter,
} from '@imgtex/core';
import type { AppEnv } from '../../context';
import {
  ConvertFormSchema,
  ConvertResponseSchema,
  ErrorResponseSchema,
  type ConvertForm,
  type ConvertResponse,
} from '../../schemas';

const convert = new OpenAPIHono<AppEnv>({
  defaultHook: (result, c) => {
    if (!result.success) {
      return c.json(
        {
          success: false as const,
          error: 'Invalid request',
          errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
        400
      );
    }
  },
});

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

const convertRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Conversion'],
  summary: 'Convert an image to LaTeX',
  description:
    'Upload an image of an equation, table, diagram or document page and receive LaTeX. Example: `curl -X POST <url> -F "file=@equation.png" -F "contentType=equation"`',
  request: {
    body: {
      required: true,
      content: {
        'multipart/form-data': {
          schema: ConvertFormSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Conversion result',
      content: {
        'application/json': {
          schema: ConvertResponseSchema,
        },
      },
    },
    400: { description: 'Invalid upload or image', content: errorContent },
    500: { description: 'Conversion failed', content: errorContent },
    503: { description: 'Service started without usable credentials', content: errorContent },
  },
});

function toResponse(latexCode: string, contentType: ContentType, result: ConversionResult): ConvertResponse {
  return {
    latexCode,
    contentType,
    isValid: result.isValid,
    validationError: result.validationError ?? null,
  };
}

async function runConversion(
  converter: ImageToLatexConverter,
  form: ConvertForm,
  imagePath: string
): Promise<ConvertResponse> {
  switch (form.contentType) {
    case 'equation': {
      const { latexCode, result } = await converter.convertEquation(imagePath, form.inline);
      return toResponse(latexCode, 'equation', result);
    }
    case 'table': {
      const { latexCode, result } = await converter.convertTable(imagePath, form.caption);
      return toResponse(latexCode, 'table', result);
    }
    case 'diagram': {
      const { latexCode, result } = await converter.convertDiagram(imagePath);
      return toResponse(latexCode, 'diagram', result);
    }
    case 'document': {
      const { latexCode, result } = await converter.convertToDocument(imagePath, {
        title: form.title,
        author: form.author,
      });
      return toResponse(latexCode, 'document', result);
    }
    case 'auto': {
      const result = await converter.convert(imagePath);
      return toResponse(result.latexCode, result.contentType, result);
    }
  }
}

function isImageRejection(error: unknown): boolean {
  return (
    error instanceof ImageInvalidError ||
    (error instanceof ConversionError && error.cause instanceof ImageInvalidError)
  );
}

convert.openapi(convertRoute, async (c) => {
  const { converter, logger, initError } = c.get('services');

  if (!converter) {
    return c.json(
      {
        success: false as const,
        error: 'API not initialized. Check API keys configuration.',
        detail: initError,
      },
      503
    );
  }

  const form = c.req.valid('form');

  if (!form.file.type.startsWith('image/')) {
    return c.json(
      {
        success: false as const,
        error: 'Invalid file type',
        detail: `Invalid file type: ${form.file.type || 'unknown'}. Must be an image.`,
      },
      400
    );
  }

  const tempPath = path.join(os.tmpdir(), `imgtex-${uuidv4()}${path.extname(form.file.name)}`);

  try {
    const bytes = Buffer.from(await form.file.arrayBuffer());
    await writeFile(tempPath, bytes);
    logger.info(`Processing image: ${form.file.name} (${bytes.length} bytes)`);

    const response = await runConversion(converter, form, tempPath);
    logger.info(`Conversion successful: ${response.contentType}`);
    return c.json(response, 200);
  } catch (error) {
    const detail = errorMessage(error);

    if (isImageRejection(error)) {
      logger.error(`Image validation error: ${detail}`);
      return c.json({ success: false as const, error: 'Invalid image', detail }, 400);
    }

    if (error instanceof ConversionError) {
      logger.error(`Conversion error: ${detail}`);
      return c.json({ success: false as const, error: 'Conversion failed', detail }, 500);
    }

    logger.error(`Unexpected error: ${detail}`);
    return c.json({ success: false as const, error: 'Unexpected error', detail }, 500);
  } finally {
    await rm(tempPath, { force: true });
  }
});

export default convert;
