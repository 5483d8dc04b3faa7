import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { VERSION } from '@imgtex/core';
import type { AppEnv } from '../../context';
import { ErrorResponseSchema, HealthResponseSchema } from '../../schemas';

const health = new OpenAPIHono<AppEnv>();

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check endpoint',
  description: 'Returns the API status, version, and which vision providers are configured',
  responses: {
    200: {
      description: 'Health check response',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
    503: {
      description: 'Service started without usable credentials',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

health.openapi(healthRoute, (c) => {
  const { providers, initError } = c.get('services');

  if (!providers) {
    return c.json(
      {
        success: false as const,
        error: 'API not initialized. Check API keys configuration.',
        detail: initError,
      },
      503
    );
  }

  return c.json(
    {
      status: 'healthy',
      version: VERSION,
      modelsAvailable: providers,
    },
    200
  );
});

export default health;
