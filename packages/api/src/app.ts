import { OpenAPIHono } from '@hono/zod-openapi';
import { swaggerUI } from '@hono/swagger-ui';
import { logger } from 'hono/logger';
import { VERSION } from '@imgtex/core';
import type { AppEnv, AppServices } from './context';
import { corsMiddleware } from './middleware/cors';
import { createErrorHandler } from './middleware/error';
import { servicesMiddleware } from './middleware/services';
import v1 from './routes/v1';

export function createApp(services: AppServices) {
  const app = new OpenAPIHono<AppEnv>();

  app.use('*', logger((message, ...rest) => services.logger.info([message, ...rest].join(' '))));
  app.use('*', corsMiddleware(services.config.corsOrigins));
  app.use('*', servicesMiddleware(services));
  app.onError(createErrorHandler(services.logger));

  app.get('/', (c) => {
    return c.json({
      name: 'imgtex',
      version: VERSION,
      description: 'API for converting images of scientific content to LaTeX with vision models',
      endpoints: {
        health: '/api/v1/health',
        convert: 'POST /api/v1/convert',
      },
      documentation: '/api/v1/docs',
      openapi: '/api/v1/openapi.json',
    });
  });

  app.route('/api/v1', v1);

  app.get('/api/', (c) => c.redirect('/api/v1/docs'));

  // OpenAPI document with the server URL taken from the request
  app.doc('/api/v1/openapi.json', (c) => {
    const url = new URL(c.req.url);
    const baseUrl = `${url.protocol}//${url.host}`;

    return {
      openapi: '3.1.0',
      info: {
        title: 'imgtex API',
        version: VERSION,
        description: 'Convert images of equations, tables, diagrams and documents to LaTeX',
      },
      servers: [
        {
          url: baseUrl,
          description: 'Current server',
        },
      ],
    };
  });

  app.get('/api/v1/docs', swaggerUI({ url: '/api/v1/openapi.json' }));

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: 'Not found',
        path: c.req.path,
      },
      404
    );
  });

  return app;
}
