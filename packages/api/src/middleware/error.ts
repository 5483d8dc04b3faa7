import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { Logger } from '@imgtex/core';

export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return c.json(
        {
          success: false,
          error: err.message,
          status: err.status,
        },
        err.status
      );
    }

    logger.error(`Unhandled error: ${err.stack ?? err.message}`);

    return c.json(
      {
        success: false,
        error: 'Internal server error',
        message: err.message,
      },
      500
    );
  };
}
