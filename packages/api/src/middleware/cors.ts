import { cors } from 'hono/cors';

/** `*` in `origins` allows any origin. */
export function corsMiddleware(origins: readonly string[]) {
  return cors({
    origin: origins.includes('*') ? '*' : [...origins],
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Accept'],
    exposeHeaders: ['Content-Length', 'Content-Type'],
    maxAge: 86400,
  });
}
