import { createMiddleware } from 'hono/factory';
import type { AppEnv, AppServices } from '../context';

export function servicesMiddleware(services: AppServices) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set('services', services);
    await next();
  });
}
