import { fileURLToPath } from 'url';
import { serve, type ServerType } from '@hono/node-server';
import {
  NoCredentialsError,
  createConsoleLogger,
  createConverter,
  loadConfigFromDotenv,
  type CreateConverterOptions,
  type ImgTexConfig,
  type Logger,
} from '@imgtex/core';
import type { AppServices } from './context';
import { createApp } from './app';

/**
 * Build the shared services. Missing credentials leave the service up but
 * uninitialised so the health check can report the problem.
 */
export function createServices(
  config: ImgTexConfig,
  logger: Logger,
  options: Omit<CreateConverterOptions, 'logger'> = {}
): AppServices {
  try {
    const { gateway, converter } = createConverter(config, { ...options, logger });
    return { config, logger, converter, providers: gateway.availableProviders() };
  } catch (error) {
    if (error instanceof NoCredentialsError) {
      logger.error(`Failed to initialize: ${error.message}`);
      logger.error('Please set ANTHROPIC_API_KEY or OPENAI_API_KEY environment variable');
      return { config, logger, converter: null, providers: null, initError: error.message };
    }
    throw error;
  }
}

export interface RunningServer {
  services: AppServices;
  server: ServerType;
  stop(): Promise<void>;
}

export function startServer(services: AppServices): RunningServer {
  const app = createApp(services);
  const { apiHost, apiPort } = services.config;

  const server = serve({ fetch: app.fetch, hostname: apiHost, port: apiPort }, (info) => {
    services.logger.info(`imgtex API listening on http://${info.address}:${info.port}`);
  });

  return {
    services,
    server,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

async function main(): Promise<void> {
  const config = loadConfigFromDotenv();
  const logger = createConsoleLogger(config.logLevel, 'imgtex-api');
  const running = startServer(createServices(config, logger));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
