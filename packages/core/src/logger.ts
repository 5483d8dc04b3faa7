export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger filtered by level. Everything goes to stderr so that
 * stdout stays reserved for generated LaTeX.
 */
export function createConsoleLogger(level: LogLevel = 'info', scope = 'imgtex'): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    console.error(`[${scope}] ${messageLevel.toUpperCase()}: ${message}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
