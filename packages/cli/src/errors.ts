import {
  ConfigError,
  ConversionError,
  ImageInvalidError,
  NoCredentialsError,
  errorMessage,
} from '@imgtex/core';
import type { CliContext } from './context';

/** Print a single diagnostic for `error` and mark the process as failed. */
export function reportError(ctx: CliContext, error: unknown, verbose = false): void {
  if (error instanceof NoCredentialsError) {
    ctx.printError(`Error: ${error.message}`);
    ctx.printError('\nPlease set ANTHROPIC_API_KEY or OPENAI_API_KEY environment variable.');
    ctx.printError('See .env.example for configuration options.');
  } else if (error instanceof ConversionError) {
    ctx.printError(`Conversion error: ${error.message}`);
  } else if (error instanceof ImageInvalidError) {
    ctx.printError(`Error: ${error.message}`);
  } else if (error instanceof ConfigError) {
    ctx.printError(`Configuration error: ${error.message}`);
  } else {
    ctx.printError(`Unexpected error: ${errorMessage(error)}`);
    if (verbose && error instanceof Error && error.stack) {
      ctx.printError(error.stack);
    }
  }

  ctx.setExitCode(1);
}
