import {
  createConverter,
  loadConfigFromDotenv,
  type ConverterBundle,
  type CreateConverterOptions,
  type ImgTexConfig,
} from '@imgtex/core';
import { CliLogger } from './utils/logger';

/** Side effects the commands go through, replaceable in tests. */
export interface CliContext {
  logger: CliLogger;
  /** Primary output (LaTeX, info tables). */
  print(text: string): void;
  /** Diagnostics for the user. */
  printError(text: string): void;
  loadConfig(): ImgTexConfig;
  createConverter(config: ImgTexConfig, options: CreateConverterOptions): ConverterBundle;
  setExitCode(code: number): void;
}

export function createDefaultContext(): CliContext {
  return {
    logger: new CliLogger(),
    print: (text) => {
      process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    printError: (text) => {
      process.stderr.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    loadConfig: () => loadConfigFromDotenv(),
    createConverter,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}
