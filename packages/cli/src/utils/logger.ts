import chalk from 'chalk';
import type { Logger } from '@imgtex/core';

/**
 * Coloured CLI logger. Writes to stderr so generated LaTeX on stdout can
 * be piped.
 */
export class CliLogger implements Logger {
  constructor(private verbose = false) {}

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    console.error(chalk.blue('ℹ'), message);
  }

  success(message: string): void {
    console.error(chalk.green('✓'), message);
  }

  error(message: string): void {
    console.error(chalk.red('✖'), message);
  }

  warn(message: string): void {
    console.error(chalk.yellow('⚠'), message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(chalk.gray('🔍'), message);
    }
  }
}
