import { Command } from 'commander';
import { VERSION } from '@imgtex/core';
import { createConvertCommand } from './commands/convert';
import { createInfoCommand } from './commands/info';
import { createVersionCommand } from './commands/version';
import { createDefaultContext, type CliContext } from './context';

export type { CliContext } from './context';
export { CliLogger } from './utils/logger';

export function createProgram(ctx: CliContext = createDefaultContext()): Command {
  const program = new Command('imgtex');

  program
    .description(
      'Image-to-LaTeX converter using vision AI models.\n\nConvert images of scientific work (equations, tables, diagrams) to LaTeX code.'
    )
    .version(VERSION, '-V, --version')
    .addCommand(createConvertCommand(ctx))
    .addCommand(createInfoCommand(ctx))
    .addCommand(createVersionCommand(ctx));

  return program;
}
