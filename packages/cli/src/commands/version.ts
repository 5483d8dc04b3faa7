import { Command } from 'commander';
import { VERSION } from '@imgtex/core';
import type { CliContext } from '../context';

export function createVersionCommand(ctx: CliContext): Command {
  return new Command('version').description('Display version information').action(() => {
    ctx.print(`imgtex version ${VERSION}`);
    ctx.print('Convert images to LaTeX using vision AI models');
  });
}
