import { Command } from 'commander';
import { validateImage } from '@imgtex/core';
import type { CliContext } from '../context';
import { reportError } from '../errors';

export function createInfoCommand(ctx: CliContext): Command {
  return new Command('info')
    .description('Display information about an image file')
    .argument('<image>', 'Path to the image file')
    .action(async (image: string) => {
      try {
        const config = ctx.loadConfig();
        const info = await validateImage(image, { maxSizeBytes: config.maxImageSizeBytes });

        ctx.print('Image Information:');
        ctx.print(`  Path: ${info.path}`);
        ctx.print(`  Format: ${info.format}`);
        if (info.space) {
          ctx.print(`  Color space: ${info.space}${info.channels ? ` (${info.channels} channels)` : ''}`);
        }
        ctx.print(`  Dimensions: ${info.width}x${info.height}`);
        ctx.print(`  File size: ${info.fileSizeMb.toFixed(2)} MB`);
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
