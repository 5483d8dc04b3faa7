import { writeFile } from 'fs/promises';
import path from 'path';
import { Command, Option } from 'commander';
import type { ImageToLatexConverter } from '@imgtex/core';
import type { CliContext } from '../context';
import { reportError } from '../errors';

export const TYPE_CHOICES = ['equation', 'table', 'diagram', 'document', 'auto'] as const;

export type TypeChoice = (typeof TYPE_CHOICES)[number];

export interface ConvertCommandOptions {
  output?: string;
  type: TypeChoice;
  inline?: boolean;
  caption?: string;
  title?: string;
  author?: string;
  validate: boolean;
  preprocess?: boolean;
  verbose?: boolean;
}

async function produceLatex(
  ctx: CliContext,
  converter: ImageToLatexConverter,
  imagePath: string,
  options: ConvertCommandOptions
): Promise<string> {
  switch (options.type) {
    case 'equation':
      return (await converter.convertEquation(imagePath, options.inline ?? false)).latexCode;
    case 'table':
      return (await converter.convertTable(imagePath, options.caption)).latexCode;
    case 'diagram':
      return (await converter.convertDiagram(imagePath)).latexCode;
    case 'document':
      return (
        await converter.convertToDocument(imagePath, { title: options.title, author: options.author })
      ).latexCode;
    case 'auto': {
      const result = await converter.convert(imagePath);
      if (options.verbose) {
        ctx.printError(`Detected content type: ${result.contentType}`);
        if (!result.isValid) {
          ctx.printError(`Warning: ${result.validationError}`);
        }
      }
      return result.latexCode;
    }
  }
}

export function createConvertCommand(ctx: CliContext): Command {
  const command = new Command('convert');

  command
    .description('Convert an image to LaTeX code')
    .argument('<image>', 'Path to the image file')
    .option('-o, --output <path>', 'Output file path (default: print to stdout)')
    .addOption(
      new Option('-t, --type <type>', 'Type of content to convert')
        .choices(TYPE_CHOICES)
        .default('auto')
    )
    .option('--inline', 'Format equations as inline math (equation type only)')
    .option('--caption <text>', 'Table caption (table type only)')
    .option('--title <text>', 'Document title (document type only)')
    .option('--author <text>', 'Document author (document type only)')
    .option('--no-validate', 'Skip structural validation of the generated LaTeX')
    .option('--preprocess', 'Downscale large images before sending them')
    .option('-v, --verbose', 'Enable verbose output')
    .addHelpText(
      'after',
      `
Examples:
  $ imgtex convert equation.png
  $ imgtex convert equation.png -o output.tex
  $ imgtex convert table.png --type table --caption "Results"
  $ imgtex convert page.png --type document --title "My Paper"`
    )
    .action(async (image: string, options: ConvertCommandOptions) => {
      ctx.logger.setVerbose(options.verbose ?? false);
      ctx.logger.debug('Verbose mode enabled');

      try {
        const config = ctx.loadConfig();
        const { converter } = ctx.createConverter(config, {
          logger: ctx.logger,
          validateOutput: options.validate,
          preprocess: options.preprocess ?? false,
        });

        const latex = await produceLatex(ctx, converter, image, options);

        if (options.output) {
          const outputPath = path.resolve(options.output);
          await writeFile(outputPath, latex, 'utf-8');
          ctx.logger.success(`LaTeX code saved to: ${outputPath}`);
        } else {
          ctx.print(latex);
        }
      } catch (error) {
        reportError(ctx, error, options.verbose);
      }
    });

  return command;
}
