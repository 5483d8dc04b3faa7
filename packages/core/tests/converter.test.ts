import { readFile, readdir } from 'fs/promises';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config';
import {
  CONTENT_PROMPTS,
  GENERAL_PROMPT,
  ImageToLatexConverter,
  createConverter,
  promptFor,
  type ImageAnalyzer,
} from '../src/converter';
import { ConversionError, ImageInvalidError, NoCredentialsError } from '../src/errors';
import type { ProviderFactory } from '../src/vision';
import { makeTempDir, removeDir, writeBytes, writePng } from './helpers';

function fakeAnalyzer(reply: string | Error) {
  const analyze = vi.fn(async (_bytes: Uint8Array, _prompt: string, _allowFallback?: boolean) => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const analyzer: ImageAnalyzer = { analyze };
  return { analyzer, analyze };
}

describe('promptFor', () => {
  it('uses the general prompt without a known type', () => {
    expect(promptFor()).toBe(GENERAL_PROMPT);
    expect(promptFor('unknown')).toBe(GENERAL_PROMPT);
  });

  it('uses the content-specific prompt', () => {
    expect(promptFor('table')).toBe(CONTENT_PROMPTS.table);
  });
});

describe('ImageToLatexConverter', () => {
  let dir: string;
  let image: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    image = await writePng(dir, 'input.png', 60, 30);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('extracts and classifies the model response', async () => {
    const raw = "Here's the code:\n```latex\n\\begin{tabular}{cc}a & b\\end{tabular}\n```";
    const { analyzer, analyze } = fakeAnalyzer(raw);
    const converter = new ImageToLatexConverter({ gateway: analyzer });

    const result = await converter.convert(image);

    expect(result).toEqual({
      latexCode: '\\begin{tabular}{cc}a & b\\end{tabular}',
      contentType: 'table',
      rawResponse: raw,
      isValid: true,
    });
    expect(analyze).toHaveBeenCalledWith(expect.any(Uint8Array), GENERAL_PROMPT, true);
  });

  it('keeps a given type when auto-detection is off', async () => {
    const { analyzer, analyze } = fakeAnalyzer('\\begin{tabular}{c}x\\end{tabular}');
    const converter = new ImageToLatexConverter({ gateway: analyzer, allowFallback: false });

    const result = await converter.convert(image, 'equation', false);

    expect(result.contentType).toBe('equation');
    expect(analyze).toHaveBeenCalledWith(expect.any(Uint8Array), CONTENT_PROMPTS.equation, false);
  });

  it('re-detects the type when auto-detection is on', async () => {
    const { analyzer } = fakeAnalyzer('\\begin{tikzpicture}\\draw (0,0);\\end{tikzpicture}');
    const converter = new ImageToLatexConverter({ gateway: analyzer });

    const result = await converter.convert(image, 'equation');

    expect(result.contentType).toBe('diagram');
  });

  it('flags unbalanced output without failing', async () => {
    const { analyzer } = fakeAnalyzer('\\frac{a}{b');
    const converter = new ImageToLatexConverter({ gateway: analyzer });

    const result = await converter.convert(image);

    expect(result.isValid).toBe(false);
    expect(result.validationError).toBe('Unbalanced braces: {} count mismatch');
    expect(result.latexCode).toBe('\\frac{a}{b');
  });

  it('skips validation when disabled', async () => {
    const { analyzer } = fakeAnalyzer('\\frac{a}{b');
    const converter = new ImageToLatexConverter({ gateway: analyzer, validateOutput: false });

    const result = await converter.convert(image);

    expect(result.isValid).toBe(true);
    expect(result.validationError).toBeUndefined();
  });

  it('rejects invalid images before calling the model', async () => {
    const { analyzer, analyze } = fakeAnalyzer('$x$');
    const converter = new ImageToLatexConverter({ gateway: analyzer });
    const text = await writeBytes(dir, 'fake.png', 'not an image');

    const error = await converter.convert(text).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toHaveProperty(
      'message',
      'Image validation failed: Failed to open image: fake.png is not a readable image'
    );
    expect(error).toHaveProperty('cause', expect.any(ImageInvalidError));
    expect(analyze).not.toHaveBeenCalled();
  });

  it('enforces the configured size limit', async () => {
    const { analyzer } = fakeAnalyzer('$x$');
    const converter = new ImageToLatexConverter({ gateway: analyzer, maxImageSizeBytes: 1 });

    await expect(converter.convert(image)).rejects.toThrow(/^Image validation failed: Image file too large/);
  });

  it('wraps model failures', async () => {
    const { analyzer } = fakeAnalyzer(new Error('Both primary and fallback models failed.'));
    const converter = new ImageToLatexConverter({ gateway: analyzer });

    await expect(converter.convert(image)).rejects.toThrow(
      'Vision model failed: Both primary and fallback models failed.'
    );
  });

  it('sends downscaled bytes without touching files next to the image', async () => {
    const existing = await writeBytes(dir, 'input_processed.png', 'kept by the user');
    const { analyzer, analyze } = fakeAnalyzer('$x$');
    const converter = new ImageToLatexConverter({
      gateway: analyzer,
      preprocess: true,
      maxImageDimension: 20,
    });

    await converter.convert(image);

    const sent = analyze.mock.calls[0]?.[0];
    const metadata = await sharp(sent).metadata();
    expect([metadata.width, metadata.height]).toEqual([20, 10]);
    expect(await readFile(existing, 'utf-8')).toBe('kept by the user');
    expect((await readdir(dir)).sort()).toEqual(['input.png', 'input_processed.png']);
  });

  it('runs parallel preprocessed conversions of one image independently', async () => {
    const { analyzer, analyze } = fakeAnalyzer('$x$');
    const converter = new ImageToLatexConverter({
      gateway: analyzer,
      preprocess: true,
      maxImageDimension: 20,
    });

    const results = await Promise.all(Array.from({ length: 8 }, () => converter.convert(image)));

    expect(results.map((result) => result.latexCode)).toEqual(Array(8).fill('$x$'));
    expect(analyze).toHaveBeenCalledTimes(8);
    expect(await readdir(dir)).toEqual(['input.png']);
  });

  describe('typed conversions', () => {
    it('wraps equations for display', async () => {
      const { analyzer, analyze } = fakeAnalyzer('$$E = mc^2$$');
      const converter = new ImageToLatexConverter({ gateway: analyzer });

      const { latexCode, result } = await converter.convertEquation(image);

      expect(latexCode).toBe('\\begin{equation}\nE = mc^2\n\\end{equation}');
      expect(result.contentType).toBe('equation');
      expect(analyze.mock.calls[0]?.[1]).toBe(CONTENT_PROMPTS.equation);
    });

    it('wraps equations inline', async () => {
      const { analyzer } = fakeAnalyzer('\\[ x + y \\]');
      const converter = new ImageToLatexConverter({ gateway: analyzer });

      const { latexCode } = await converter.convertEquation(image, true);

      expect(latexCode).toBe('$x + y$');
    });

    it('wraps tables with a caption', async () => {
      const { analyzer } = fakeAnalyzer('\\begin{tabular}{c}\n1\n\\end{tabular}');
      const converter = new ImageToLatexConverter({ gateway: analyzer });

      const { latexCode } = await converter.convertTable(image, 'Totals');

      expect(latexCode).toBe(
        '\\begin{table}[htbp]\n\\centering\n\\caption{Totals}\n\\begin{tabular}{c}\n1\n\\end{tabular}\n\\end{table}'
      );
    });

    it('returns diagrams unwrapped', async () => {
      const { analyzer } = fakeAnalyzer('\\begin{figure}\\end{figure}');
      const converter = new ImageToLatexConverter({ gateway: analyzer });

      const { latexCode, result } = await converter.convertDiagram(image);

      expect(latexCode).toBe('\\begin{figure}\\end{figure}');
      expect(result.contentType).toBe('diagram');
    });

    it('builds a full document', async () => {
      const { analyzer } = fakeAnalyzer('\\section{Intro}');
      const converter = new ImageToLatexConverter({ gateway: analyzer });

      const { latexCode } = await converter.convertToDocument(image, { title: 'Notes' });

      expect(latexCode.startsWith('\\documentclass{article}\n')).toBe(true);
      expect(latexCode).toContain('\\title{Notes}\n');
      expect(latexCode).toContain('\\section{Intro}\n');
      expect(latexCode.endsWith('\\end{document}\n')).toBe(true);
    });
  });
});

describe('createConverter', () => {
  it('wires gateway settings from configuration', () => {
    const models: string[] = [];
    const providerFactory: ProviderFactory = (name, settings) => {
      models.push(`${name}:${settings.model}`);
      return { name, model: settings.model, call: async () => '' };
    };
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: 'gpt-test' });

    const { gateway, converter } = createConverter(config, { providerFactory });

    expect(models).toEqual(['openai:gpt-test']);
    expect(gateway.availableProviders()).toEqual({ anthropic: false, openai: true });
    expect(converter.gateway).toBe(gateway);
  });

  it('fails without credentials', () => {
    expect(() => createConverter(loadConfig({}))).toThrow(NoCredentialsError);
  });
});

