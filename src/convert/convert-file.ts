/**
 * File Conversion
 *
 * Reads an input document, picks the output format from the output file's
 * extension, runs the matching pipeline and writes the result.
 */

import { readFile, writeFile } from 'fs/promises';
import { basename, dirname, extname, resolve } from 'path';
import { parseTeiDocument } from '../document/parser.js';
import type { TeiDocument } from '../document/types.js';
import { ConversionError, ErrorCode, ErrorSeverity, ResourceError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import { findCssFiles, loadCustomCss } from './css.js';
import { collectGraphicUrls, loadImages } from './images.js';
import { convertToEpub } from './to-epub.js';
import { convertToHtml } from './to-html.js';
import { convertToText } from './to-text.js';

export type OutputFormatName = 'text' | 'html' | 'epub';

const FORMATS_BY_EXTENSION: Readonly<Record<string, OutputFormatName>> = {
  '.txt': 'text',
  '.html': 'html',
  '.htm': 'html',
  '.xhtml': 'html',
  '.epub': 'epub',
};

export interface ConvertFileOptions {
  inputPath: string;
  outputPath: string;
  lineWidth?: number;
  /** Escape all text in HTML output. Always on for .xhtml and .epub. */
  strict?: boolean;
  /** Stylesheets to apply; discovered beside the input when omitted */
  cssPaths?: readonly string[];
}

export interface ConversionResult {
  format: OutputFormatName;
  outputPath: string;
  bytes: number;
}

/**
 * @throws ConversionError (UNSUPPORTED_FORMAT) for an unknown extension
 */
export function detectOutputFormat(outputPath: string): OutputFormatName {
  const extension = extname(outputPath).toLowerCase();
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new ConversionError(
      `Unsupported output format "${extension || outputPath}"`,
      ErrorCode.UNSUPPORTED_FORMAT,
      ErrorSeverity.ERROR,
      { outputPath, supported: Object.keys(FORMATS_BY_EXTENSION) },
    );
  }
  return format;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function readInput(inputPath: string): Promise<string> {
  try {
    return await readFile(inputPath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ResourceError(
        `Input file not found: ${inputPath}`,
        ErrorCode.INPUT_NOT_FOUND,
        { inputPath },
        cause,
      );
    }
    throw new ResourceError(
      `Cannot read input file: ${inputPath}`,
      ErrorCode.INPUT_UNREADABLE,
      { inputPath },
      cause,
    );
  }
}

async function resolveCss(options: ConvertFileOptions, format: 'html' | 'epub'): Promise<string> {
  const paths = options.cssPaths ?? (await findCssFiles(options.inputPath));
  if (paths.length > 0 && !options.cssPaths) {
    getLogger().info('Auto-detected stylesheets', { files: paths.map((path) => basename(path)) });
  }
  return loadCustomCss(paths, format);
}

async function render(
  format: OutputFormatName,
  doc: TeiDocument,
  options: ConvertFileOptions,
): Promise<string | Buffer> {
  switch (format) {
    case 'text':
      return convertToText(doc, { lineWidth: options.lineWidth });
    case 'html':
      return convertToHtml(doc, {
        customCss: await resolveCss(options, 'html'),
        strictOutput: options.strict === true || extname(options.outputPath).toLowerCase() === '.xhtml',
      });
    case 'epub': {
      const images = await loadImages(collectGraphicUrls(doc), dirname(resolve(options.inputPath)));
      return convertToEpub(doc, { customCss: await resolveCss(options, 'epub'), images });
    }
  }
}

export async function convertFile(options: ConvertFileOptions): Promise<ConversionResult> {
  const logger = getLogger();
  const format = detectOutputFormat(options.outputPath);
  const doc = parseTeiDocument(await readInput(options.inputPath));
  const output = await render(format, doc, options);

  try {
    await writeFile(options.outputPath, output);
  } catch (error) {
    throw new ResourceError(
      `Cannot write output file: ${options.outputPath}`,
      ErrorCode.OUTPUT_WRITE_FAILED,
      { outputPath: options.outputPath },
      error instanceof Error ? error : undefined,
    );
  }

  const bytes = typeof output === 'string' ? Buffer.byteLength(output) : output.length;
  logger.info('Conversion complete', { format, outputPath: options.outputPath, bytes });
  return { format, outputPath: options.outputPath, bytes };
}
