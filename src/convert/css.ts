/**
 * Stylesheet Discovery and Filtering
 *
 * Custom CSS lives beside the input document. A comment line holding only
 * `@html`, `@epub` or `@both` limits the lines after it to that format,
 * until the next such line.
 */

import { readdir, readFile } from 'fs/promises';
import { dirname, extname, join, resolve } from 'path';
import { ErrorCode, ResourceError } from '../shared/errors/index.js';

export type CssTarget = 'html' | 'epub' | 'both';

const DIRECTIVE_PATTERN = /^\s*\/\*\s*@(html|epub|both)\s*\*\/\s*$/i;

function parseDirective(line: string): CssTarget | null {
  const match = DIRECTIVE_PATTERN.exec(line);
  const target = match?.[1]?.toLowerCase();
  return target === 'html' || target === 'epub' || target === 'both' ? target : null;
}

/**
 * Keep only the sections that apply to the given format.
 * Lines before any directive apply to both formats.
 */
export function filterCssForFormat(css: string, format: string): string {
  const wanted = format.toLowerCase();
  let current: CssTarget = 'both';
  const kept: string[] = [];

  for (const line of css.split('\n')) {
    const directive = parseDirective(line);
    if (directive) {
      current = directive;
      continue;
    }
    if (current === 'both' || current === wanted) {
      kept.push(line);
    }
  }
  return kept.join('\n').trim();
}

/**
 * Stylesheets in the input document's directory, sorted by name.
 */
export async function findCssFiles(inputPath: string): Promise<string[]> {
  const directory = dirname(resolve(inputPath));
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.css')
    .map((entry) => join(directory, entry.name))
    .sort();
}

/**
 * Read and filter stylesheets, joined by blank lines.
 *
 * @throws ResourceError (STYLESHEET_UNREADABLE) with the read failure as cause
 */
export async function loadCustomCss(paths: readonly string[], format: 'html' | 'epub'): Promise<string> {
  const sections: string[] = [];
  for (const path of paths) {
    let css: string;
    try {
      css = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ResourceError(
        `Cannot read stylesheet ${path}`,
        ErrorCode.STYLESHEET_UNREADABLE,
        { path },
        error instanceof Error ? error : undefined,
      );
    }
    const filtered = filterCssForFormat(css, format);
    if (filtered) {
      sections.push(filtered);
    }
  }
  return sections.join('\n\n');
}
