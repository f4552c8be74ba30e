/**
 * HTML Conversion
 */

import type { TeiDocument } from '../document/types.js';
import { Traverser } from '../renderer/core/traverser.js';
import { HtmlRenderer, type HtmlRendererOptions } from '../renderer/html/html-renderer.js';

export type HtmlConversionOptions = HtmlRendererOptions;

/**
 * Render a document as one self-contained HTML string.
 */
export function convertToHtml(doc: TeiDocument, options: HtmlConversionOptions = {}): string {
  const result = new Traverser(new HtmlRenderer(options)).traverseDocument(doc);
  return typeof result === 'string' ? result : result.join('\n');
}
