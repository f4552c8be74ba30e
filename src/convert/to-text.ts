/**
 * Plain Text Conversion
 */

import type { TeiDocument } from '../document/types.js';
import { DEFAULT_LINE_WIDTH } from '../renderer/core/constants.js';
import { Traverser } from '../renderer/core/traverser.js';
import type { RenderUnit } from '../renderer/core/types.js';
import { TextRenderer } from '../renderer/text/text-renderer.js';

export interface TextConversionOptions {
  lineWidth?: number;
}

function toLines(unit: RenderUnit): string[] {
  if (typeof unit === 'string') {
    return unit ? unit.split('\n') : [];
  }
  return [...unit];
}

/**
 * Render a document as text: lines joined by newlines, non-breaking spaces
 * normalized, trailing blank lines dropped and one final newline.
 */
export function convertToText(doc: TeiDocument, options: TextConversionOptions = {}): string {
  const renderer = new TextRenderer({ lineWidth: options.lineWidth ?? DEFAULT_LINE_WIDTH });
  const lines = toLines(new Traverser(renderer).traverseDocument(doc)).map((line) =>
    line.replace(/\u00a0/g, ' '),
  );

  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
