/**
 * Text Wrapping
 *
 * Greedy word wrapping and emphasis-aware measuring for plain-text output.
 */

const EMPHASIS_PATTERN = /_([^_]+)_/g;

export interface WrapOptions {
  width: number;
  initialIndent?: string;
  subsequentIndent?: string;
}

/**
 * Length of text as displayed, with `_emphasis_` markers removed.
 */
export function visualLength(text: string): number {
  return text.replace(EMPHASIS_PATTERN, '$1').length;
}

/**
 * Left padding that centers text of the given visual length.
 */
export function centerPadding(length: number, width: number): string {
  return ' '.repeat(Math.max(0, Math.floor((width - length) / 2)));
}

export function centerLine(text: string, width: number): string {
  return centerPadding(visualLength(text), width) + text;
}

/** Columns kept free for text, capped at half the line */
const MIN_TEXT_COLUMN = 20;

/**
 * Shorten an indent so a text column remains. The end of the indent is
 * kept, so a list bullet survives deep nesting.
 */
function fitIndent(indent: string, width: number): string {
  const limit = width - Math.min(MIN_TEXT_COLUMN, Math.ceil(width / 2));
  return indent.length > limit ? indent.slice(indent.length - limit) : indent;
}

/**
 * Fill words greedily into lines of at most `width` columns, indent
 * included. Words longer than a line are split into chunks.
 */
export function wrapText(text: string, options: WrapOptions): string[] {
  const width = Math.max(1, options.width);
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return [];
  }

  const first = fitIndent(options.initialIndent ?? '', width);
  const rest = fitIndent(options.subsequentIndent ?? '', width);
  const lines: string[] = [];
  let indent = first;
  let current = '';

  const flush = (): void => {
    lines.push(indent + current);
    indent = rest;
    current = '';
  };

  for (const word of words) {
    let remaining = word;
    while (remaining) {
      const available = width - indent.length;
      if (!current) {
        if (remaining.length <= available) {
          current = remaining;
          remaining = '';
        } else {
          current = remaining.slice(0, available);
          remaining = remaining.slice(available);
          flush();
        }
      } else if (current.length + 1 + remaining.length <= available) {
        current += ` ${remaining}`;
        remaining = '';
      } else {
        flush();
      }
    }
  }

  if (current) {
    flush();
  }
  return lines;
}
