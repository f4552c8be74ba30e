/**
 * Renderer Constants
 *
 * Shared layout defaults and typographic glyphs.
 */

/** Default text line width in columns */
export const DEFAULT_LINE_WIDTH = 72;

/** One level of text indentation */
export const DEFAULT_INDENT_UNIT = '    ';

/** Quotation glyph pairs, chosen by quote depth parity */
export const DOUBLE_QUOTES = ['“', '”'] as const;
export const SINGLE_QUOTES = ['‘', '’'] as const;

/**
 * Placeholder for a line break inside inline text. Private-use code point,
 * so it cannot collide with document text.
 */
export const HARD_BREAK = '\uE000';

/** Scene-break ornament for milestone rend="stars" */
export const STARS_ORNAMENT = '*       *       *       *       *';

/** Default milestone style when none is given */
export const DEFAULT_MILESTONE_STYLE = 'space';

/** Verse line indent beyond the current indent */
export const VERSE_INDENT = '    ';

/** Extra spaces for indent, indent2 and indent3 verse lines */
export const VERSE_LINE_INDENTS: Readonly<Record<string, number>> = {
  indent: 2,
  indent2: 4,
  indent3: 6,
};
