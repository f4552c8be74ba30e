/**
 * TEI Tag Vocabulary
 *
 * The closed set of tags the converter understands. Anything else is
 * classified as unrecognized and rendered as flattened text.
 */

import type { DocumentSection } from './types.js';

export const TEI_TAGS = [
  'TEI',
  'teiHeader',
  'text',
  'front',
  'body',
  'back',
  'div',
  'head',
  'p',
  'quote',
  'lg',
  'l',
  'list',
  'item',
  'table',
  'row',
  'cell',
  'figure',
  'graphic',
  'figDesc',
  'milestone',
  'signed',
  'lb',
  'hi',
  'emph',
  'note',
  'ref',
  'title',
  'foreign',
] as const;

export type TeiTag = (typeof TEI_TAGS)[number];

/**
 * Tags that get a dedicated block-level handler in every renderer.
 */
export const BLOCK_TAGS = [
  'div',
  'head',
  'p',
  'quote',
  'lg',
  'list',
  'table',
  'figure',
  'milestone',
  'signed',
] as const satisfies readonly TeiTag[];

export type BlockTag = (typeof BLOCK_TAGS)[number];

/**
 * Direct children of a block quotation that are rendered as blocks.
 */
export const QUOTE_BLOCK_CHILD_TAGS: ReadonlySet<string> = new Set([
  'p',
  'lg',
  'list',
  'table',
  'figure',
  'div',
  'quote',
  'signed',
]);

const TAG_SET: ReadonlySet<string> = new Set(TEI_TAGS);
const BLOCK_TAG_SET: ReadonlySet<string> = new Set(BLOCK_TAGS);
const SECTION_TAG_SET: ReadonlySet<string> = new Set(['front', 'body', 'back']);

function isTeiTag(tag: string): tag is TeiTag {
  return TAG_SET.has(tag);
}

/**
 * Classify a bare tag name.
 */
export function classifyTag(tag: string): TeiTag | 'unrecognized' {
  return isTeiTag(tag) ? tag : 'unrecognized';
}

export function isBlockTag(tag: string): tag is BlockTag {
  return BLOCK_TAG_SET.has(tag);
}

export function isSectionTag(tag: string): tag is DocumentSection {
  return SECTION_TAG_SET.has(tag);
}
