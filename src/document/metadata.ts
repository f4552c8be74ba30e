/**
 * Header Metadata
 *
 * Reads title, author and publication details from the TEI header.
 */

import { findChild, findDescendant, textContent } from './accessors.js';
import type { DocumentMetadata, TeiDocument, TeiElement } from './types.js';

export const DEFAULT_TITLE = 'Untitled';
export const DEFAULT_AUTHOR = 'Unknown';
export const DEFAULT_LANGUAGE = 'en';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function headerOf(doc: TeiDocument): TeiElement {
  return findDescendant(doc.root, 'teiHeader') ?? doc.root;
}

function firstParagraph(parent: TeiElement | undefined): string | null {
  if (!parent) return null;
  const p = findChild(parent, 'p');
  if (!p) return null;
  const text = collapse(textContent(p));
  return text || null;
}

/**
 * First title in the document, or "Untitled".
 */
export function getTitle(doc: TeiDocument): string {
  const title = findDescendant(headerOf(doc), 'title');
  const text = title ? collapse(textContent(title)) : '';
  return text || DEFAULT_TITLE;
}

export function getMetadata(doc: TeiDocument): DocumentMetadata {
  const header = headerOf(doc);
  const author = findDescendant(header, 'author');
  const authorText = author ? collapse(textContent(author)) : '';

  return {
    title: getTitle(doc),
    author: authorText || DEFAULT_AUTHOR,
    language: doc.root.attributes['xml:lang'] || DEFAULT_LANGUAGE,
    publication: firstParagraph(findDescendant(header, 'publicationStmt')),
    source: firstParagraph(findDescendant(header, 'sourceDesc')),
  };
}
