/**
 * Document Types
 *
 * Typed node tree for parsed TEI documents. Produced once by the parser and
 * treated as read-only by everything downstream.
 */

/**
 * A run of character data.
 */
export interface TeiText {
  readonly kind: 'text';
  readonly value: string;
}

/**
 * An element with its qualified name as written in the source
 * (`p`, `tei:p`) and its attributes keyed as written (`rend`, `xml:id`).
 */
export interface TeiElement {
  readonly kind: 'element';
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly TeiNode[];
}

export type TeiNode = TeiText | TeiElement;

/**
 * A whole parsed document.
 */
export interface TeiDocument {
  readonly root: TeiElement;
}

/**
 * Top-level sections of a document body, in traversal order.
 */
export type DocumentSection = 'front' | 'body' | 'back';

export const DOCUMENT_SECTIONS: readonly DocumentSection[] = ['front', 'body', 'back'];

/**
 * Header metadata used for document framing and packaging.
 */
export interface DocumentMetadata {
  title: string;
  author: string;
  language: string;
  publication: string | null;
  source: string | null;
}
