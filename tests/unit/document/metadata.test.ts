/**
 * Header Metadata Tests
 */

import { describe, it, expect } from 'vitest';
import { getMetadata, getTitle } from '../../../src/document/metadata.js';
import { parseTeiDocument } from '../../../src/document/parser.js';
import { teiDocument } from '../../helpers/test-utils.js';

describe('getMetadata', () => {
  it('should read title, author and language', () => {
    const doc = teiDocument({ title: 'A  Test\n Book', author: 'Sam Placeholder', language: 'fr' });

    expect(getMetadata(doc)).toEqual({
      title: 'A Test Book',
      author: 'Sam Placeholder',
      language: 'fr',
      publication: null,
      source: null,
    });
  });

  it('should read publication and source statements', () => {
    const doc = parseTeiDocument(`<TEI><teiHeader><fileDesc>
      <titleStmt><title>T</title></titleStmt>
      <publicationStmt><p>Published by  Nobody</p></publicationStmt>
      <sourceDesc><p>Typed from a test</p></sourceDesc>
    </fileDesc></teiHeader><text><body/></text></TEI>`);

    const metadata = getMetadata(doc);
    expect(metadata.publication).toBe('Published by Nobody');
    expect(metadata.source).toBe('Typed from a test');
  });

  it('should fall back to defaults without a header', () => {
    const doc = parseTeiDocument('<TEI><text><body><p>x</p></body></text></TEI>');

    expect(getTitle(doc)).toBe('Untitled');
    expect(getMetadata(doc)).toEqual({
      title: 'Untitled',
      author: 'Unknown',
      language: 'en',
      publication: null,
      source: null,
    });
  });

  it('should ignore titles outside the header', () => {
    const doc = parseTeiDocument(
      '<TEI><teiHeader/><text><body><p><title>Inner</title></p></body></text></TEI>',
    );
    expect(getTitle(doc)).toBe('Untitled');
  });
});
