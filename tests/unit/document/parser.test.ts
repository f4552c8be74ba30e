/**
 * Document Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseTeiDocument, parseTeiFragment } from '../../../src/document/parser.js';
import { isElement, localName, textContent } from '../../../src/document/accessors.js';
import { MalformedDocumentError, ErrorCode } from '../../../src/shared/errors/index.js';
import { expectSyncError, teiSource } from '../../helpers/test-utils.js';

describe('parseTeiDocument', () => {
  it('should return the root element', () => {
    const doc = parseTeiDocument(teiSource({ body: '<p>Hi</p>' }));
    expect(localName(doc.root)).toBe('TEI');
  });

  it('should keep mixed content in document order', () => {
    const p = parseTeiFragment('<p>Hello <hi rend="italic">world</hi>.</p>');

    expect(p.children).toHaveLength(3);
    expect(p.children[0]).toEqual({ kind: 'text', value: 'Hello ' });
    expect(p.children[2]).toEqual({ kind: 'text', value: '.' });

    const hi = p.children[1];
    expect(hi?.kind).toBe('element');
    if (hi && isElement(hi)) {
      expect(hi.name).toBe('hi');
      expect(hi.attributes).toEqual({ rend: 'italic' });
      expect(textContent(hi)).toBe('world');
    }
  });

  it('should preserve whitespace in text nodes', () => {
    const p = parseTeiFragment('<p>  two  spaces </p>');
    expect(textContent(p)).toBe('  two  spaces ');
  });

  it('should not convert numeric-looking text or attributes', () => {
    const cell = parseTeiFragment('<cell n="007">0012</cell>');
    expect(cell.attributes.n).toBe('007');
    expect(textContent(cell)).toBe('0012');
  });

  it('should decode entities in text and attributes', () => {
    const ref = parseTeiFragment('<ref target="a&amp;b">Fish &amp; chips</ref>');
    expect(ref.attributes.target).toBe('a&b');
    expect(textContent(ref)).toBe('Fish & chips');
  });

  it('should keep namespace prefixes on names', () => {
    const p = parseTeiFragment(
      '<tei:p xmlns:tei="http://www.tei-c.org/ns/1.0" xml:id="p1">text</tei:p>',
    );
    expect(p.name).toBe('tei:p');
    expect(localName(p)).toBe('p');
    expect(p.attributes['xml:id']).toBe('p1');
  });

  it('should merge text split by a comment', () => {
    const p = parseTeiFragment('<p>a<!-- note -->b</p>');
    expect(p.children).toEqual([{ kind: 'text', value: 'ab' }]);
  });

  it('should reject mismatched tags', () => {
    const error = expectSyncError(() => parseTeiDocument('<TEI><p>open</TEI>'), 'Malformed XML');
    expect(error).toBeInstanceOf(MalformedDocumentError);
    if (error instanceof MalformedDocumentError) {
      expect(error.code).toBe(ErrorCode.MALFORMED_DOCUMENT);
      expect(error.details).toHaveProperty('line');
    }
  });

  it('should reject input without any element', () => {
    const error = expectSyncError(() => parseTeiDocument('just text'));
    expect(error).toBeInstanceOf(MalformedDocumentError);
  });
});
