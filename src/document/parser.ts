/**
 * Document Parser
 *
 * Parses TEI XML into the typed node tree using fast-xml-parser in
 * order-preserving mode, so mixed content keeps its sequence.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedDocumentError } from '../shared/errors/index.js';
import type { TeiDocument, TeiElement, TeiNode } from './types.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name] = String(value);
  }
  return attributes;
}

function toNodes(raw: unknown): TeiNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const items: unknown[] = raw;
  const nodes: TeiNode[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;

    for (const [key, value] of Object.entries(item)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?') || key.startsWith('!')) {
        continue;
      }
      if (key === TEXT_KEY) {
        const text = String(value);
        const previous = nodes.at(-1);
        if (previous?.kind === 'text') {
          nodes[nodes.length - 1] = { kind: 'text', value: previous.value + text };
        } else {
          nodes.push({ kind: 'text', value: text });
        }
        continue;
      }
      nodes.push({
        kind: 'element',
        name: key,
        attributes: toAttributes(item[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

/**
 * Parse a complete TEI document.
 *
 * @throws MalformedDocumentError when the XML is not well formed or has no root element
 */
export function parseTeiDocument(xml: string): TeiDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new MalformedDocumentError(`Malformed XML: ${msg}`, { code, line, col });
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    throw new MalformedDocumentError(
      'Malformed XML: parser rejected the input',
      undefined,
      error instanceof Error ? error : undefined,
    );
  }

  const root = toNodes(parsed).find((node): node is TeiElement => node.kind === 'element');
  if (!root) {
    throw new MalformedDocumentError('Document has no root element');
  }
  return { root };
}

/**
 * Parse a single element, such as one division, and return it.
 */
export function parseTeiFragment(xml: string): TeiElement {
  return parseTeiDocument(xml).root;
}
