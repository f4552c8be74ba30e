/**
 * Document Accessors
 *
 * Namespace-aware helpers for reading tags, attributes and text from the
 * parsed node tree.
 */

import type { TeiElement, TeiNode } from './types.js';

/** TEI namespace URI */
export const TEI_NAMESPACE = 'http://www.tei-c.org/ns/1.0';

/** Attribute holding element identifiers */
export const XML_ID_ATTRIBUTE = 'xml:id';

/**
 * Remove a namespace qualifier from a tag name.
 * Handles both prefixed (`tei:p`) and Clark (`{uri}p`) notation.
 */
export function stripNamespace(name: string): string {
  if (name.startsWith('{')) {
    const end = name.indexOf('}');
    return end === -1 ? name : name.slice(end + 1);
  }
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

export function isElement(node: TeiNode): node is TeiElement {
  return node.kind === 'element';
}

/**
 * Bare tag name of an element.
 */
export function localName(element: TeiElement): string {
  return stripNamespace(element.name);
}

export function getAttribute(element: TeiElement, name: string): string | undefined {
  return element.attributes[name];
}

/**
 * Identifier of an element (`xml:id`), or empty string.
 */
export function getXmlId(element: TeiElement): string {
  return element.attributes[XML_ID_ATTRIBUTE] ?? '';
}

export function childElements(element: TeiElement): TeiElement[] {
  return element.children.filter(isElement);
}

/**
 * First direct child with the given bare tag.
 */
export function findChild(element: TeiElement, tag: string): TeiElement | undefined {
  return element.children.find(
    (child): child is TeiElement => isElement(child) && localName(child) === tag,
  );
}

/**
 * All direct children with the given bare tag, in document order.
 */
export function findChildren(element: TeiElement, tag: string): TeiElement[] {
  return childElements(element).filter((child) => localName(child) === tag);
}

/**
 * All descendant elements in document order (pre-order, excluding self).
 */
export function descendantElements(element: TeiElement): TeiElement[] {
  const result: TeiElement[] = [];
  const visit = (parent: TeiElement): void => {
    for (const child of parent.children) {
      if (isElement(child)) {
        result.push(child);
        visit(child);
      }
    }
  };
  visit(element);
  return result;
}

/**
 * First descendant with the given bare tag (pre-order).
 */
export function findDescendant(element: TeiElement, tag: string): TeiElement | undefined {
  for (const child of element.children) {
    if (!isElement(child)) continue;
    if (localName(child) === tag) return child;
    const nested = findDescendant(child, tag);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Depth-first concatenation of all text beneath an element, ignoring markup.
 */
export function textContent(node: TeiNode): string {
  if (node.kind === 'text') {
    return node.value;
  }
  return node.children.map(textContent).join('');
}
