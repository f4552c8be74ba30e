/**
 * Traverser
 *
 * Walks a parsed document section by section and hands every element to the
 * active renderer. Knows the document's shape, nothing about output formats.
 */

import { findDescendant, isElement, localName } from '../../document/accessors.js';
import { DOCUMENT_SECTIONS, type TeiDocument, type TeiElement } from '../../document/types.js';
import type { RenderContext } from './context.js';
import type { Renderer, RenderUnit, TraversalDriver } from './types.js';

/**
 * Root context tag. Neither an inline nor a block parent.
 */
export const ROOT_TAG = 'TEI';

function isEmptyUnit(unit: RenderUnit): boolean {
  return unit.length === 0;
}

/**
 * Combine partial results.
 *
 * Empty units are dropped. Strings concatenate, line sequences flatten one
 * level. A mix of both should not occur with the shipped renderers; it falls
 * back to joining each sequence with newlines and concatenating as text.
 */
export function combineParts(parts: readonly RenderUnit[]): RenderUnit {
  const kept = parts.filter((part) => !isEmptyUnit(part));
  if (kept.length === 0) {
    return '';
  }

  const strings: string[] = [];
  const sequences: (readonly string[])[] = [];
  for (const part of kept) {
    if (typeof part === 'string') {
      strings.push(part);
    } else {
      sequences.push(part);
    }
  }

  if (sequences.length === 0) {
    return strings.join('');
  }
  if (strings.length === 0) {
    return sequences.flat();
  }
  return kept.map((part) => (typeof part === 'string' ? part : part.join('\n'))).join('');
}

export class Traverser<TUnit extends RenderUnit> implements TraversalDriver<TUnit> {
  constructor(private readonly renderer: Renderer<TUnit>) {}

  traverseDocument(doc: TeiDocument): RenderUnit {
    const root = this.renderer.createRootContext().withParent(ROOT_TAG);
    const parts: RenderUnit[] = [this.renderer.renderDocumentStart(doc)];

    for (const name of DOCUMENT_SECTIONS) {
      const section = findDescendant(doc.root, name);
      if (section) {
        parts.push(
          this.traverseSection(section, root.withParent(name).withSection(name)),
        );
      }
    }

    parts.push(this.renderer.renderDocumentEnd());
    return combineParts(parts);
  }

  /**
   * Traverse the children of a front, body or back element. Each child sees
   * itself as the parent in its context.
   */
  traverseSection(section: TeiElement, context: RenderContext): RenderUnit {
    const results: RenderUnit[] = [];
    for (const child of section.children) {
      if (!isElement(child)) continue;
      const childContext = context.withParent(localName(child), child.attributes.rend ?? '');
      results.push(this.traverseElement(child, childContext));
    }
    return combineParts(results);
  }

  traverseElement(element: TeiElement, context: RenderContext): TUnit {
    return this.renderer.renderElement(element, localName(element), context, this);
  }

  /**
   * Traverse every child element under one shared context, returning the
   * non-empty results in document order.
   */
  traverseChildren(
    element: TeiElement,
    context: RenderContext,
    skip: ReadonlySet<string> = new Set(),
  ): TUnit[] {
    const results: TUnit[] = [];
    for (const child of element.children) {
      if (!isElement(child) || skip.has(localName(child))) continue;
      const result = this.traverseElement(child, context);
      if (!isEmptyUnit(result)) {
        results.push(result);
      }
    }
    return results;
  }
}
