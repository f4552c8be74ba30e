/**
 * Renderer Types
 *
 * The contract between the traverser and the format-specific renderers.
 */

import type { TeiDocument, TeiElement } from '../../document/types.js';
import type { RenderContext } from './context.js';

/**
 * Unit produced by one render call: a string for markup formats, an ordered
 * line sequence for plain text.
 */
export type RenderUnit = string | readonly string[];

/**
 * Output formats. Also the suffix of format-specific style overrides
 * (`rend-text`, `rend-html`, `rend-epub`).
 */
export type OutputFormat = 'text' | 'html' | 'epub';

/**
 * Narrow traversal surface handed to renderers for recursion.
 */
export interface TraversalDriver<TUnit extends RenderUnit = RenderUnit> {
  traverseElement(element: TeiElement, context: RenderContext): TUnit;
  traverseChildren(
    element: TeiElement,
    context: RenderContext,
    skip?: ReadonlySet<string>,
  ): TUnit[];
}

export interface Renderer<TUnit extends RenderUnit = RenderUnit> {
  readonly formatName: OutputFormat;
  /** Context the traversal of a whole document starts from */
  createRootContext(): RenderContext;
  renderDocumentStart(doc: TeiDocument): TUnit;
  renderDocumentEnd(): TUnit;
  renderElement(
    element: TeiElement,
    tag: string,
    context: RenderContext,
    traverser: TraversalDriver<TUnit>,
  ): TUnit;
}

/**
 * Handler for one tag inside a renderer's dispatch table.
 */
export type ElementHandler<TUnit extends RenderUnit> = (
  element: TeiElement,
  context: RenderContext,
  traverser: TraversalDriver<TUnit>,
) => TUnit;
