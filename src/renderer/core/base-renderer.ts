/**
 * Base Renderer
 *
 * Shared helpers and tag dispatch for every output format. Subclasses supply
 * one handler per block tag plus a fallback for everything else.
 */

import { stripNamespace, textContent } from '../../document/accessors.js';
import { classifyTag, isBlockTag, type BlockTag } from '../../document/tags.js';
import type { TeiDocument, TeiElement } from '../../document/types.js';
import { DOUBLE_QUOTES, SINGLE_QUOTES } from './constants.js';
import { RenderContext } from './context.js';
import type {
  ElementHandler,
  OutputFormat,
  Renderer,
  RenderUnit,
  TraversalDriver,
} from './types.js';

export type HandlerTable<TUnit extends RenderUnit> = Readonly<
  Record<BlockTag, ElementHandler<TUnit>>
>;

export abstract class BaseRenderer<TUnit extends RenderUnit> implements Renderer<TUnit> {
  abstract readonly formatName: OutputFormat;

  private handlerTable: HandlerTable<TUnit> | null = null;

  createRootContext(): RenderContext {
    return new RenderContext();
  }

  abstract renderDocumentStart(doc: TeiDocument): TUnit;
  abstract renderDocumentEnd(): TUnit;

  protected abstract createHandlers(): HandlerTable<TUnit>;

  /**
   * Rendering for tags without a block handler.
   */
  protected abstract renderUnrecognized(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<TUnit>,
  ): TUnit;

  renderElement(
    element: TeiElement,
    tag: string,
    context: RenderContext,
    traverser: TraversalDriver<TUnit>,
  ): TUnit {
    this.handlerTable ??= this.createHandlers();
    // Known inline tags met at block level fall through with unknown ones
    const known = classifyTag(tag);
    if (known !== 'unrecognized' && isBlockTag(known)) {
      return this.handlerTable[known](element, context, traverser);
    }
    return this.renderUnrecognized(element, context, traverser);
  }

  /**
   * Quotation glyphs for a quote opened at the given depth.
   * Even depths use double quotes, odd depths single quotes.
   */
  getSmartQuotes(depth: number): readonly [string, string] {
    return depth % 2 === 0 ? DOUBLE_QUOTES : SINGLE_QUOTES;
  }

  /**
   * All text beneath an element with markup ignored, trimmed.
   */
  extractPlainText(element: TeiElement): string {
    return textContent(element).trim();
  }

  getStyleHint(element: TeiElement, defaultValue = ''): string {
    return element.attributes.rend ?? defaultValue;
  }

  /**
   * Style hint with a per-format override: `rend-<format>` wins over `rend`.
   */
  getFormatStyleHint(
    element: TeiElement,
    format: OutputFormat = this.formatName,
    defaultValue = '',
  ): string {
    return element.attributes[`rend-${format}`] ?? this.getStyleHint(element, defaultValue);
  }

  stripNamespace(name: string): string {
    return stripNamespace(name);
  }
}
