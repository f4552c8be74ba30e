/**
 * Text Renderer
 *
 * Renders documents as word-wrapped plain text. Every call returns a line
 * sequence so block containers can splice child output directly.
 */

import {
  findChild,
  findChildren,
  isElement,
  localName,
  textContent,
} from '../../document/accessors.js';
import { isSectionTag, QUOTE_BLOCK_CHILD_TAGS } from '../../document/tags.js';
import type { DocumentSection, TeiDocument, TeiElement } from '../../document/types.js';
import { collapseWhitespace } from '../../lib/text-utils.js';
import { BaseRenderer, type HandlerTable } from '../core/base-renderer.js';
import {
  DEFAULT_LINE_WIDTH,
  DEFAULT_MILESTONE_STYLE,
  HARD_BREAK,
  STARS_ORNAMENT,
  VERSE_INDENT,
  VERSE_LINE_INDENTS,
} from '../core/constants.js';
import { RenderContext } from '../core/context.js';
import type { TraversalDriver } from '../core/types.js';
import { centerLine, centerPadding, visualLength, wrapText } from './text-wrap.js';

type Lines = readonly string[];

/** Tags whose content is marked with underscores */
const EMPHASIS_TAGS: ReadonlySet<string> = new Set(['hi', 'emph', 'title', 'foreign']);

const BULLET = '  • ';
const BULLET_HANG = '    ';
const TABLE_GUTTER = '  ';

export interface TextRendererOptions {
  lineWidth?: number;
}

function isCentered(style: string): boolean {
  return style === 'center' || style === 'centered';
}

/**
 * Flatten inline text, turning hard breaks into spaces.
 */
function singleLine(text: string): string {
  return collapseWhitespace(text.split(HARD_BREAK).join(' '));
}

/**
 * Left-justify a cell to a column width measured in visual columns.
 */
function padCell(cell: string, width: number): string {
  return cell + ' '.repeat(Math.max(0, width - visualLength(cell)));
}

export class TextRenderer extends BaseRenderer<Lines> {
  readonly formatName = 'text' as const;
  readonly lineWidth: number;

  constructor(options: TextRendererOptions = {}) {
    super();
    this.lineWidth = options.lineWidth ?? DEFAULT_LINE_WIDTH;
  }

  override createRootContext(): RenderContext {
    return new RenderContext({ lineWidth: this.lineWidth });
  }

  renderDocumentStart(_doc: TeiDocument): Lines {
    return [];
  }

  renderDocumentEnd(): Lines {
    return [];
  }

  protected createHandlers(): HandlerTable<Lines> {
    return {
      div: (el, ctx, t) => this.renderDivision(el, ctx, t),
      head: (el, ctx) => this.renderHeading(el, ctx),
      p: (el, ctx) => this.renderParagraph(el, ctx),
      quote: (el, ctx, t) => this.renderQuote(el, ctx, t),
      lg: (el, ctx, t) => this.renderLineGroup(el, ctx, t),
      list: (el, ctx) => this.renderList(el, ctx),
      table: (el, ctx) => this.renderTable(el, ctx),
      figure: (el, ctx) => this.renderFigure(el, ctx),
      milestone: (el, ctx) => this.renderMilestone(el, ctx),
      signed: (el, ctx) => this.renderSigned(el, ctx),
    };
  }

  protected renderUnrecognized(element: TeiElement, context: RenderContext): Lines {
    const text = collapseWhitespace(textContent(element));
    if (!text) return [];
    return [...this.wrapAtIndent(text, context), ''];
  }

  /**
   * Inline content with emphasis as `_x_`, quotations glyph-wrapped and
   * line breaks as hard-break markers.
   */
  extractInlineText(element: TeiElement, context: RenderContext): string {
    let result = '';
    for (const child of element.children) {
      if (!isElement(child)) {
        result += child.value;
        continue;
      }

      const tag = localName(child);
      if (tag === 'lb') {
        result += HARD_BREAK;
      } else if (tag === 'quote') {
        const [open, close] = this.getSmartQuotes(context.quoteDepth);
        result += open + this.extractInlineText(child, context.withDeeperQuote()) + close;
      } else if (EMPHASIS_TAGS.has(tag)) {
        const inner = this.extractInlineText(child, context);
        result += inner ? `_${inner}_` : '';
      } else if (tag === 'note') {
        result += ` [${collapseWhitespace(textContent(child))}]`;
      } else if (tag === 'ref') {
        result += this.extractInlineText(child, context);
      } else {
        result += textContent(child);
      }
    }
    return result;
  }

  /**
   * Inline text of an element on one line, with quotation glyphs and
   * emphasis marks kept.
   */
  private inlineLine(element: TeiElement, context: RenderContext, tag: string): string {
    return singleLine(this.extractInlineText(element, context.withParent(tag)));
  }

  private wrapAtIndent(text: string, context: RenderContext): string[] {
    return wrapText(text, {
      width: context.lineWidth,
      initialIndent: context.currentIndent,
      subsequentIndent: context.currentIndent,
    });
  }

  /**
   * Wrap inline text, honoring hard breaks. Empty when there is no text.
   */
  private wrapInline(text: string, context: RenderContext): string[] {
    return text
      .split(HARD_BREAK)
      .map(collapseWhitespace)
      .filter(Boolean)
      .flatMap((segment) => this.wrapAtIndent(segment, context));
  }

  renderDivision(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<Lines>,
  ): Lines {
    const section = isSectionTag(context.parentTag) ? context.parentTag : context.section;
    const childContext = context.withSection(section).withDeeperDivision().withParent('div');
    return traverser.traverseChildren(element, childContext).flat();
  }

  renderHeading(element: TeiElement, context: RenderContext): Lines {
    const text = this.inlineLine(element, context, 'head');
    if (!text) return [];

    const parent = context.parentTag;
    if (parent === 'div') {
      if (context.divisionDepth <= 1 && context.section) {
        return this.sectionHeading(text, context.section);
      }
      return [text.toUpperCase(), '', ''];
    }
    if (isSectionTag(parent)) {
      return this.sectionHeading(text, parent);
    }
    return [];
  }

  private sectionHeading(text: string, section: DocumentSection): Lines {
    switch (section) {
      case 'body':
        return ['', '', '', text.toUpperCase(), '', ''];
      case 'front':
        return [text, '='.repeat(visualLength(text)), ''];
      case 'back':
        return [text.toUpperCase(), ''];
    }
  }

  renderParagraph(element: TeiElement, context: RenderContext): Lines {
    const text = this.extractInlineText(element, context.withParent('p'));
    const lines = this.wrapInline(text, context);
    if (lines.length === 0) return [];
    return [...lines, ''];
  }

  renderQuote(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<Lines>,
  ): Lines {
    if (context.isInlineParent) {
      const [open, close] = this.getSmartQuotes(context.quoteDepth);
      const inner = singleLine(this.extractInlineText(element, context.withDeeperQuote()));
      return [open + inner + close];
    }

    const deeper = context.withDeeperQuote().withDeeperBlock().withIndent(1);
    const blockChildren = element.children
      .filter(isElement)
      .filter((child) => QUOTE_BLOCK_CHILD_TAGS.has(localName(child)));

    if (blockChildren.length > 0) {
      return blockChildren.flatMap((child) => [
        ...traverser.traverseElement(
          child,
          deeper.withParent(localName(child), this.getStyleHint(child)),
        ),
      ]);
    }

    const lines = this.wrapInline(this.extractInlineText(element, deeper), deeper);
    if (lines.length === 0) return [];
    return [...lines, ''];
  }

  renderLineGroup(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<Lines>,
  ): Lines {
    const style = this.getStyleHint(element);
    const childContext = context.withParent('lg', style);
    const lines: string[] = [];
    let run: TeiElement[] = [];

    const flushRun = (): void => {
      lines.push(...this.formatVerseLines(run, style, context));
      run = [];
    };

    for (const child of element.children) {
      if (!isElement(child)) continue;
      const tag = localName(child);

      if (tag === 'l') {
        run.push(child);
        continue;
      }
      flushRun();

      if (tag === 'head') {
        const title = this.inlineLine(child, context, 'head').toUpperCase();
        if (title) {
          lines.push(
            isCentered(style)
              ? centerLine(title, context.lineWidth)
              : context.currentIndent + VERSE_INDENT + title,
            '',
          );
        }
      } else if (tag === 'lg') {
        const stanzaStyle = this.getStyleHint(child) || style;
        lines.push(...this.formatVerseLines(findChildren(child, 'l'), stanzaStyle, context), '');
      } else {
        lines.push(...traverser.traverseElement(child, childContext));
      }
    }
    flushRun();

    lines.push('');
    return lines;
  }

  /**
   * Lay out verse lines. A centered group pads every non-centered line by
   * the same amount so the block sits centered as a unit.
   */
  private formatVerseLines(
    verseLines: readonly TeiElement[],
    style: string,
    context: RenderContext,
  ): string[] {
    const width = context.lineWidth;
    const entries = verseLines.map((line) => ({
      text: singleLine(this.extractInlineText(line, context.withParent('l'))),
      style: this.getStyleHint(line),
    }));

    if (isCentered(style)) {
      const longest = Math.max(0, ...entries.map((entry) => visualLength(entry.text)));
      const pad = centerPadding(longest, width);
      return entries.map((entry) =>
        isCentered(entry.style) ? centerLine(entry.text, width) : pad + entry.text,
      );
    }

    return entries.map((entry) => {
      if (isCentered(entry.style)) {
        return centerLine(entry.text, width);
      }
      if (!entry.text) {
        return '';
      }
      const extra = ' '.repeat(VERSE_LINE_INDENTS[entry.style] ?? 0);
      return context.currentIndent + VERSE_INDENT + extra + entry.text;
    });
  }

  renderList(element: TeiElement, context: RenderContext): Lines {
    const indent = context.currentIndent;
    const itemContext = context.withParent('item');
    const lines: string[] = [];

    for (const item of findChildren(element, 'item')) {
      const text = singleLine(this.extractInlineText(item, itemContext));
      if (!text) continue;
      lines.push(
        ...wrapText(text, {
          width: context.lineWidth,
          initialIndent: indent + BULLET,
          subsequentIndent: indent + BULLET_HANG,
        }),
      );
    }

    lines.push('');
    return lines;
  }

  renderTable(element: TeiElement, context: RenderContext): Lines {
    const rows = findChildren(element, 'row')
      .map((row) => findChildren(row, 'cell').map((cell) => this.inlineLine(cell, context, 'cell')))
      .filter((cells) => cells.length > 0);

    const widths: number[] = [];
    for (const cells of rows) {
      cells.forEach((cell, column) => {
        widths[column] = Math.max(widths[column] ?? 0, visualLength(cell));
      });
    }

    const prefix = context.currentIndent + TABLE_GUTTER;
    const lines = rows.map((cells) =>
      (prefix + cells.map((cell, column) => padCell(cell, widths[column] ?? 0)).join(TABLE_GUTTER)).trimEnd(),
    );
    lines.push('');
    return lines;
  }

  renderFigure(element: TeiElement, context: RenderContext): Lines {
    const head = findChild(element, 'head');
    const caption = head ? this.inlineLine(head, context, 'head') : '';
    const lines = caption
      ? this.wrapAtIndent(`[Illustration: ${caption}]`, context)
      : [context.currentIndent + '[Illustration]'];
    lines.push('');
    return lines;
  }

  renderMilestone(element: TeiElement, context: RenderContext): Lines {
    const style = this.getFormatStyleHint(element, this.formatName, DEFAULT_MILESTONE_STYLE);
    if (style === 'stars') {
      return [centerLine(STARS_ORNAMENT, context.lineWidth), ''];
    }
    if (style === 'none') {
      return [];
    }
    return ['', ''];
  }

  renderSigned(element: TeiElement, context: RenderContext): Lines {
    const text = singleLine(this.extractInlineText(element, context.withParent('signed')));
    if (!text) return [];

    if (text.length <= context.lineWidth) {
      return [' '.repeat(context.lineWidth - text.length) + text, ''];
    }
    return [...this.wrapAtIndent(text, context), ''];
  }
}
