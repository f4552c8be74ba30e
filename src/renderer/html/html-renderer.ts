/**
 * HTML Renderer
 *
 * Renders documents as a single HTML string with semantic tag mapping,
 * smart quotes and an embedded stylesheet. In strict mode every text run
 * and attribute value is escaped and void elements close explicitly.
 */

import {
  findChild,
  findChildren,
  getXmlId,
  isElement,
  localName,
  textContent,
} from '../../document/accessors.js';
import { getMetadata } from '../../document/metadata.js';
import { isSectionTag, QUOTE_BLOCK_CHILD_TAGS } from '../../document/tags.js';
import type { TeiDocument, TeiElement } from '../../document/types.js';
import { collapseWhitespace, escapeMarkup, escapeXml } from '../../lib/text-utils.js';
import { BaseRenderer, type HandlerTable } from '../core/base-renderer.js';
import { DEFAULT_MILESTONE_STYLE } from '../core/constants.js';
import { RenderContext, type IdMap } from '../core/context.js';
import type { TraversalDriver } from '../core/types.js';
import { DEFAULT_CSS_RULES } from './default-styles.js';

/** Matches `scheme:` and protocol-relative `//` targets */
const ABSOLUTE_URL_PATTERN = /^([a-z][a-z0-9+.-]*:|\/\/)/i;

/** Deepest heading level emitted */
const MAX_HEADING_LEVEL = 6;

export interface HtmlRendererOptions {
  /**
   * Force strict output in every render call. Without it text still has
   * `&`, `<` and `>` escaped, but quotes are kept and void elements stay open.
   */
  strictOutput?: boolean;
  /** Extra rules appended to the embedded stylesheet */
  customCss?: string;
  /** Replacement `src` values keyed by the graphic's original url */
  imageMap?: ReadonlyMap<string, string>;
}

/**
 * Resolve a reference target to an href.
 *
 * Fragments and absolute URLs pass through. A bare identifier found in the
 * id map points into its file; any other bare identifier becomes a fragment.
 */
export function resolveReference(target: string, idMap: IdMap | null): string {
  if (target.startsWith('#') || ABSOLUTE_URL_PATTERN.test(target)) {
    return target;
  }
  const file = idMap?.get(target);
  return file ? `${file}#${target}` : `#${target}`;
}

/** Attribute pairs in output order; null values are omitted */
type Attributes = readonly (readonly [string, string | null])[];

function optional(value: string): string | null {
  return value || null;
}

export class HtmlRenderer extends BaseRenderer<string> {
  readonly formatName: 'html' | 'epub' = 'html';

  protected readonly strictOutput: boolean;
  protected readonly customCss: string;
  protected readonly imageMap: ReadonlyMap<string, string>;

  constructor(options: HtmlRendererOptions = {}) {
    super();
    this.strictOutput = options.strictOutput ?? false;
    this.customCss = options.customCss ?? '';
    this.imageMap = options.imageMap ?? new Map();
  }

  override createRootContext(): RenderContext {
    return new RenderContext({ strictOutput: this.strictOutput });
  }

  override renderElement(
    element: TeiElement,
    tag: string,
    context: RenderContext,
    traverser: TraversalDriver<string>,
  ): string {
    const effective = this.strictOutput ? context.withStrictOutput(true) : context;
    const html = super.renderElement(element, tag, effective, traverser);
    return html && this.isSectionChild(tag, effective) ? `${html}\n` : html;
  }

  /**
   * Elements sitting directly in front, body or back each end with a newline.
   */
  private isSectionChild(tag: string, context: RenderContext): boolean {
    return (
      context.section !== null &&
      context.parentTag === tag &&
      context.divisionDepth === 0 &&
      context.blockDepth === 0
    );
  }

  renderDocumentStart(doc: TeiDocument): string {
    const { title, language } = getMetadata(doc);
    const close = this.strictOutput ? ' />' : '>';
    const parts = [
      '<!DOCTYPE html>',
      `<html lang="${escapeXml(language)}">`,
      '<head>',
      `  <meta charset="UTF-8"${close}`,
      `  <meta name="viewport" content="width=device-width, initial-scale=1.0"${close}`,
      `  <title>${escapeXml(title)}</title>`,
      '  <style>',
      ...DEFAULT_CSS_RULES.map((rule) => `    ${rule}`),
    ];

    if (this.customCss) {
      parts.push('', '    /* Custom styles */');
      for (const line of this.customCss.split('\n')) {
        parts.push(line ? `    ${line}` : '');
      }
    }

    parts.push('  </style>', '</head>', '<body>', `<h1>${escapeXml(title)}</h1>`);
    return parts.join('\n') + '\n';
  }

  renderDocumentEnd(): string {
    return '</body>\n</html>\n';
  }

  protected createHandlers(): HandlerTable<string> {
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

  protected renderUnrecognized(element: TeiElement, context: RenderContext): string {
    return this.renderInline(element, context);
  }

  protected text(value: string, context: RenderContext): string {
    return context.strictOutput ? escapeXml(value) : escapeMarkup(value);
  }

  private attributeValue(value: string, context: RenderContext): string {
    return context.strictOutput ? escapeXml(value) : escapeMarkup(value).replace(/"/g, '&quot;');
  }

  protected openTag(name: string, attributes: Attributes, context: RenderContext): string {
    const rendered = attributes
      .map(([key, value]) => (value === null ? '' : ` ${key}="${this.attributeValue(value, context)}"`))
      .join('');
    return `<${name}${rendered}>`;
  }

  protected voidTag(name: string, attributes: Attributes, context: RenderContext): string {
    const open = this.openTag(name, attributes, context);
    return context.strictOutput ? `${open.slice(0, -1)} />` : open;
  }

  /**
   * Inline content with markup, tracking quote depth for nested quotations.
   */
  renderInline(element: TeiElement, context: RenderContext): string {
    let result = '';
    for (const child of element.children) {
      result += isElement(child)
        ? this.renderInlineElement(child, context)
        : this.text(child.value, context);
    }
    return result;
  }

  private renderInlineElement(child: TeiElement, context: RenderContext): string {
    switch (localName(child)) {
      case 'lb':
        return this.voidTag('br', [], context);
      case 'quote': {
        const [open, close] = this.getSmartQuotes(context.quoteDepth);
        return open + this.renderInline(child, context.withDeeperQuote()) + close;
      }
      case 'hi': {
        const style = this.getStyleHint(child, 'italic');
        const inner = this.renderInline(child, context);
        if (style === 'italic') return `<i>${inner}</i>`;
        if (style === 'bold') return `<b>${inner}</b>`;
        return `${this.openTag('span', [['class', optional(style)]], context)}${inner}</span>`;
      }
      case 'emph':
        return `<em>${this.renderInline(child, context)}</em>`;
      case 'title':
      case 'foreign':
        return `<i>${this.renderInline(child, context)}</i>`;
      case 'note':
        return `<sup>[${this.renderInline(child, context)}]</sup>`;
      case 'ref': {
        const inner = this.renderInline(child, context);
        const target = child.attributes.target ?? '';
        if (!target) return inner;
        const href = resolveReference(target, context.idMap);
        return `${this.openTag('a', [['href', href]], context)}${inner}</a>`;
      }
      default:
        return this.text(textContent(child), context);
    }
  }

  renderDivision(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<string>,
  ): string {
    const type = element.attributes.type ?? '';
    const section = isSectionTag(context.parentTag) ? context.parentTag : context.section;
    const childContext = context
      .withSection(section)
      .withDeeperDivision()
      .withParent('div', type);

    return [
      this.openTag(
        'div',
        [
          ['id', optional(getXmlId(element))],
          ['class', optional(type)],
        ],
        context,
      ),
      ...traverser.traverseChildren(element, childContext),
      '</div>',
    ].join('\n');
  }

  /**
   * Heading of a division or section. Headings elsewhere (verse titles,
   * figure captions) are rendered by their parent, so this returns ''.
   */
  renderHeading(element: TeiElement, context: RenderContext): string {
    if (context.parentTag !== 'div' && !isSectionTag(context.parentTag)) {
      return '';
    }
    const level = Math.min(Math.max(context.divisionDepth + 1, 2), MAX_HEADING_LEVEL);
    return `<h${level}>${this.renderInline(element, context.withParent('head'))}</h${level}>`;
  }

  renderParagraph(element: TeiElement, context: RenderContext): string {
    const style = this.getStyleHint(element);
    const content = this.renderInline(element, context.withParent('p', style));
    return `${this.openTag('p', [['class', optional(style)]], context)}${content}</p>`;
  }

  renderQuote(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<string>,
  ): string {
    if (context.isInlineParent) {
      const [open, close] = this.getSmartQuotes(context.quoteDepth);
      return open + this.renderInline(element, context.withDeeperQuote()) + close;
    }

    const deeper = context.withDeeperQuote().withDeeperBlock();
    const blocks = element.children
      .filter(isElement)
      .filter((child) => QUOTE_BLOCK_CHILD_TAGS.has(localName(child)))
      .map((child) =>
        traverser.traverseElement(
          child,
          deeper.withParent(localName(child), this.getStyleHint(child)),
        ),
      )
      .filter(Boolean);

    if (blocks.length > 0) {
      return `<blockquote>\n${blocks.join('\n')}\n</blockquote>`;
    }
    const content = this.renderInline(element, deeper.withParent('quote'));
    return `<blockquote><p>${content}</p></blockquote>`;
  }

  renderLineGroup(
    element: TeiElement,
    context: RenderContext,
    traverser: TraversalDriver<string>,
  ): string {
    const style = this.getStyleHint(element);
    const childContext = context.withParent('lg', style);
    const parts = [this.openTag('div', [['class', style ? `poem ${style}` : 'poem']], context)];

    const verseLine = (line: TeiElement, indent: string): string => {
      const lineStyle = this.getStyleHint(line);
      const content = this.renderInline(line, childContext.withParent('l', lineStyle));
      const open = this.openTag('div', [['class', lineStyle ? `line ${lineStyle}` : 'line']], context);
      return `${indent}${open}${content}</div>`;
    };
    const indented = (html: string, indent: string): string[] =>
      html ? html.split('\n').map((line) => indent + line) : [];

    for (const child of element.children) {
      if (!isElement(child)) continue;
      const tag = localName(child);

      if (tag === 'head') {
        const title = this.renderInline(child, childContext.withParent('head'));
        parts.push(`  <div class="poem-title">${title}</div>`);
      } else if (tag === 'l') {
        parts.push(verseLine(child, '  '));
      } else if (tag === 'lg') {
        const stanzaStyle = this.getStyleHint(child);
        parts.push(
          `  ${this.openTag('div', [['class', stanzaStyle ? `stanza ${stanzaStyle}` : 'stanza']], context)}`,
        );
        for (const stanzaChild of child.children) {
          if (!isElement(stanzaChild)) continue;
          if (localName(stanzaChild) === 'l') {
            parts.push(verseLine(stanzaChild, '    '));
          } else {
            parts.push(...indented(traverser.traverseElement(stanzaChild, childContext), '    '));
          }
        }
        parts.push('  </div>');
      } else {
        parts.push(...indented(traverser.traverseElement(child, childContext), '  '));
      }
    }

    parts.push('</div>');
    return parts.join('\n');
  }

  renderList(element: TeiElement, context: RenderContext): string {
    const itemContext = context.withParent('item');
    const items = findChildren(element, 'item').map(
      (item) => `  <li>${this.renderInline(item, itemContext)}</li>`,
    );
    return ['<ul>', ...items, '</ul>'].join('\n');
  }

  renderTable(element: TeiElement, context: RenderContext): string {
    const cellContext = context.withParent('cell');
    const rows = findChildren(element, 'row').flatMap((row) => [
      '  <tr>',
      ...findChildren(row, 'cell').map((cell) => {
        const name = cell.attributes.role === 'label' ? 'th' : 'td';
        return `    <${name}>${this.renderInline(cell, cellContext)}</${name}>`;
      }),
      '  </tr>',
    ]);
    return ['<table>', ...rows, '</table>'].join('\n');
  }

  renderFigure(element: TeiElement, context: RenderContext): string {
    const graphic = findChild(element, 'graphic');
    const width = graphic?.attributes.width ?? '';
    const parts = [
      this.openTag(
        'figure',
        [
          ['class', optional(this.getStyleHint(element))],
          ['style', width ? `width: ${width};` : null],
        ],
        context,
      ),
    ];

    if (graphic) {
      const url = graphic.attributes.url ?? '';
      const description = findChild(element, 'figDesc');
      const alt = description ? collapseWhitespace(textContent(description)) : '';
      const src = this.imageMap.get(url) ?? url;
      parts.push(`  ${this.voidTag('img', [['src', src], ['alt', alt]], context)}`);
    }

    const head = findChild(element, 'head');
    if (head) {
      parts.push(`  <figcaption>${this.renderInline(head, context.withParent('head'))}</figcaption>`);
    }

    parts.push('</figure>');
    return parts.join('\n');
  }

  renderMilestone(element: TeiElement, context: RenderContext): string {
    const style = this.getFormatStyleHint(element, this.formatName, DEFAULT_MILESTONE_STYLE);
    if (style === 'none') {
      return '';
    }
    return `${this.openTag('div', [['class', `milestone ${style}`]], context)}</div>`;
  }

  renderSigned(element: TeiElement, context: RenderContext): string {
    const content = this.renderInline(element, context.withParent('signed'));
    return `<div class="signature">${content}</div>`;
  }
}
