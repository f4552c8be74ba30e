/**
 * EPUB Renderer
 *
 * XHTML chapter rendering for EPUB packages. Strict output is always on and
 * cross-references resolve through the id map built before rendering.
 */

import { findChild, getXmlId } from '../../document/accessors.js';
import type { TeiElement } from '../../document/types.js';
import { escapeXml } from '../../lib/text-utils.js';
import { RenderContext, type IdMap } from '../core/context.js';
import { Traverser } from '../core/traverser.js';
import { HtmlRenderer, type HtmlRendererOptions } from '../html/html-renderer.js';
import { divisionTitle } from './chapters.js';

export const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';
export const EPUB_OPS_NAMESPACE = 'http://www.idpf.org/2007/ops';

/** Stylesheet path inside the package, relative to chapter files */
export const STYLESHEET_HREF = 'styles.css';

const SKIP_HEADINGS: ReadonlySet<string> = new Set(['head']);

export type EpubRendererOptions = Omit<HtmlRendererOptions, 'strictOutput'>;

export class EpubRenderer extends HtmlRenderer {
  override readonly formatName = 'epub' as const;

  constructor(options: EpubRendererOptions = {}) {
    super({ ...options, strictOutput: true });
  }

  /**
   * Render one top-level division as a complete XHTML file.
   * Output depends only on the division, the fallback title and the id map.
   */
  renderChapter(division: TeiElement, fallbackTitle: string, idMap?: IdMap | null): string {
    const head = findChild(division, 'head');
    const title = divisionTitle(division) || fallbackTitle;
    const context = new RenderContext({
      parentTag: 'div',
      section: 'body',
      divisionDepth: 1,
      strictOutput: true,
      idMap: idMap ?? null,
    });

    const parts = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<!DOCTYPE html>',
      `<html xmlns="${XHTML_NAMESPACE}" xmlns:epub="${EPUB_OPS_NAMESPACE}">`,
      '<head>',
      `  <title>${escapeXml(title)}</title>`,
      `  <link rel="stylesheet" type="text/css" href="${STYLESHEET_HREF}" />`,
      '</head>',
      '<body>',
    ];

    const id = getXmlId(division);
    const idAttribute = id ? ` id="${escapeXml(id)}"` : '';
    if (head) {
      const heading = this.renderInline(head, context.withParent('head'));
      parts.push(`<h2${idAttribute}>${heading}</h2>`);
    } else if (id) {
      // Cross-references into an untitled chapter still need a target
      parts.push(`<a${idAttribute}></a>`);
    }

    parts.push(...new Traverser(this).traverseChildren(division, context, SKIP_HEADINGS));
    parts.push('</body>', '</html>');
    return parts.join('\n');
  }
}
