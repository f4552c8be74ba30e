/**
 * Renderer Module
 *
 * Exports for rendering documents to text, HTML and EPUB chapters.
 */

// Core
export { RenderContext, type IdMap, type RenderContextInit } from './core/context.js';
export { Traverser, combineParts, ROOT_TAG } from './core/traverser.js';
export { BaseRenderer, type HandlerTable } from './core/base-renderer.js';
export type {
  ElementHandler,
  OutputFormat,
  RenderUnit,
  Renderer,
  TraversalDriver,
} from './core/types.js';

// Formats
export { TextRenderer, type TextRendererOptions } from './text/text-renderer.js';
export { visualLength, wrapText } from './text/text-wrap.js';
export { HtmlRenderer, resolveReference, type HtmlRendererOptions } from './html/html-renderer.js';
export { buildStylesheet, DEFAULT_CSS_RULES } from './html/default-styles.js';
export { EpubRenderer, type EpubRendererOptions } from './epub/epub-renderer.js';
export {
  buildIdMap,
  divisionTitle,
  packageTitle,
  planChapters,
  type ChapterDivision,
} from './epub/chapters.js';
