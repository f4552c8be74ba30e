/**
 * Render Tools
 *
 * Tool handlers for the conversion server. Each handler validates its raw
 * input, parses the XML and returns a plain object for the structured
 * response.
 */

import { localName } from '../document/accessors.js';
import { getTitle } from '../document/metadata.js';
import { parseTeiDocument, parseTeiFragment } from '../document/parser.js';
import { filterCssForFormat } from '../convert/css.js';
import { convertToHtml } from '../convert/to-html.js';
import { convertToText } from '../convert/to-text.js';
import { buildIdMap, packageTitle, planChapters } from '../renderer/epub/chapters.js';
import { EpubRenderer } from '../renderer/epub/epub-renderer.js';
import { ConversionError, ErrorCode, ErrorSeverity } from '../shared/errors/index.js';
import {
  BuildIdMapInputSchema,
  RenderEpubChapterInputSchema,
  RenderHtmlInputSchema,
  RenderTextInputSchema,
  type BuildIdMapOutput,
  type RenderEpubChapterOutput,
  type RenderHtmlOutput,
  type RenderTextOutput,
} from './tool-schemas.js';

/**
 * Render a document as plain text.
 *
 * @param rawInput - Document and wrap width (will be validated)
 */
export function renderText(rawInput: unknown): RenderTextOutput {
  const input = RenderTextInputSchema.parse(rawInput);
  const text = convertToText(parseTeiDocument(input.xml), { lineWidth: input.lineWidth });
  // Output ends with a newline, so the last split piece is empty
  return { text, lineCount: text ? text.split('\n').length - 1 : 0 };
}

/**
 * Render a document as a single HTML page.
 *
 * @param rawInput - Document, strict flag and stylesheet (will be validated)
 */
export function renderHtml(rawInput: unknown): RenderHtmlOutput {
  const input = RenderHtmlInputSchema.parse(rawInput);
  const doc = parseTeiDocument(input.xml);
  const html = convertToHtml(doc, {
    strictOutput: input.strict ?? false,
    customCss: input.css ? filterCssForFormat(input.css, 'html') : '',
  });
  return { html, title: getTitle(doc) };
}

/**
 * Render one division as an XHTML chapter file.
 *
 * @param rawInput - Division, fallback title and id map (will be validated)
 */
export function renderEpubChapter(rawInput: unknown): RenderEpubChapterOutput {
  const input = RenderEpubChapterInputSchema.parse(rawInput);
  const division = parseTeiFragment(input.xml);
  if (localName(division) !== 'div') {
    throw new ConversionError(
      `Expected a <div> element, got <${localName(division)}>`,
      ErrorCode.INVALID_ARGUMENT,
      ErrorSeverity.ERROR,
      { element: localName(division) },
    );
  }

  const idMap = new Map(Object.entries(input.idMap ?? {}));
  return { xhtml: new EpubRenderer().renderChapter(division, input.fallbackTitle, idMap) };
}

/**
 * Plan the chapter files of a document and map every identifier to its file.
 *
 * @param rawInput - Document (will be validated)
 */
export function buildChapterIdMap(rawInput: unknown): BuildIdMapOutput {
  const input = BuildIdMapInputSchema.parse(rawInput);
  const chapters = planChapters(parseTeiDocument(input.xml));
  return {
    idMap: Object.fromEntries(buildIdMap(chapters)),
    chapters: chapters.map((chapter) => ({
      fileName: chapter.fileName,
      title: packageTitle(chapter),
    })),
  };
}
