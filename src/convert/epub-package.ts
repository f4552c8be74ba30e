/**
 * EPUB Package Documents
 *
 * Container, navigation and package (OPF) documents for an EPUB 3 archive.
 */

import type { DocumentMetadata } from '../document/types.js';
import { EPUB_OPS_NAMESPACE, STYLESHEET_HREF, XHTML_NAMESPACE } from '../renderer/epub/epub-renderer.js';
import { baseName, escapeXml } from '../lib/text-utils.js';
import type { PackagedImage } from './images.js';

export const EPUB_MIME_TYPE = 'application/epub+zip';
export const CONTENT_DIR = 'OEBPS';
export const PACKAGE_DOCUMENT = 'content.opf';
export const NAV_DOCUMENT = 'nav.xhtml';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const COVER_PATTERN = /^cover\.(jpe?g|png|gif)$/i;

export interface PackageEntry {
  fileName: string;
  /** Title for navigation; entries with an empty title stay out of the toc */
  title: string;
}

export interface PackageDocumentInput {
  bookId: string;
  metadata: DocumentMetadata;
  modified: Date;
  chapters: readonly PackageEntry[];
  images: readonly PackagedImage[];
}

/**
 * Manifest id for an image, derived from its file name.
 */
export function imageItemId(archivePath: string): string {
  return `img_${baseName(archivePath).replace(/[^A-Za-z0-9_-]/g, '_')}`;
}

/**
 * `dcterms:modified` value: UTC, whole seconds.
 */
export function formatModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function createContainerXml(): string {
  return [
    XML_DECLARATION,
    '<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">',
    '  <rootfiles>',
    `    <rootfile full-path="${CONTENT_DIR}/${PACKAGE_DOCUMENT}" media-type="application/oebps-package+xml" />`,
    '  </rootfiles>',
    '</container>',
  ].join('\n');
}

export function createNavDocument(bookTitle: string, entries: readonly PackageEntry[]): string {
  const items = entries
    .filter((entry) => entry.title)
    .map(
      (entry) =>
        `      <li><a href="${escapeXml(entry.fileName)}">${escapeXml(entry.title)}</a></li>`,
    );

  return [
    XML_DECLARATION,
    '<!DOCTYPE html>',
    `<html xmlns="${XHTML_NAMESPACE}" xmlns:epub="${EPUB_OPS_NAMESPACE}">`,
    '<head>',
    '  <title>Table of Contents</title>',
    `  <link rel="stylesheet" type="text/css" href="${STYLESHEET_HREF}" />`,
    '</head>',
    '<body>',
    '  <nav epub:type="toc" id="toc">',
    `    <h1>${escapeXml(bookTitle)}</h1>`,
    '    <ol>',
    ...items,
    '    </ol>',
    '  </nav>',
    '</body>',
    '</html>',
  ].join('\n');
}

export function createPackageDocument(input: PackageDocumentInput): string {
  const { bookId, metadata, modified, chapters, images } = input;
  const cover = images.find((image) => COVER_PATTERN.test(baseName(image.archivePath)));

  const lines = [
    XML_DECLARATION,
    '<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id">',
    '  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">',
    `    <dc:identifier id="book-id">${escapeXml(bookId)}</dc:identifier>`,
    `    <dc:title>${escapeXml(metadata.title)}</dc:title>`,
    `    <dc:language>${escapeXml(metadata.language)}</dc:language>`,
    `    <dc:creator>${escapeXml(metadata.author)}</dc:creator>`,
    `    <meta property="dcterms:modified">${formatModified(modified)}</meta>`,
  ];
  if (cover) {
    lines.push(`    <meta name="cover" content="${imageItemId(cover.archivePath)}" />`);
  }
  lines.push(
    '  </metadata>',
    '  <manifest>',
    `    <item id="nav" href="${NAV_DOCUMENT}" media-type="application/xhtml+xml" properties="nav" />`,
    `    <item id="css" href="${STYLESHEET_HREF}" media-type="text/css" />`,
  );

  chapters.forEach((chapter, index) => {
    lines.push(
      `    <item id="chapter${index + 1}" href="${escapeXml(chapter.fileName)}" media-type="application/xhtml+xml" />`,
    );
  });
  for (const image of images) {
    lines.push(
      `    <item id="${imageItemId(image.archivePath)}" href="${escapeXml(image.archivePath)}" media-type="${image.mediaType}" />`,
    );
  }

  lines.push('  </manifest>', '  <spine>');
  chapters.forEach((_, index) => {
    lines.push(`    <itemref idref="chapter${index + 1}" />`);
  });
  lines.push('  </spine>', '</package>');
  return lines.join('\n');
}
