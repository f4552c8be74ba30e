/**
 * EPUB Conversion
 *
 * Renders every top-level division to its own XHTML file and packages the
 * result with jszip. The mimetype entry is written first and stored
 * uncompressed.
 */

import { randomUUID } from 'crypto';
import JSZip from 'jszip';
import { getMetadata } from '../document/metadata.js';
import type { TeiDocument } from '../document/types.js';
import { buildIdMap, packageTitle, planChapters } from '../renderer/epub/chapters.js';
import { EpubRenderer, STYLESHEET_HREF } from '../renderer/epub/epub-renderer.js';
import { buildStylesheet } from '../renderer/html/default-styles.js';
import {
  CONTENT_DIR,
  createContainerXml,
  createNavDocument,
  createPackageDocument,
  EPUB_MIME_TYPE,
  NAV_DOCUMENT,
  PACKAGE_DOCUMENT,
} from './epub-package.js';
import { imageSourceMap, type PackagedImage } from './images.js';

export interface EpubConversionOptions {
  /** Extra rules appended to the package stylesheet */
  customCss?: string;
  images?: readonly PackagedImage[];
  /** Package identifier; a random urn:uuid by default */
  bookId?: string;
  /** Last-modified timestamp; now by default */
  modified?: Date;
}

export async function convertToEpub(
  doc: TeiDocument,
  options: EpubConversionOptions = {},
): Promise<Buffer> {
  const metadata = getMetadata(doc);
  const images = options.images ?? [];
  const chapters = planChapters(doc);
  const idMap = buildIdMap(chapters);
  const renderer = new EpubRenderer({ imageMap: imageSourceMap(images) });

  const zip = new JSZip();
  zip.file('mimetype', EPUB_MIME_TYPE, { compression: 'STORE' });
  zip.file('META-INF/container.xml', createContainerXml());
  zip.file(`${CONTENT_DIR}/${STYLESHEET_HREF}`, buildStylesheet(options.customCss));

  for (const chapter of chapters) {
    zip.file(
      `${CONTENT_DIR}/${chapter.fileName}`,
      renderer.renderChapter(chapter.division, packageTitle(chapter), idMap),
    );
  }

  zip.file(
    `${CONTENT_DIR}/${NAV_DOCUMENT}`,
    createNavDocument(
      metadata.title,
      chapters.map((chapter) => ({ fileName: chapter.fileName, title: chapter.title })),
    ),
  );
  zip.file(
    `${CONTENT_DIR}/${PACKAGE_DOCUMENT}`,
    createPackageDocument({
      bookId: options.bookId ?? `urn:uuid:${randomUUID()}`,
      metadata,
      modified: options.modified ?? new Date(),
      chapters: chapters.map((chapter) => ({
        fileName: chapter.fileName,
        title: packageTitle(chapter),
      })),
      images,
    }),
  );

  for (const image of images) {
    zip.file(`${CONTENT_DIR}/${image.archivePath}`, image.data);
  }

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    mimeType: EPUB_MIME_TYPE,
  });
}
