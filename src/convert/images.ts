/**
 * Image Collection
 *
 * Finds graphics referenced by a document and loads them for packaging.
 */

import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';
import { descendantElements, localName } from '../document/accessors.js';
import type { TeiDocument } from '../document/types.js';
import { baseName } from '../lib/text-utils.js';
import { getLogger } from '../shared/services/logging.service.js';

export interface PackagedImage {
  /** url as written on the graphic element */
  url: string;
  /** Path inside the package content directory */
  archivePath: string;
  data: Buffer;
  mediaType: string;
}

const MEDIA_TYPES: Readonly<Record<string, string>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
};

const DEFAULT_MEDIA_TYPE = 'image/png';

export function imageMediaType(path: string): string {
  return MEDIA_TYPES[extname(path).toLowerCase()] ?? DEFAULT_MEDIA_TYPE;
}

/**
 * File name not yet taken in the package: `p.png`, then `p-2.png`, `p-3.png`.
 */
function uniqueName(name: string, taken: ReadonlySet<string>): string {
  if (!taken.has(name)) return name;
  const extension = extname(name);
  const stem = name.slice(0, name.length - extension.length);
  let suffix = 2;
  while (taken.has(`${stem}-${suffix}${extension}`)) {
    suffix++;
  }
  return `${stem}-${suffix}${extension}`;
}

/**
 * Unique graphic urls in document order.
 */
export function collectGraphicUrls(doc: TeiDocument): string[] {
  const urls = new Set<string>();
  for (const element of descendantElements(doc.root)) {
    const url = element.attributes.url;
    if (localName(element) === 'graphic' && url) {
      urls.add(url);
    }
  }
  return [...urls];
}

/**
 * Read every image that exists relative to the input directory. Missing or
 * unreadable files are skipped with a warning; their graphics keep the
 * original src. Images sharing a file name get numbered package names.
 */
export async function loadImages(
  urls: readonly string[],
  inputDir: string,
): Promise<PackagedImage[]> {
  const logger = getLogger();
  const images: PackagedImage[] = [];
  const taken = new Set<string>();

  for (const url of urls) {
    const source = resolve(inputDir, url);
    try {
      const data = await readFile(source);
      const name = uniqueName(baseName(url), taken);
      taken.add(name);
      images.push({ url, archivePath: `images/${name}`, data, mediaType: imageMediaType(name) });
    } catch (error) {
      logger.warning('Image not found, keeping original src', {
        url,
        path: source,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return images;
}

/**
 * Map from graphic url to its path inside the package.
 */
export function imageSourceMap(images: readonly PackagedImage[]): Map<string, string> {
  return new Map(images.map((image) => [image.url, image.archivePath]));
}
