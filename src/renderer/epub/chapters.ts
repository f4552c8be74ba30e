/**
 * Chapter Planning
 *
 * Splits a document into the top-level divisions that each become one EPUB
 * file, and builds the identifier map used to resolve cross-references
 * between those files.
 */

import {
  descendantElements,
  findChild,
  findChildren,
  findDescendant,
  getXmlId,
  textContent,
} from '../../document/accessors.js';
import { DOCUMENT_SECTIONS, type DocumentSection, type TeiDocument, type TeiElement } from '../../document/types.js';
import { collapseWhitespace } from '../../lib/text-utils.js';

export interface ChapterDivision {
  fileName: string;
  section: DocumentSection;
  /** 1-based position within its section */
  index: number;
  division: TeiElement;
  /** Heading text, or '' when the division has none */
  title: string;
  /** The division's own identifier and all descendant identifiers */
  ids: readonly string[];
}

const FILE_PREFIXES: Readonly<Record<DocumentSection, string>> = {
  front: 'front',
  body: 'chapter',
  back: 'back',
};

const UNTITLED_LABELS: Readonly<Record<DocumentSection, string>> = {
  front: 'Front Matter',
  body: 'Chapter',
  back: 'Back Matter',
};

/**
 * Heading text of a division, whitespace-collapsed.
 */
export function divisionTitle(division: TeiElement): string {
  const head = findChild(division, 'head');
  return head ? collapseWhitespace(textContent(head)) : '';
}

function collectIds(division: TeiElement): string[] {
  return [division, ...descendantElements(division)].map(getXmlId).filter(Boolean);
}

/**
 * Chapter files in reading order: front, then body, then back.
 */
export function planChapters(doc: TeiDocument): ChapterDivision[] {
  const chapters: ChapterDivision[] = [];
  for (const section of DOCUMENT_SECTIONS) {
    const container = findDescendant(doc.root, section);
    if (!container) continue;

    findChildren(container, 'div').forEach((division, position) => {
      const index = position + 1;
      chapters.push({
        fileName: `${FILE_PREFIXES[section]}${index}.xhtml`,
        section,
        index,
        division,
        title: divisionTitle(division),
        ids: collectIds(division),
      });
    });
  }
  return chapters;
}

/**
 * Map every identifier to the file that will contain it.
 */
export function buildIdMap(source: TeiDocument | readonly ChapterDivision[]): Map<string, string> {
  const chapters = 'root' in source ? planChapters(source) : source;
  const idMap = new Map<string, string>();
  for (const chapter of chapters) {
    for (const id of chapter.ids) {
      idMap.set(id, chapter.fileName);
    }
  }
  return idMap;
}

/**
 * Title shown in navigation and the package: the heading, or a numbered
 * label for untitled divisions.
 */
export function packageTitle(chapter: ChapterDivision): string {
  return chapter.title || `${UNTITLED_LABELS[chapter.section]} ${chapter.index}`;
}
