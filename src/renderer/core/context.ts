/**
 * Render Context
 *
 * Immutable state inherited down the document tree during rendering. Every
 * derivation returns a new frozen instance; the receiver is never changed.
 */

import type { DocumentSection } from '../../document/types.js';
import { DEFAULT_INDENT_UNIT, DEFAULT_LINE_WIDTH } from './constants.js';

/** Parents whose children are inline content */
const INLINE_PARENTS: ReadonlySet<string> = new Set(['p', 'item', 'cell', 'note', 'head', 'l']);

/** Parents whose children are block content */
const BLOCK_PARENTS: ReadonlySet<string> = new Set([
  'div',
  'body',
  'front',
  'back',
  'quote',
  'figure',
]);

/**
 * Map from element identifier to the output file that contains it.
 */
export type IdMap = ReadonlyMap<string, string>;

export interface RenderContextInit {
  parentTag: string;
  parentStyle: string;
  quoteDepth: number;
  blockDepth: number;
  indentLevel: number;
  indentUnit: string;
  lineWidth: number;
  strictOutput: boolean;
  idMap: IdMap | null;
  section: DocumentSection | null;
  divisionDepth: number;
}

export class RenderContext implements Readonly<RenderContextInit> {
  readonly parentTag: string;
  readonly parentStyle: string;
  /** Quotation boundaries crossed so far */
  readonly quoteDepth: number;
  /** Block quotations entered so far */
  readonly blockDepth: number;
  readonly indentLevel: number;
  readonly indentUnit: string;
  readonly lineWidth: number;
  /** Escape all text and close every void element */
  readonly strictOutput: boolean;
  readonly idMap: IdMap | null;
  /** Top-level section the traversal is inside */
  readonly section: DocumentSection | null;
  /** Divisions entered so far */
  readonly divisionDepth: number;

  constructor(init: Partial<RenderContextInit> = {}) {
    this.parentTag = init.parentTag ?? '';
    this.parentStyle = init.parentStyle ?? '';
    this.quoteDepth = Math.max(0, init.quoteDepth ?? 0);
    this.blockDepth = Math.max(0, init.blockDepth ?? 0);
    this.indentLevel = Math.max(0, init.indentLevel ?? 0);
    this.indentUnit = init.indentUnit ?? DEFAULT_INDENT_UNIT;
    this.lineWidth = init.lineWidth && init.lineWidth > 0 ? init.lineWidth : DEFAULT_LINE_WIDTH;
    this.strictOutput = init.strictOutput ?? false;
    this.idMap = init.idMap ?? null;
    this.section = init.section ?? null;
    this.divisionDepth = Math.max(0, init.divisionDepth ?? 0);
    Object.freeze(this);
  }

  private derive(changes: Partial<RenderContextInit>): RenderContext {
    return new RenderContext({ ...this.toInit(), ...changes });
  }

  toInit(): RenderContextInit {
    return {
      parentTag: this.parentTag,
      parentStyle: this.parentStyle,
      quoteDepth: this.quoteDepth,
      blockDepth: this.blockDepth,
      indentLevel: this.indentLevel,
      indentUnit: this.indentUnit,
      lineWidth: this.lineWidth,
      strictOutput: this.strictOutput,
      idMap: this.idMap,
      section: this.section,
      divisionDepth: this.divisionDepth,
    };
  }

  withParent(tag: string, style = ''): RenderContext {
    return this.derive({ parentTag: tag, parentStyle: style });
  }

  withDeeperQuote(): RenderContext {
    return this.derive({ quoteDepth: this.quoteDepth + 1 });
  }

  withDeeperBlock(): RenderContext {
    return this.derive({ blockDepth: this.blockDepth + 1 });
  }

  withIndent(levels = 1): RenderContext {
    return this.derive({ indentLevel: this.indentLevel + levels });
  }

  withStrictOutput(strict: boolean): RenderContext {
    return this.derive({ strictOutput: strict });
  }

  withIdMap(idMap: IdMap | null): RenderContext {
    return this.derive({ idMap });
  }

  withSection(section: DocumentSection | null): RenderContext {
    return this.derive({ section });
  }

  withDeeperDivision(): RenderContext {
    return this.derive({ divisionDepth: this.divisionDepth + 1 });
  }

  get currentIndent(): string {
    return this.indentUnit.repeat(this.indentLevel);
  }

  /** Width left for text after the current indent */
  get availableWidth(): number {
    return Math.max(1, this.lineWidth - this.currentIndent.length);
  }

  get isInlineParent(): boolean {
    return INLINE_PARENTS.has(this.parentTag);
  }

  get isBlockParent(): boolean {
    return BLOCK_PARENTS.has(this.parentTag);
  }
}
