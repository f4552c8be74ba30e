/**
 * Tool Schemas
 *
 * Zod schemas for tool inputs and outputs.
 * Used for validation and type inference.
 */

import { z } from 'zod';
import { MIN_LINE_WIDTH } from '../config/converter-config.js';

// ============================================================================
// render_text - Render a document as plain text
// ============================================================================

export const RenderTextInputSchema = z.object({
  /** Complete TEI document */
  xml: z.string().min(1),
  /** Wrap width (default: 72) */
  lineWidth: z.number().int().min(MIN_LINE_WIDTH).optional(),
});

export const RenderTextOutputSchema = z.object({
  text: z.string(),
  lineCount: z.number(),
});

export type RenderTextInput = z.infer<typeof RenderTextInputSchema>;
export type RenderTextOutput = z.infer<typeof RenderTextOutputSchema>;

// ============================================================================
// render_html - Render a document as one HTML page
// ============================================================================

export const RenderHtmlInputSchema = z.object({
  /** Complete TEI document */
  xml: z.string().min(1),
  /** Escape all text and close void elements (default: false) */
  strict: z.boolean().optional(),
  /** Stylesheet text; `@html` / `@epub` / `@both` directives are honoured */
  css: z.string().optional(),
});

export const RenderHtmlOutputSchema = z.object({
  html: z.string(),
  title: z.string(),
});

export type RenderHtmlInput = z.infer<typeof RenderHtmlInputSchema>;
export type RenderHtmlOutput = z.infer<typeof RenderHtmlOutputSchema>;

// ============================================================================
// render_epub_chapter - Render one division as an XHTML chapter file
// ============================================================================

export const RenderEpubChapterInputSchema = z.object({
  /** A single <div> element */
  xml: z.string().min(1),
  /** Title used when the division has no heading */
  fallbackTitle: z.string(),
  /** Identifier to chapter file, for cross-references */
  idMap: z.record(z.string()).optional(),
});

export const RenderEpubChapterOutputSchema = z.object({
  xhtml: z.string(),
});

export type RenderEpubChapterInput = z.infer<typeof RenderEpubChapterInputSchema>;
export type RenderEpubChapterOutput = z.infer<typeof RenderEpubChapterOutputSchema>;

// ============================================================================
// build_id_map - Map identifiers to the chapter files that contain them
// ============================================================================

export const BuildIdMapInputSchema = z.object({
  /** Complete TEI document */
  xml: z.string().min(1),
});

export const ChapterSummarySchema = z.object({
  fileName: z.string(),
  title: z.string(),
});

export const BuildIdMapOutputSchema = z.object({
  idMap: z.record(z.string()),
  chapters: z.array(ChapterSummarySchema),
});

export type BuildIdMapInput = z.infer<typeof BuildIdMapInputSchema>;
export type BuildIdMapOutput = z.infer<typeof BuildIdMapOutputSchema>;
