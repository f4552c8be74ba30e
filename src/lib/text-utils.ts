/**
 * Text Utilities
 *
 * Pure string helpers shared by the renderers and packaging code.
 */

/**
 * Collapse whitespace runs to single spaces and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Escape markup-significant characters for element content and attribute
 * values. Output is valid in both HTML and XHTML.
 */
export function escapeXml(str: string): string {
  if (!str) return '';
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Escape only the characters that would be read as markup in element
 * content. Quotes are left as written.
 */
export function escapeMarkup(str: string): string {
  if (!str) return '';
  return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Last path segment of a URL or file path.
 */
export function baseName(path: string): string {
  const segments = path.split(/[\\/]/);
  return segments[segments.length - 1] ?? path;
}
