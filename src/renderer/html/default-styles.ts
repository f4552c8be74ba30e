/**
 * Default Stylesheet
 *
 * Rules shared by the standalone HTML document and the EPUB stylesheet.
 */

export const DEFAULT_CSS_RULES: readonly string[] = [
  'body { max-width: 40em; margin: 2em auto; padding: 0 1em; font-family: serif; line-height: 1.6; }',
  'h1 { text-align: center; }',
  'h2 { margin-top: 2em; }',
  '.italic { font-style: italic; }',
  '.bold { font-weight: bold; }',
  '.underline { text-decoration: underline; }',
  '.small-caps { font-variant: small-caps; }',
  '.signature { text-align: right; font-style: italic; margin-top: 0.5em; }',
  'blockquote { margin: 1em 2em; }',
  'figure { margin: 2em auto; width: 80%; max-width: 100%; text-align: center; }',
  'figure.left { float: left; margin: 0 2em 1em 0; width: 50%; max-width: 50%; }',
  'figure.right { float: right; margin: 0 0 1em 2em; width: 50%; max-width: 50%; }',
  'figure.center { margin: 2em auto; display: block; }',
  'figure img { width: 100%; height: auto; }',
  'figcaption { margin-top: 0.5em; font-style: italic; }',
  '.poem { margin: 1em 0; }',
  '.poem.center { text-align: center; }',
  '.poem.center .stanza { display: inline-block; text-align: left; }',
  '.poem-title { text-align: center; font-weight: bold; margin-bottom: 1em; }',
  '.stanza { margin-bottom: 1em; }',
  '.line { margin-top: 0; margin-bottom: 0; }',
  '.indent { margin-left: 2em; }',
  '.indent2 { margin-left: 4em; }',
  '.indent3 { margin-left: 6em; }',
  '.center { text-align: center; }',
  '.milestone { text-align: center; margin: 2em 0; }',
  '.milestone.stars::before { content: "*       *       *       *       *"; white-space: pre; }',
  '.milestone.space { height: 2em; }',
  'table { border-collapse: collapse; margin: 1em 0; }',
  'td, th { border: 1px solid #ccc; padding: 0.5em; }',
];

/**
 * Complete stylesheet text: defaults, then custom rules under a marker comment.
 */
export function buildStylesheet(customCss = ''): string {
  const css = DEFAULT_CSS_RULES.join('\n') + '\n';
  return customCss ? `${css}\n/* Custom styles */\n${customCss}\n` : css;
}
