/**
 * Conversion pipelines barrel
 */

export { convertToText, type TextConversionOptions } from './to-text.js';
export { convertToHtml, type HtmlConversionOptions } from './to-html.js';
export { convertToEpub, type EpubConversionOptions } from './to-epub.js';
export { filterCssForFormat, findCssFiles, loadCustomCss, type CssTarget } from './css.js';
export {
  collectGraphicUrls,
  loadImages,
  imageMediaType,
  imageSourceMap,
  type PackagedImage,
} from './images.js';
export {
  convertFile,
  detectOutputFormat,
  type ConvertFileOptions,
  type ConversionResult,
  type OutputFormatName,
} from './convert-file.js';
