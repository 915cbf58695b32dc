/**
 * Scraper Module
 *
 * Downloads the listing page and bulletins, finds PDF links and reads PDF text
 */

export { HttpFetcher, type DocumentFetcher, type FetcherOptions } from './http-fetcher.js';
export { extractPdfLinks } from './link-extractor.js';
export {
  createTextExtractor,
  extractText,
  loadWithPdfjs,
  type PdfLoader,
  type PdfSource,
  type TextExtractorOptions,
} from './pdf-text.js';
