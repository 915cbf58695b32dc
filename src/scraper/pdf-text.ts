/**
 * PDF text extraction
 *
 * Never rejects: a page that fails is skipped, and a document that cannot
 * be opened yields ''. Callers treat '' as "no text".
 */

import { ExtractionError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * An opened PDF, one page at a time
 */
export interface PdfSource {
  numPages: number;
  /** 1-based */
  pageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export type PdfLoader = (bytes: Uint8Array) => Promise<PdfSource>;

/**
 * Open a PDF with pdfjs-dist. Loaded lazily so that modules which only
 * need the types do not pull in pdf.js.
 */
export const loadWithPdfjs: PdfLoader = async (bytes) => {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdf.js may take ownership of the buffer, so hand it a copy
  const task = getDocument({
    data: new Uint8Array(bytes),
    verbosity: 0,
    isEvalSupported: false,
    useSystemFonts: false,
  });
  const document = await task.promise;

  return {
    numPages: document.numPages,
    async pageText(pageNumber) {
      const page = await document.getPage(pageNumber);
      try {
        const content = await page.getTextContent();
        return content.items
          .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
          .join('');
      } finally {
        page.cleanup();
      }
    },
    async close() {
      await task.destroy();
    },
  };
};

export interface TextExtractorOptions {
  loader?: PdfLoader;
  logger?: Logger;
}

export function createTextExtractor(
  options: TextExtractorOptions = {}
): (bytes: Uint8Array) => Promise<string> {
  const loader = options.loader ?? loadWithPdfjs;
  const logger = options.logger ?? defaultLogger;

  return async function extractText(bytes: Uint8Array): Promise<string> {
    let source: PdfSource;
    try {
      source = await loader(bytes);
    } catch (error) {
      const failure = new ExtractionError(`Could not open PDF: ${errorMessage(error)}`, undefined, error);
      logger.error({ error: failure, size: bytes.byteLength }, 'PDF processing failed');
      return '';
    }

    const parts: string[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= source.numPages; pageNumber++) {
        try {
          const text = await source.pageText(pageNumber);
          if (text) {
            parts.push(text);
          }
        } catch (error) {
          const failure = new ExtractionError(
            `Page ${pageNumber}: ${errorMessage(error)}`,
            pageNumber,
            error
          );
          logger.warn({ page: pageNumber, error: failure }, 'Page text extraction failed');
        }
      }
    } finally {
      await source.close().catch((error: unknown) => {
        logger.debug({ error: errorMessage(error) }, 'Failed to release PDF document');
      });
    }

    return parts.join(' ');
  };
}

/**
 * Extract text with the default pdf.js loader
 */
export const extractText = createTextExtractor();
