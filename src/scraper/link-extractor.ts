/**
 * PDF link extraction from the bulletin listing page
 */

import { load } from 'cheerio';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Return the absolute URL of every anchor whose href ends in ".pdf".
 *
 * The suffix check is case-sensitive and applied to the raw href. Document
 * order is kept and duplicates are not removed.
 */
export function extractPdfLinks(
  html: Uint8Array | string,
  baseUrl: string,
  logger: Logger = defaultLogger
): string[] {
  const source = typeof html === 'string' ? html : Buffer.from(html).toString('utf-8');
  const $ = load(source);
  const links: string[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href || !href.endsWith('.pdf')) {
      return;
    }

    try {
      links.push(new URL(href, baseUrl).toString());
    } catch {
      logger.warn({ href, baseUrl }, 'Skipping unresolvable PDF link');
    }
  });

  logger.info({ count: links.length }, 'PDF links found');
  return links;
}
