/**
 * Ingestion Pipeline
 *
 * One pass over the bulletin page:
 * 1. Fetch the listing page and extract PDF links
 * 2. Skip links already marked as processed
 * 3. Download, extract text and match keywords
 * 4. Archive the raw PDF and write the dedup marker
 *
 * Links are handled one at a time. A failure on one link is logged and the
 * pass moves on; only a failure to fetch the listing page aborts it.
 */

import { readFile } from 'node:fs/promises';
import { extractPdfLinks } from './scraper/link-extractor.js';
import { matchKeywords } from './filter/matcher.js';
import { archiveDocument } from './storage/archive.js';
import type { DedupStore } from './storage/dedup-store.js';
import type { ObjectStore } from './storage/object-store.js';
import type { DocumentFetcher } from './scraper/http-fetcher.js';
import { withTempFile } from './utils/temp-file.js';
import { errorMessage } from './utils/errors.js';
import type { Logger } from './utils/logger.js';
import type { IngestionReport, MatchResult } from './types/index.js';

/**
 * Settings the pipeline reads. A MonitorConfig satisfies this.
 */
export interface IngestionSettings {
  readonly sourceUrl: string;
  readonly keywords: readonly string[];
  readonly maxLinksPerRun: number;
  readonly fallbackDocumentName: string;
  readonly http: { readonly maxRetries: number };
}

export interface IngestionDependencies {
  settings: IngestionSettings;
  fetcher: DocumentFetcher;
  dedup: DedupStore;
  archive: ObjectStore;
  extractText: (bytes: Uint8Array) => Promise<string>;
  logger: Logger;
  clock?: () => Date;
  /** Where per-link scratch directories are created (default: OS temp dir) */
  tempRoot?: string;
}

type LinkOutcome =
  | { kind: 'already-processed' }
  | { kind: 'empty-text' }
  | { kind: 'archived' };

/**
 * File name for the archive, from the last URL path segment
 */
export function documentName(url: string, fallback: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return fallback;
  }

  return decodeSegment(pathname.slice(pathname.lastIndexOf('/') + 1)) || fallback;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // malformed escape
    return segment;
  }
}

async function processLink(
  url: string,
  deps: IngestionDependencies,
  report: IngestionReport
): Promise<LinkOutcome> {
  const { settings, fetcher, dedup, archive, logger } = deps;
  const clock = deps.clock ?? (() => new Date());

  if (await dedup.isProcessed(url)) {
    logger.info({ url }, 'Bulletin already processed');
    return { kind: 'already-processed' };
  }

  report.attempted++;
  const bytes = await fetcher.fetch(url, settings.http.maxRetries);
  const name = documentName(url, settings.fallbackDocumentName);

  return withTempFile<LinkOutcome>(
    bytes,
    async (path) => {
      const stored = await readFile(path);
      const text = await deps.extractText(stored);

      if (!text) {
        logger.warn({ url, document: name }, 'Could not extract text from bulletin');
        return { kind: 'empty-text' };
      }

      const now = clock();
      const keywords = matchKeywords(text, settings.keywords);

      // Reported even if archiving below fails
      if (keywords.length > 0) {
        const match: MatchResult = { document: name, url, keywords, processedAt: now.toISOString() };
        report.matches.push(match);
        logger.info({ document: name, keywords }, 'Keywords found');
      }

      const key = await archiveDocument(archive, now, name, stored);
      logger.debug({ key }, 'Bulletin archived');

      const marked = await dedup.markProcessed(url);
      if (!marked.ok) {
        report.advisories.push({
          operation: 'mark-processed',
          key: marked.error.key,
          message: marked.error.message,
        });
      }

      return { kind: 'archived' };
    },
    { root: deps.tempRoot }
  );
}

/**
 * Run one ingestion pass. Rejects only when the listing page cannot be
 * fetched.
 */
export async function runIngestion(deps: IngestionDependencies): Promise<IngestionReport> {
  const { settings, fetcher, logger } = deps;

  const report: IngestionReport = {
    discovered: 0,
    attempted: 0,
    alreadyProcessed: 0,
    archived: 0,
    emptyText: 0,
    failed: 0,
    matches: [],
    advisories: [],
  };

  logger.info({ sourceUrl: settings.sourceUrl }, 'Fetching bulletin listing');
  const page = await fetcher.fetch(settings.sourceUrl, settings.http.maxRetries);
  const links = extractPdfLinks(page, settings.sourceUrl, logger);
  report.discovered = links.length;

  const batch = links.slice(0, settings.maxLinksPerRun);
  if (batch.length < links.length) {
    logger.info(
      { discovered: links.length, processing: batch.length },
      'Link cap reached, remaining bulletins deferred to a later run'
    );
  }

  for (const url of batch) {
    try {
      const outcome = await processLink(url, deps, report);

      switch (outcome.kind) {
        case 'already-processed':
          report.alreadyProcessed++;
          break;
        case 'empty-text':
          report.emptyText++;
          break;
        case 'archived':
          report.archived++;
          break;
      }
    } catch (error) {
      report.failed++;
      logger.error({ url, error: errorMessage(error) }, 'Failed to process bulletin');
    }
  }

  logger.info(
    {
      discovered: report.discovered,
      attempted: report.attempted,
      alreadyProcessed: report.alreadyProcessed,
      archived: report.archived,
      emptyText: report.emptyText,
      failed: report.failed,
      matches: report.matches.length,
    },
    'Ingestion complete'
  );

  return report;
}
