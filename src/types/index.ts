/**
 * Core types for the SAT bulletin monitor
 */

import type { StoreError } from '../utils/errors.js';

/**
 * A bulletin whose text contained at least one configured keyword
 */
export interface MatchResult {
  /** File name derived from the URL path */
  document: string;
  url: string;
  /** Matched keywords in configuration order */
  keywords: string[];
  /** ISO timestamp */
  processedAt: string;
}

/**
 * Result of a best-effort operation. A failure here never fails the run.
 */
export type AdvisoryResult = { ok: true } | { ok: false; error: StoreError };

export interface Advisory {
  operation: 'mark-processed' | 'write-run-log';
  key: string;
  message: string;
}

/**
 * Counters and matches produced by one pass over the source page
 */
export interface IngestionReport {
  discovered: number;
  attempted: number;
  alreadyProcessed: number;
  archived: number;
  emptyText: number;
  failed: number;
  matches: MatchResult[];
  advisories: Advisory[];
}

export type RunStatus = 'success' | 'error';

export interface RunOutcome {
  status: RunStatus;
  linksDiscovered: number;
  matches: MatchResult[];
  /** Seconds */
  executionTime: number;
  errorMessage?: string;
  advisories: Advisory[];
}

export type TriggerResponse =
  | {
      statusCode: 200;
      body: {
        status: 'success';
        updates_found: number;
        pdfs_analyzed: number;
        execution_time: number;
      };
    }
  | {
      statusCode: 500;
      body: {
        status: 'error';
        message: string;
      };
    };

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
