/**
 * Error taxonomy for monitor runs
 *
 * Anything extending MonitorError is a known failure whose message may be
 * reported to the caller. Other errors are reported generically.
 */

export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Required configuration is missing or invalid
 */
export class ConfigurationError extends MonitorError {
  constructor(
    message: string,
    readonly variables: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * A download failed after all retry attempts
 */
export class FetchError extends MonitorError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super(`Failed to download ${url} after ${attempts} attempts: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * Text could not be extracted from a page or a whole document
 */
export class ExtractionError extends MonitorError {
  constructor(
    message: string,
    readonly page?: number,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

/**
 * Backing object store failure other than "not found"
 */
export class StoreError extends MonitorError {
  constructor(
    message: string,
    readonly key: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export class NotificationError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
