export class FeedpulseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedpulseError';
  }
}

export class ConfigError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Non-retryable problem with a source: bad locator, 4xx response, missing channel id.
 */
export class SourceError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

/**
 * Network failure, timeout, 429 or 5xx. Retried under the active RetryPolicy.
 */
export class TransientFetchError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_FETCH_ERROR', details);
    this.name = 'TransientFetchError';
  }
}

/**
 * Retry budget exhausted for a page. Halts the crawl of one source only.
 */
export class SourceCycleFailed extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_CYCLE_FAILED', details);
    this.name = 'SourceCycleFailed';
  }
}

/**
 * A single page or record could not be parsed. The item is skipped.
 */
export class ParseError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class StoreWriteError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_WRITE_ERROR', details);
    this.name = 'StoreWriteError';
  }
}

export class RenderError extends FeedpulseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RENDER_ERROR', details);
    this.name = 'RenderError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
