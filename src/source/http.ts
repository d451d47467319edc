import { SourceError, TransientFetchError } from '../shared/errors.js';
import { withRetry, type RetryPolicy } from '../shared/retry.js';
import { logger } from '../shared/logger.js';

export interface HttpOptions {
  timeoutMs?: number;
  userAgent?: string;
  accept?: string;
}

export interface HttpResponse {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

/**
 * Single GET. 429/5xx, network failures and timeouts raise TransientFetchError;
 * any other non-2xx raises SourceError carrying the status and the start of the body.
 */
export async function httpGet(url: string, opts: HttpOptions = {}): Promise<HttpResponse> {
  const timeoutMs = opts.timeoutMs ?? 20000;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const headers: Record<string, string> = {
      'User-Agent': opts.userAgent ?? 'feedpulse/1.0',
      Accept: opts.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    };

    const response = await fetch(url, { headers, signal: controller.signal, redirect: 'follow' });
    const body = await response.text();

    if (RETRYABLE_STATUS.has(response.status)) {
      throw new TransientFetchError(`HTTP ${response.status} from ${url}`, { url, status: response.status });
    }
    if (!response.ok) {
      throw new SourceError(`HTTP ${response.status} from ${url}`, {
        url,
        status: response.status,
        body: body.slice(0, 500),
      });
    }

    return {
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      body,
    };
  } catch (err) {
    if (err instanceof SourceError || err instanceof TransientFetchError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      throw new TransientFetchError(`Request timed out after ${timeoutMs}ms: ${url}`, { url, timeout: timeoutMs });
    }
    throw new TransientFetchError(`Request failed: ${err instanceof Error ? err.message : String(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }
}

export function getWithRetry(url: string, policy: RetryPolicy, opts: HttpOptions = {}): Promise<HttpResponse> {
  return withRetry(policy, url, (attempt) => {
    logger.debug({ url, attempt }, 'GET');
    return httpGet(url, opts);
  });
}

export async function getJsonWithRetry(url: string, policy: RetryPolicy, opts: HttpOptions = {}): Promise<unknown> {
  const res = await getWithRetry(url, policy, { ...opts, accept: 'application/json' });
  try {
    return JSON.parse(res.body) as unknown;
  } catch {
    throw new SourceError(`Invalid JSON from ${url}`, { url, body: res.body.slice(0, 200) });
  }
}
