import type { Config } from '../shared/config.js';
import type { Fetcher, SourceKind } from './adapter.js';
import type { HttpOptions } from './http.js';
import { BlogFetcher } from './blog.js';
import { VideoFetcher } from './video.js';

/**
 * One strategy per source kind. Adding a kind means adding a key here.
 */
export type FetcherSet = { readonly [K in SourceKind]: Fetcher };

export function createFetchers(config: Config): FetcherSet {
  const http: HttpOptions = {
    timeoutMs: config.crawl.timeout_ms,
    userAgent: config.crawl.user_agent,
  };
  return {
    Blog: new BlogFetcher(http),
    Video: new VideoFetcher({ apiBase: config.youtube.api_base, apiKey: config.youtube.api_key }, http),
  };
}

export function selectFetcher(fetchers: FetcherSet, kind: SourceKind): Fetcher {
  return fetchers[kind];
}
