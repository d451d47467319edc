import {
  isFetchWarning,
  type CandidateItem,
  type FetchContext,
  type FetchWarning,
  type ItemStore,
  type Source,
  type SourceRegistry,
} from './adapter.js';
import { selectFetcher, type FetcherSet } from './fetchers.js';
import type { RetryPolicy } from '../shared/retry.js';
import { FeedpulseError, StoreWriteError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface IngestOptions {
  dryRun?: boolean;
  since?: string;
  maxItems?: number;
  startUrl?: string;
  uploadsOnly?: boolean;
  playlistsLimit?: number;
}

export interface IngestSummary {
  newCount: number;
  skippedCount: number;
  /** Skipped records that could not be parsed. Included in skippedCount. */
  warningCount: number;
  /** Set when the crawl stopped early on a fetch failure. Items stored before it are kept. */
  lastError?: string;
  lastErrorCode?: string;
}

/**
 * Merge a candidate stream for one source into the store. Each candidate is checked by
 * `(source_id, external_id)` and inserted only when absent; the insert itself ignores
 * conflicts, so a lost race between check and insert still yields one row.
 *
 * Fetch failures end the stream and are reported in the summary. Store failures throw.
 */
export async function ingestCandidates(
  store: ItemStore,
  source: Source,
  candidates: AsyncIterable<CandidateItem | FetchWarning>,
  opts: { dryRun?: boolean } = {},
): Promise<IngestSummary> {
  const summary: IngestSummary = { newCount: 0, skippedCount: 0, warningCount: 0 };
  const dryRunSeen = new Set<string>();

  try {
    for await (const candidate of candidates) {
      if (isFetchWarning(candidate)) {
        summary.skippedCount++;
        summary.warningCount++;
        logger.warn({ sourceId: source.id, ...candidate.details }, candidate.warning);
        continue;
      }

      if (store.exists(source.id, candidate.externalId) || dryRunSeen.has(candidate.externalId)) {
        summary.skippedCount++;
        continue;
      }

      if (opts.dryRun) {
        dryRunSeen.add(candidate.externalId);
        summary.newCount++;
        logger.info({ sourceId: source.id, externalId: candidate.externalId, title: candidate.title }, '[dry-run] would insert');
        continue;
      }

      const inserted = store.insert({
        source_id: source.id,
        external_id: candidate.externalId,
        title: candidate.title,
        url: candidate.url ?? null,
        published_at: candidate.publishedAt ?? null,
      });
      if (inserted) {
        summary.newCount++;
      } else {
        summary.skippedCount++;
      }
    }
  } catch (err) {
    if (err instanceof StoreWriteError) throw err;
    summary.lastError = errorMessage(err);
    summary.lastErrorCode = err instanceof FeedpulseError ? err.code : 'UNKNOWN';
    logger.warn({ sourceId: source.id, error: summary.lastError, newCount: summary.newCount }, 'Crawl stopped early');
  }

  return summary;
}

export interface IngestDeps {
  store: ItemStore;
  fetchers: FetcherSet;
  policy: RetryPolicy;
  /** Receives channel ids the video fetcher resolves; left out, they are resolved again next run. */
  registry?: Pick<SourceRegistry, 'setChannelId'>;
}

/**
 * Crawl one source with the strategy for its kind and ingest the result.
 */
export function ingestSource(deps: IngestDeps, source: Source, options: IngestOptions = {}): Promise<IngestSummary> {
  const fetcher = selectFetcher(deps.fetchers, source.kind);
  const ctx: FetchContext = {
    policy: deps.policy,
    isKnown: (externalId) => deps.store.exists(source.id, externalId),
    since: options.since,
    maxItems: options.maxItems,
    startUrl: options.startUrl,
    uploadsOnly: options.uploadsOnly,
    playlistsLimit: options.playlistsLimit,
  };
  const registry = deps.registry;
  if (registry && !options.dryRun) {
    ctx.rememberChannelId = (channelId) => registry.setChannelId(source.id, channelId);
  }
  logger.debug({ sourceId: source.id, kind: source.kind, url: source.url }, 'Fetching');
  return ingestCandidates(deps.store, source, fetcher.fetchCandidates(source, ctx), { dryRun: options.dryRun });
}
