import type { RetryPolicy } from '../shared/retry.js';
import type { ParseError } from '../shared/errors.js';

export const SOURCE_KINDS = ['Blog', 'Video'] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export function isSourceKind(value: string): value is SourceKind {
  return (SOURCE_KINDS as readonly string[]).includes(value);
}

/**
 * Database row shape for the sources table.
 */
export interface Source {
  id: number;
  kind: SourceKind;
  name: string;
  url: string;
  channel_id: string | null;
  is_enabled: number;
  last_checked_at: string | null;
  last_success_at: string | null;
  status: 'ok' | 'failed' | null;
  last_error: string | null;
  created_at: string;
}

/**
 * Database row shape for the items table.
 */
export interface Item {
  id: string;
  source_id: number;
  external_id: string;
  title: string;
  url: string | null;
  published_at: string | null;
  fetched_at: string;
}

/**
 * One item as produced by a fetcher, before it is checked against the store.
 */
export interface CandidateItem {
  externalId: string;
  title: string;
  url?: string;
  /** ISO-8601 UTC, when the upstream exposes one. */
  publishedAt?: string;
}

export type Scope = { type: 'source'; sourceId: number } | { type: 'global' };

export function scopeKey(scope: Scope): string {
  return scope.type === 'global' ? 'global' : `source:${scope.sourceId}`;
}

/**
 * Staleness summary of a scope's item set.
 */
export interface Signal {
  maxPublishedAt: string | null;
  itemCount: number;
  /** Global scope only: comma-joined ids of the sources whose items make up the union, ascending. */
  sourceSet?: string;
}

export interface SourceFilter {
  kind?: SourceKind;
  ids?: number[];
  host?: string;
  /** Skip sources already checked on the current UTC day. */
  uncheckedToday?: boolean;
}

export interface CheckOutcome {
  success: boolean;
  error?: string;
}

export interface SourceRegistry {
  listEnabledSources(filter?: SourceFilter): Source[];
  getSource(id: number): Source | undefined;
  markChecked(id: number, outcome: CheckOutcome): void;
  setChannelId(id: number, channelId: string): void;
}

export interface NewItem {
  source_id: number;
  external_id: string;
  title: string;
  url?: string | null;
  published_at?: string | null;
}

export interface ItemStore {
  exists(sourceId: number, externalId: string): boolean;
  /** Returns false when the key was already present. */
  insert(item: NewItem): boolean;
  maxSignal(scope: Scope): Signal;
  itemsFor(scope: Scope): Item[];
  latestPublishedAt(sourceId: number): string | null;
}

/**
 * Per-crawl inputs handed to a fetcher.
 */
export interface FetchContext {
  policy: RetryPolicy;
  /** Read-only view of the item store: is this external id already known for the source? */
  isKnown(externalId: string): boolean;
  /** Drop candidates published before this ISO timestamp. */
  since?: string;
  /** Stop after this many candidates (0 or undefined = unlimited). */
  maxItems?: number;
  /** Blog only: start the previous-link walk from this post URL. */
  startUrl?: string;
  /** Video only: skip the channel's playlists. */
  uploadsOnly?: boolean;
  /** Video only: cap on playlists scanned per channel (0 = unlimited). */
  playlistsLimit?: number;
  /** Video only: called with a channel id resolved from the source URL. */
  rememberChannelId?(channelId: string): void;
}

/**
 * Kind-specific crawl strategy. Yields candidates newest first and never writes to the store.
 * A record that cannot be parsed is yielded as a {@link FetchWarning} so the crawl carries on;
 * an error thrown from the iterator ends the crawl of that source.
 */
export interface Fetcher {
  readonly kind: SourceKind;
  fetchCandidates(source: Source, ctx: FetchContext): AsyncIterable<CandidateItem | FetchWarning>;
}

/**
 * Non-fatal per-record problem (a ParseError) reported in-band.
 */
export interface FetchWarning {
  warning: string;
  details?: Record<string, unknown>;
}

export function toFetchWarning(err: ParseError): FetchWarning {
  return { warning: err.message, details: err.details };
}

export function isFetchWarning(value: CandidateItem | FetchWarning): value is FetchWarning {
  return 'warning' in value;
}
