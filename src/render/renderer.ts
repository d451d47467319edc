import type { Item, ItemStore, Scope, Signal } from '../source/adapter.js';
import { scopeKey } from '../source/adapter.js';
import { RenderError, StoreWriteError, errorMessage } from '../shared/errors.js';
import { sha1 } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { ASSET_KINDS, type AssetKind, type AssetStore } from './assetStore.js';
import { monthlyCounts, rollingAverage, spanSummary, type MonthlyCount, type RollingPoint } from './series.js';
import { stalenessReason, type StalenessReason } from './staleness.js';
import { wordFrequencies, type WordCount } from './words.js';

export interface MonthlyCountsArtifact {
  months: MonthlyCount[];
  total: number;
  first: string | null;
  last: string | null;
}

export interface RollingAverageArtifact {
  windowDays: number;
  points: RollingPoint[];
}

export interface WordFrequenciesArtifact {
  words: WordCount[];
}

export interface ArtifactDataMap {
  monthly_counts: MonthlyCountsArtifact;
  rolling_average: RollingAverageArtifact;
  word_frequencies: WordFrequenciesArtifact;
}

export interface BuildOptions {
  rollingDays: number;
  stopwords: ReadonlySet<string>;
}

export function buildArtifact<K extends AssetKind>(kind: K, items: readonly Item[], opts: BuildOptions): ArtifactDataMap[K];
export function buildArtifact(
  kind: AssetKind,
  items: readonly Item[],
  opts: BuildOptions,
): ArtifactDataMap[AssetKind] {
  switch (kind) {
    case 'monthly_counts': {
      const span = spanSummary(items);
      return { months: monthlyCounts(items), total: span.total, first: span.first, last: span.last };
    }
    case 'rolling_average':
      return { windowDays: opts.rollingDays, points: rollingAverage(items, opts.rollingDays) };
    case 'word_frequencies':
      return { words: wordFrequencies(items.map((i) => i.title), opts.stopwords) };
  }
}

/**
 * The inputs besides the items that shape an artifact, as a string recorded with it.
 */
export function renderParams(kind: AssetKind, opts: BuildOptions): string {
  switch (kind) {
    case 'monthly_counts':
      return '';
    case 'rolling_average':
      return `window=${opts.rollingDays}`;
    case 'word_frequencies':
      return `stopwords=${sha1([...opts.stopwords].sort().join('\n'))}`;
  }
}

/**
 * All three artifacts for one item set.
 */
export function renderArtifacts(items: readonly Item[], opts: BuildOptions): ArtifactDataMap {
  return {
    monthly_counts: buildArtifact('monthly_counts', items, opts),
    rolling_average: buildArtifact('rolling_average', items, opts),
    word_frequencies: buildArtifact('word_frequencies', items, opts),
  };
}

export interface RenderDeps {
  store: ItemStore;
  assets: AssetStore;
  stopwords: ReadonlySet<string>;
}

export interface RenderOptions {
  rollingDays?: number;
  catchUpMissing?: boolean;
  /** Regenerate even when the recorded signal is current. */
  force?: boolean;
  onlyKinds?: readonly AssetKind[];
  now?: () => Date;
}

export interface RenderResult {
  scope: string;
  signal: Signal;
  rendered: Array<{ kind: AssetKind; reason: StalenessReason | 'forced' }>;
  fresh: AssetKind[];
}

/**
 * Regenerate the stale artifacts of one scope. Items are read once, and only when
 * something needs rendering. Any failure is raised as a {@link RenderError}.
 */
export function renderScope(deps: RenderDeps, scope: Scope, opts: RenderOptions = {}): RenderResult {
  const key = scopeKey(scope);
  const kinds = opts.onlyKinds ?? ASSET_KINDS;
  const build: BuildOptions = { rollingDays: opts.rollingDays ?? 90, stopwords: deps.stopwords };
  const now = opts.now ?? (() => new Date());

  try {
    const signal = deps.store.maxSignal(scope);
    const result: RenderResult = { scope: key, signal, rendered: [], fresh: [] };

    const pending: Array<{ kind: AssetKind; reason: StalenessReason | 'forced'; params: string }> = [];
    for (const kind of kinds) {
      const params = renderParams(kind, build);
      const reason = opts.force
        ? 'forced'
        : stalenessReason(deps.assets, key, kind, signal, { catchUpMissing: opts.catchUpMissing, params });
      if (reason === null) {
        result.fresh.push(kind);
      } else {
        pending.push({ kind, reason, params });
      }
    }
    if (pending.length === 0) {
      logger.debug({ scope: key }, 'Artifacts are current');
      return result;
    }

    const items = deps.store.itemsFor(scope);
    const generatedAt = now().toISOString();
    for (const { kind, reason, params } of pending) {
      const data = buildArtifact(kind, items, build);
      deps.assets.writeArtifact(key, kind, data, generatedAt, signal, params);
      result.rendered.push({ kind, reason });
      logger.debug({ scope: key, kind, reason, itemCount: signal.itemCount }, 'Rendered artifact');
    }

    logger.info({ scope: key, rendered: result.rendered.length, fresh: result.fresh.length }, 'Render complete');
    return result;
  } catch (err) {
    if (err instanceof RenderError) throw err;
    throw new RenderError(`Render failed for ${key}: ${errorMessage(err)}`, {
      scope: key,
      cause: err instanceof StoreWriteError ? err.code : undefined,
    });
  }
}

export function renderSourceAssets(deps: RenderDeps, sourceId: number, opts: RenderOptions = {}): RenderResult {
  return renderScope(deps, { type: 'source', sourceId }, opts);
}

/**
 * Recompute the global artifacts from the union of raw items of enabled sources.
 */
export function renderGlobalAssets(deps: RenderDeps, opts: RenderOptions = {}): RenderResult {
  return renderScope(deps, { type: 'global' }, opts);
}
