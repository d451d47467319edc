import type { Signal } from '../source/adapter.js';
import type { AssetKind, AssetStore } from './assetStore.js';

export type StalenessReason =
  | 'missing-record'
  | 'newer-items'
  | 'count-changed'
  | 'sources-changed'
  | 'params-changed'
  | 'missing-file';

export interface StalenessOptions {
  catchUpMissing?: boolean;
  /** Parameters the artifact would be built with now; compared with the recorded ones. */
  params?: string;
}

/**
 * Why an artifact must be regenerated, or null when it is current.
 *
 * An artifact is stale when nothing is recorded for it, when the current max published
 * timestamp is later than the recorded one, or when the item count differs. Counts only
 * shrink for the global scope, when a source is disabled. A global artifact is also stale
 * when the set of sources behind it changed, and any artifact is stale when it was built
 * with other parameters. With `catchUpMissing`, a recorded artifact whose file is gone is
 * stale as well.
 */
export function stalenessReason(
  assets: AssetStore,
  scope: string,
  kind: AssetKind,
  current: Signal,
  opts: StalenessOptions = {},
): StalenessReason | null {
  const recorded = assets.getRecordedSignal(scope, kind);
  if (!recorded) return 'missing-record';
  if (isLater(current.maxPublishedAt, recorded.maxPublishedAt)) return 'newer-items';
  if (current.itemCount !== recorded.itemCount) return 'count-changed';
  if ((current.sourceSet ?? null) !== (recorded.sourceSet ?? null)) return 'sources-changed';
  if ((opts.params ?? '') !== (assets.getRecordedParams(scope, kind) ?? '')) return 'params-changed';
  if (opts.catchUpMissing && !assets.artifactExists(scope, kind)) return 'missing-file';
  return null;
}

export function isStale(
  assets: AssetStore,
  scope: string,
  kind: AssetKind,
  current: Signal,
  opts: StalenessOptions = {},
): boolean {
  return stalenessReason(assets, scope, kind, current, opts) !== null;
}

// Stored timestamps are normalized ISO-8601 UTC, so string order is time order.
// A missing recorded value is older than any timestamp.
function isLater(current: string | null, recorded: string | null): boolean {
  if (current === null) return false;
  if (recorded === null) return true;
  return current > recorded;
}
