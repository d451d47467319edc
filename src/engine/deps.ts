import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { retryPolicyFromConfig } from '../shared/retry.js';
import { SqliteItemStore, SqliteSourceRegistry } from '../source/sourceDb.js';
import { createFetchers } from '../source/fetchers.js';
import { SqliteFileAssetStore } from '../render/assetStore.js';
import { loadStopwords } from '../render/words.js';
import { SourceLocks, type CycleDeps } from './cycle.js';

/**
 * Wire the SQLite-backed stores, fetchers and retry policy for one process.
 */
export function createCycleDeps(
  db: Database.Database,
  config: Config,
  overrides: { sleepMs?: number; outdir?: string } = {},
): CycleDeps {
  return {
    registry: new SqliteSourceRegistry(db),
    store: new SqliteItemStore(db),
    assets: new SqliteFileAssetStore(db, resolvePath(overrides.outdir ?? config.render.outdir)),
    fetchers: createFetchers(config),
    policy: retryPolicyFromConfig(config.crawl, { sleepMs: overrides.sleepMs }),
    stopwords: loadStopwords(config.render.extra_stopwords),
    locks: new SourceLocks(),
  };
}
