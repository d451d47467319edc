import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { isStale, stalenessReason } from '../staleness.js';
import { SqliteItemStore } from '../../source/sourceDb.js';
import { MemoryAssetStore } from '../../testing/assets.js';
import { openTestDb, seedSource } from '../../testing/db.js';

const RECORDED = { maxPublishedAt: '2024-03-01T00:00:00.000Z', itemCount: 10 };

describe('stalenessReason', () => {
  let assets: MemoryAssetStore;

  beforeEach(() => {
    assets = new MemoryAssetStore();
    assets.writeArtifact('source:1', 'monthly_counts', {}, '2024-03-02T00:00:00.000Z', RECORDED);
  });

  it('is current when the signal matches', () => {
    expect(stalenessReason(assets, 'source:1', 'monthly_counts', RECORDED)).toBeNull();
  });

  it('is stale when nothing was recorded', () => {
    expect(stalenessReason(assets, 'source:1', 'word_frequencies', RECORDED)).toBe('missing-record');
  });

  it('is stale for a later max timestamp', () => {
    expect(
      stalenessReason(assets, 'source:1', 'monthly_counts', { ...RECORDED, maxPublishedAt: '2024-03-05T00:00:00.000Z' }),
    ).toBe('newer-items');
  });

  it('is stale when the count changes', () => {
    expect(stalenessReason(assets, 'source:1', 'monthly_counts', { ...RECORDED, itemCount: 11 })).toBe('count-changed');
    expect(stalenessReason(assets, 'source:1', 'monthly_counts', { ...RECORDED, itemCount: 7 })).toBe('count-changed');
  });

  it('is stale when a different set of sources makes up the global union', () => {
    assets.writeArtifact('global', 'word_frequencies', {}, 'x', { ...RECORDED, sourceSet: '1,2' });
    expect(stalenessReason(assets, 'global', 'word_frequencies', { ...RECORDED, sourceSet: '1,2' })).toBeNull();
    expect(stalenessReason(assets, 'global', 'word_frequencies', { ...RECORDED, sourceSet: '1,3' })).toBe(
      'sources-changed',
    );
  });

  it('is stale when the render parameters differ from the recorded ones', () => {
    assets.writeArtifact('source:1', 'rolling_average', {}, 'x', RECORDED, 'window=90');
    expect(stalenessReason(assets, 'source:1', 'rolling_average', RECORDED, { params: 'window=90' })).toBeNull();
    expect(stalenessReason(assets, 'source:1', 'rolling_average', RECORDED, { params: 'window=30' })).toBe(
      'params-changed',
    );
  });

  it('treats a missing recorded timestamp as older than any', () => {
    assets.writeArtifact('global', 'monthly_counts', {}, 'x', { maxPublishedAt: null, itemCount: 10 });
    expect(stalenessReason(assets, 'global', 'monthly_counts', RECORDED)).toBe('newer-items');
  });

  it('checks for the file only when catching up', () => {
    assets.files.clear();
    expect(stalenessReason(assets, 'source:1', 'monthly_counts', RECORDED)).toBeNull();
    expect(stalenessReason(assets, 'source:1', 'monthly_counts', RECORDED, { catchUpMissing: true })).toBe('missing-file');
  });
});

describe('isStale against the item store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openTestDb();
    seedSource(db, { url: 'https://blog.example.org/' });
  });

  afterEach(() => {
    db.close();
  });

  it('is false right after recording the current signal and true after any new item', () => {
    const store = new SqliteItemStore(db);
    const assets = new MemoryAssetStore();
    const scope = { type: 'source', sourceId: 1 } as const;

    store.insert({ source_id: 1, external_id: 'a', title: 'A', published_at: '2024-01-01' });
    assets.writeArtifact('source:1', 'rolling_average', {}, 'now', store.maxSignal(scope));
    expect(isStale(assets, 'source:1', 'rolling_average', store.maxSignal(scope))).toBe(false);

    // An older, undated item still changes the count.
    store.insert({ source_id: 1, external_id: 'b', title: 'B' });
    expect(isStale(assets, 'source:1', 'rolling_average', store.maxSignal(scope))).toBe(true);
  });
});
