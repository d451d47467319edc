import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import {
  addSource,
  getItemsForScope,
  getScopeSignal,
  getSource,
  getSourceHealth,
  getSourceItemCounts,
  insertItem,
  itemExists,
  listSources,
  markSourceChecked,
  setSourceEnabled,
  SqliteItemStore,
} from '../sourceDb.js';
import { openTestDb, seedSource } from '../../testing/db.js';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

describe('addSource', () => {
  it('adds a source, naming it after the host by default', () => {
    const id = addSource(db, { url: 'https://www.Blog.example.org/', kind: 'Blog' });
    expect(id).toBe(1);

    const source = getSource(db, 1);
    expect(source?.name).toBe('blog.example.org');
    expect(source?.kind).toBe('Blog');
    expect(source?.is_enabled).toBe(1);
    expect(source?.status).toBeNull();
  });

  it('returns null for a duplicate url', () => {
    addSource(db, { url: 'https://blog.example.org/', kind: 'Blog' });
    expect(addSource(db, { url: 'https://blog.example.org/', kind: 'Blog' })).toBeNull();
  });
});

describe('listSources', () => {
  beforeEach(() => {
    seedSource(db, { url: 'https://blog.example.org/' });
    seedSource(db, { url: 'https://www.youtube.com/channel/UCaaaaaaaaaaaa', kind: 'Video' });
    seedSource(db, { url: 'https://other.example.net/', enabled: false });
  });

  it('filters by kind, ids and enabled state', () => {
    expect(listSources(db).map((s) => s.id)).toEqual([1, 2, 3]);
    expect(listSources(db, { kind: 'Video' }).map((s) => s.id)).toEqual([2]);
    expect(listSources(db, { ids: [1, 3] }).map((s) => s.id)).toEqual([1, 3]);
    expect(listSources(db, { enabledOnly: true }).map((s) => s.id)).toEqual([1, 2]);
  });

  it('filters by host ignoring www', () => {
    expect(listSources(db, { host: 'www.blog.example.org' }).map((s) => s.id)).toEqual([1]);
  });

  it('skips sources checked today when asked', () => {
    markSourceChecked(db, 1, { success: true });
    expect(listSources(db, { uncheckedToday: true }).map((s) => s.id)).toEqual([2, 3]);
  });
});

describe('markSourceChecked', () => {
  it('records success and failure', () => {
    seedSource(db, { url: 'https://blog.example.org/' });

    markSourceChecked(db, 1, { success: false, error: 'HTTP 500' });
    let source = getSource(db, 1);
    expect(source?.status).toBe('failed');
    expect(source?.last_error).toBe('HTTP 500');
    expect(source?.last_checked_at).not.toBeNull();
    expect(source?.last_success_at).toBeNull();

    markSourceChecked(db, 1, { success: true });
    source = getSource(db, 1);
    expect(source?.status).toBe('ok');
    expect(source?.last_error).toBeNull();
    expect(source?.last_success_at).not.toBeNull();
  });
});

describe('items', () => {
  beforeEach(() => {
    seedSource(db, { url: 'https://blog.example.org/' });
    seedSource(db, { url: 'https://other.example.net/' });
  });

  it('inserts once per (source, external id)', () => {
    const item = { source_id: 1, external_id: 'https://blog.example.org/a', title: 'A', published_at: '2024-01-05' };
    expect(insertItem(db, item)).toBe(true);
    expect(insertItem(db, { ...item, title: 'A, edited' })).toBe(false);
    expect(insertItem(db, { ...item, source_id: 2 })).toBe(true);

    const rows = getItemsForScope(db, { type: 'source', sourceId: 1 });
    expect(rows).toHaveLength(1);
    expect(rows[0].title).toBe('A');
    expect(rows[0].published_at).toBe('2024-01-05T00:00:00.000Z');
    expect(itemExists(db, 1, 'https://blog.example.org/a')).toBe(true);
    expect(itemExists(db, 1, 'https://blog.example.org/b')).toBe(false);
  });

  it('computes per-source and global signals, excluding disabled sources', () => {
    insertItem(db, { source_id: 1, external_id: 'a', title: 'A', published_at: '2024-01-05T10:00:00Z' });
    insertItem(db, { source_id: 1, external_id: 'b', title: 'B', published_at: null });
    insertItem(db, { source_id: 2, external_id: 'c', title: 'C', published_at: '2024-02-01T00:00:00Z' });

    expect(getScopeSignal(db, { type: 'source', sourceId: 1 })).toEqual({
      maxPublishedAt: '2024-01-05T10:00:00.000Z',
      itemCount: 2,
    });
    expect(getScopeSignal(db, { type: 'global' })).toEqual({
      maxPublishedAt: '2024-02-01T00:00:00.000Z',
      itemCount: 3,
      sourceSet: '1,2',
    });

    setSourceEnabled(db, 2, false);
    expect(getScopeSignal(db, { type: 'global' })).toEqual({
      maxPublishedAt: '2024-01-05T10:00:00.000Z',
      itemCount: 2,
      sourceSet: '1',
    });
    expect(getItemsForScope(db, { type: 'global' }).map((i) => i.external_id)).toEqual(['b', 'a']);
  });

  it('reports an empty scope with a null max', () => {
    expect(getScopeSignal(db, { type: 'source', sourceId: 1 })).toEqual({ maxPublishedAt: null, itemCount: 0 });
  });

  it('counts items per source', () => {
    insertItem(db, { source_id: 1, external_id: 'a', title: 'A' });
    insertItem(db, { source_id: 1, external_id: 'b', title: 'B' });
    expect(getSourceItemCounts(db)).toEqual(new Map([[1, 2]]));
  });

  it('summarises source health', () => {
    insertItem(db, { source_id: 1, external_id: 'a', title: 'A', published_at: '2024-01-05' });
    insertItem(db, { source_id: 1, external_id: 'b', title: 'B', published_at: '2024-03-01' });
    insertItem(db, { source_id: 1, external_id: 'c', title: 'C' });

    const health = getSourceHealth(db, 1);
    expect(health?.itemCount).toBe(3);
    expect(health?.undatedCount).toBe(1);
    expect(health?.firstPublishedAt).toBe('2024-01-05T00:00:00.000Z');
    expect(health?.lastPublishedAt).toBe('2024-03-01T00:00:00.000Z');
    expect(health?.latest.map((i) => i.external_id)).toEqual(['b', 'a', 'c']);
    expect(getSourceHealth(db, 99)).toBeUndefined();
  });

  it('exposes the same operations through SqliteItemStore', () => {
    const store = new SqliteItemStore(db);
    expect(store.insert({ source_id: 1, external_id: 'a', title: 'A', published_at: '2024-01-05' })).toBe(true);
    expect(store.exists(1, 'a')).toBe(true);
    expect(store.latestPublishedAt(1)).toBe('2024-01-05T00:00:00.000Z');
    expect(store.itemsFor({ type: 'source', sourceId: 1 })).toHaveLength(1);
  });
});
