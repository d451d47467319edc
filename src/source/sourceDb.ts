import type Database from 'better-sqlite3';
import type {
  CheckOutcome,
  Item,
  ItemStore,
  NewItem,
  Scope,
  Signal,
  Source,
  SourceFilter,
  SourceKind,
  SourceRegistry,
} from './adapter.js';
import { generateId, hostFromUrl, nowISO, toIsoTimestamp } from '../shared/utils.js';
import { DbError, StoreWriteError } from '../shared/errors.js';

// ================================================================
// Sources
// ================================================================

export function addSource(
  db: Database.Database,
  opts: { url: string; kind: SourceKind; name?: string; channel_id?: string; enabled?: boolean },
): number | null {
  const name = opts.name ?? (hostFromUrl(opts.url) || opts.url);
  try {
    const result = db
      .prepare(
        `INSERT INTO sources (kind, name, url, channel_id, is_enabled, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(opts.kind, name, opts.url, opts.channel_id ?? null, opts.enabled === false ? 0 : 1, nowISO());
    return Number(result.lastInsertRowid);
  } catch (err) {
    // UNIQUE constraint on url → already registered
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      return null;
    }
    throw new DbError(`Failed to add source: ${err instanceof Error ? err.message : String(err)}`, {
      url: opts.url,
    });
  }
}

export function listSources(
  db: Database.Database,
  opts: SourceFilter & { enabledOnly?: boolean } = {},
): Source[] {
  const where: string[] = [];
  const params: unknown[] = [];

  if (opts.enabledOnly) where.push('is_enabled = 1');
  if (opts.kind) {
    where.push('kind = ?');
    params.push(opts.kind);
  }
  if (opts.ids && opts.ids.length > 0) {
    where.push(`id IN (${opts.ids.map(() => '?').join(', ')})`);
    params.push(...opts.ids);
  }
  if (opts.uncheckedToday) {
    where.push("(last_checked_at IS NULL OR date(last_checked_at) < date('now'))");
  }

  const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  const rows = db.prepare(`SELECT * FROM sources ${clause} ORDER BY id`).all(...params) as Source[];

  if (!opts.host) return rows;
  const host = opts.host.toLowerCase().replace(/^www\./, '');
  return rows.filter((s) => hostFromUrl(s.url) === host);
}

export function getSource(db: Database.Database, id: number): Source | undefined {
  return db.prepare('SELECT * FROM sources WHERE id = ?').get(id) as Source | undefined;
}

export function setSourceEnabled(db: Database.Database, id: number, enabled: boolean): boolean {
  const result = db.prepare('UPDATE sources SET is_enabled = ? WHERE id = ?').run(enabled ? 1 : 0, id);
  return result.changes > 0;
}

export function setSourceChannelId(db: Database.Database, id: number, channelId: string): void {
  db.prepare('UPDATE sources SET channel_id = ? WHERE id = ?').run(channelId, id);
}

export function markSourceChecked(db: Database.Database, id: number, outcome: CheckOutcome): void {
  const now = nowISO();
  if (outcome.success) {
    db.prepare(
      `UPDATE sources
       SET last_checked_at = ?, last_success_at = ?, status = 'ok', last_error = NULL
       WHERE id = ?`,
    ).run(now, now, id);
  } else {
    db.prepare(
      `UPDATE sources
       SET last_checked_at = ?, status = 'failed', last_error = ?
       WHERE id = ?`,
    ).run(now, outcome.error ?? null, id);
  }
}

// ================================================================
// Items
// ================================================================

export function itemExists(db: Database.Database, sourceId: number, externalId: string): boolean {
  const row = db
    .prepare('SELECT 1 FROM items WHERE source_id = ? AND external_id = ?')
    .get(sourceId, externalId);
  return row !== undefined;
}

/**
 * Insert unless `(source_id, external_id)` is already stored. Existing rows are left untouched.
 */
export function insertItem(db: Database.Database, item: NewItem): boolean {
  try {
    const result = db
      .prepare(
        `INSERT OR IGNORE INTO items (id, source_id, external_id, title, url, published_at, fetched_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        generateId(),
        item.source_id,
        item.external_id,
        item.title,
        item.url ?? null,
        toIsoTimestamp(item.published_at),
        nowISO(),
      );
    return result.changes > 0;
  } catch (err) {
    throw new StoreWriteError(`Failed to insert item: ${err instanceof Error ? err.message : String(err)}`, {
      sourceId: item.source_id,
      externalId: item.external_id,
    });
  }
}

const GLOBAL_JOIN = 'JOIN sources s ON s.id = i.source_id AND s.is_enabled = 1';

export function getScopeSignal(db: Database.Database, scope: Scope): Signal {
  if (scope.type === 'global') {
    const { max_ts, n } = db
      .prepare(`SELECT MAX(i.published_at) AS max_ts, COUNT(*) AS n FROM items i ${GLOBAL_JOIN}`)
      .get() as { max_ts: string | null; n: number };
    const ids = db
      .prepare(`SELECT DISTINCT i.source_id AS id FROM items i ${GLOBAL_JOIN} ORDER BY i.source_id ASC`)
      .all() as Array<{ id: number }>;
    return { maxPublishedAt: max_ts, itemCount: n, sourceSet: ids.map((r) => r.id).join(',') };
  }
  const { max_ts, n } = db
    .prepare('SELECT MAX(published_at) AS max_ts, COUNT(*) AS n FROM items WHERE source_id = ?')
    .get(scope.sourceId) as { max_ts: string | null; n: number };
  return { maxPublishedAt: max_ts, itemCount: n };
}

export function getItemsForScope(db: Database.Database, scope: Scope): Item[] {
  if (scope.type === 'global') {
    return db
      .prepare(`SELECT i.* FROM items i ${GLOBAL_JOIN} ORDER BY i.published_at ASC, i.source_id ASC, i.external_id ASC`)
      .all() as Item[];
  }
  return db
    .prepare('SELECT * FROM items WHERE source_id = ? ORDER BY published_at ASC, external_id ASC')
    .all(scope.sourceId) as Item[];
}

export function getLatestItems(db: Database.Database, sourceId: number, limit = 10): Item[] {
  return db
    .prepare('SELECT * FROM items WHERE source_id = ? ORDER BY published_at DESC LIMIT ?')
    .all(sourceId, limit) as Item[];
}

export function getSourceItemCounts(db: Database.Database): Map<number, number> {
  const rows = db
    .prepare('SELECT source_id, COUNT(*) AS count FROM items GROUP BY source_id')
    .all() as Array<{ source_id: number; count: number }>;
  return new Map(rows.map((r) => [r.source_id, r.count]));
}

export interface SourceHealth {
  source: Source;
  itemCount: number;
  undatedCount: number;
  firstPublishedAt: string | null;
  lastPublishedAt: string | null;
  latest: Item[];
}

export function getSourceHealth(db: Database.Database, id: number): SourceHealth | undefined {
  const source = getSource(db, id);
  if (!source) return undefined;
  const row = db
    .prepare(
      `SELECT COUNT(*) AS n,
              SUM(CASE WHEN published_at IS NULL THEN 1 ELSE 0 END) AS undated,
              MIN(published_at) AS first_ts,
              MAX(published_at) AS last_ts
       FROM items WHERE source_id = ?`,
    )
    .get(id) as { n: number; undated: number | null; first_ts: string | null; last_ts: string | null };
  return {
    source,
    itemCount: row.n,
    undatedCount: row.undated ?? 0,
    firstPublishedAt: row.first_ts,
    lastPublishedAt: row.last_ts,
    latest: getLatestItems(db, id),
  };
}

// ================================================================
// Interface adapters
// ================================================================

export class SqliteSourceRegistry implements SourceRegistry {
  constructor(private readonly db: Database.Database) {}

  listEnabledSources(filter: SourceFilter = {}): Source[] {
    return listSources(this.db, { ...filter, enabledOnly: true });
  }

  getSource(id: number): Source | undefined {
    return getSource(this.db, id);
  }

  markChecked(id: number, outcome: CheckOutcome): void {
    markSourceChecked(this.db, id, outcome);
  }

  setChannelId(id: number, channelId: string): void {
    setSourceChannelId(this.db, id, channelId);
  }
}

export class SqliteItemStore implements ItemStore {
  constructor(private readonly db: Database.Database) {}

  exists(sourceId: number, externalId: string): boolean {
    return itemExists(this.db, sourceId, externalId);
  }

  insert(item: NewItem): boolean {
    return insertItem(this.db, item);
  }

  maxSignal(scope: Scope): Signal {
    return getScopeSignal(this.db, scope);
  }

  itemsFor(scope: Scope): Item[] {
    return getItemsForScope(this.db, scope);
  }

  latestPublishedAt(sourceId: number): string | null {
    return getScopeSignal(this.db, { type: 'source', sourceId }).maxPublishedAt;
  }
}
