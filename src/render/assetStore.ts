import type Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { Signal } from '../source/adapter.js';
import { StoreWriteError } from '../shared/errors.js';

export const ASSET_KINDS = ['monthly_counts', 'rolling_average', 'word_frequencies'] as const;
export type AssetKind = (typeof ASSET_KINDS)[number];

export interface RecordedAsset {
  scope: string;
  kind: AssetKind;
  generatedAt: string;
  signal: Signal;
  /** Render parameters the artifact was built with; '' when the kind takes none. */
  params: string;
  path: string;
}

export interface AssetStore {
  getRecordedSignal(scope: string, kind: AssetKind): Signal | undefined;
  getRecordedParams(scope: string, kind: AssetKind): string | undefined;
  artifactExists(scope: string, kind: AssetKind): boolean;
  writeArtifact(
    scope: string,
    kind: AssetKind,
    data: unknown,
    generatedAt: string,
    signal: Signal,
    params?: string,
  ): RecordedAsset;
}

export interface ArtifactDocument<T = unknown> {
  scope: string;
  kind: AssetKind;
  generated_at: string;
  signal: Signal;
  params: string;
  data: T;
}

/**
 * Relative artifact path for a scope key: `global/<kind>.json` or `sources/<id>/<kind>.json`.
 */
export function artifactPath(scope: string, kind: AssetKind): string {
  if (scope === 'global') return path.join('global', `${kind}.json`);
  const id = scope.startsWith('source:') ? scope.slice('source:'.length) : scope;
  return path.join('sources', id.replace(/[^A-Za-z0-9_-]/g, '_'), `${kind}.json`);
}

interface AssetRow {
  generated_at: string;
  max_published_at: string | null;
  item_count: number;
  source_set: string | null;
  params: string;
  path: string;
}

/**
 * Signals in the `assets` table, artifact documents as JSON files under `outdir`.
 */
export class SqliteFileAssetStore implements AssetStore {
  constructor(
    private readonly db: Database.Database,
    readonly outdir: string,
  ) {}

  private row(scope: string, kind: AssetKind): AssetRow | undefined {
    return this.db
      .prepare(
        `SELECT generated_at, max_published_at, item_count, source_set, params, path
         FROM assets WHERE scope = ? AND kind = ?`,
      )
      .get(scope, kind) as AssetRow | undefined;
  }

  getRecordedSignal(scope: string, kind: AssetKind): Signal | undefined {
    const row = this.row(scope, kind);
    if (!row) return undefined;
    const signal: Signal = { maxPublishedAt: row.max_published_at, itemCount: row.item_count };
    if (row.source_set !== null) signal.sourceSet = row.source_set;
    return signal;
  }

  getRecordedParams(scope: string, kind: AssetKind): string | undefined {
    return this.row(scope, kind)?.params;
  }

  artifactExists(scope: string, kind: AssetKind): boolean {
    const rel = this.row(scope, kind)?.path ?? artifactPath(scope, kind);
    return fs.existsSync(path.join(this.outdir, rel));
  }

  writeArtifact(
    scope: string,
    kind: AssetKind,
    data: unknown,
    generatedAt: string,
    signal: Signal,
    params = '',
  ): RecordedAsset {
    const rel = artifactPath(scope, kind);
    const abs = path.join(this.outdir, rel);
    const doc: ArtifactDocument = { scope, kind, generated_at: generatedAt, signal, params, data };

    try {
      fs.mkdirSync(path.dirname(abs), { recursive: true });
      const tmp = `${abs}.tmp`;
      fs.writeFileSync(tmp, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');
      fs.renameSync(tmp, abs);

      this.db
        .prepare(
          `INSERT INTO assets (scope, kind, generated_at, max_published_at, item_count, source_set, params, path)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (scope, kind) DO UPDATE SET
             generated_at = excluded.generated_at,
             max_published_at = excluded.max_published_at,
             item_count = excluded.item_count,
             source_set = excluded.source_set,
             params = excluded.params,
             path = excluded.path`,
        )
        .run(scope, kind, generatedAt, signal.maxPublishedAt, signal.itemCount, signal.sourceSet ?? null, params, rel);
    } catch (err) {
      throw new StoreWriteError(`Failed to write ${kind} for ${scope}: ${err instanceof Error ? err.message : String(err)}`, {
        scope,
        kind,
        path: abs,
      });
    }

    return { scope, kind, generatedAt, signal, params, path: rel };
  }
}
