import type { Signal } from '../source/adapter.js';
import type { AssetKind, AssetStore, RecordedAsset } from '../render/assetStore.js';

/**
 * AssetStore kept in memory. `files` mirrors what would be on disk and can be
 * cleared to simulate deleted artifacts.
 */
export class MemoryAssetStore implements AssetStore {
  readonly records = new Map<string, RecordedAsset>();
  readonly files = new Map<string, unknown>();
  writes: Array<{ scope: string; kind: AssetKind }> = [];

  private key(scope: string, kind: AssetKind): string {
    return `${scope}|${kind}`;
  }

  getRecordedSignal(scope: string, kind: AssetKind): Signal | undefined {
    return this.records.get(this.key(scope, kind))?.signal;
  }

  getRecordedParams(scope: string, kind: AssetKind): string | undefined {
    return this.records.get(this.key(scope, kind))?.params;
  }

  artifactExists(scope: string, kind: AssetKind): boolean {
    return this.files.has(this.key(scope, kind));
  }

  writeArtifact(
    scope: string,
    kind: AssetKind,
    data: unknown,
    generatedAt: string,
    signal: Signal,
    params = '',
  ): RecordedAsset {
    const record: RecordedAsset = { scope, kind, generatedAt, signal, params, path: `${scope}/${kind}.json` };
    this.records.set(this.key(scope, kind), record);
    this.files.set(this.key(scope, kind), data);
    this.writes.push({ scope, kind });
    return record;
  }

  data(scope: string, kind: AssetKind): unknown {
    return this.files.get(this.key(scope, kind));
  }
}
