import type { ItemStore, Source, SourceFilter, SourceRegistry } from '../source/adapter.js';
import type { FetcherSet } from '../source/fetchers.js';
import { ingestSource, type IngestOptions, type IngestSummary } from '../source/ingest.js';
import type { AssetKind, AssetStore } from '../render/assetStore.js';
import { renderGlobalAssets, renderSourceAssets, type RenderResult } from '../render/renderer.js';
import type { RetryPolicy } from '../shared/retry.js';
import { RenderError, StoreWriteError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { KeyedLocks, withConcurrency } from './pool.js';

export type CycleState =
  | 'IDLE'
  | 'FETCHING'
  | 'FETCH_FAILED'
  | 'FETCH_OK'
  | 'INGESTING'
  | 'INGEST_OK'
  | 'STALENESS_CHECK'
  | 'RENDER_SKIPPED'
  | 'RENDERING'
  | 'RENDER_OK'
  | 'RENDER_FAILED';

export type CycleStatus = 'ok' | 'busy' | 'fetch_failed' | 'ingest_failed' | 'render_failed' | 'failed';

export interface CycleReport {
  sourceId: number;
  name: string;
  kind: Source['kind'];
  status: CycleStatus;
  states: CycleState[];
  ingest?: IngestSummary;
  render?: RenderResult;
  error?: string;
  durationMs: number;
}

/** One exclusion token per source id. */
export class SourceLocks extends KeyedLocks<number> {}

export interface CycleDeps {
  registry: SourceRegistry;
  store: ItemStore;
  assets: AssetStore;
  fetchers: FetcherSet;
  policy: RetryPolicy;
  stopwords: ReadonlySet<string>;
  locks: SourceLocks;
  now?: () => Date;
}

export interface CycleOptions extends IngestOptions {
  /** Run the staleness check and render after ingest. Default true. */
  render?: boolean;
  rollingDays?: number;
  catchUpMissing?: boolean;
  forceRender?: boolean;
}

/**
 * One fetch → ingest → render pass for a source. Never throws: every failure is
 * reported in the returned {@link CycleReport}.
 *
 * Fetching and ingesting are streamed together, so FETCH_OK, INGESTING and INGEST_OK
 * are recorded once the candidate stream has been drained.
 */
export async function runSourceCycle(
  deps: CycleDeps,
  source: Source,
  options: CycleOptions = {},
): Promise<CycleReport> {
  const started = Date.now();
  const states: CycleState[] = ['IDLE'];
  const report: CycleReport = {
    sourceId: source.id,
    name: source.name,
    kind: source.kind,
    status: 'ok',
    states,
    durationMs: 0,
  };
  const finish = (): CycleReport => {
    states.push('IDLE');
    report.durationMs = Date.now() - started;
    return report;
  };

  if (!deps.locks.tryAcquire(source.id)) {
    logger.warn({ sourceId: source.id }, 'Source is already being processed, skipping');
    report.status = 'busy';
    report.durationMs = Date.now() - started;
    return report;
  }

  try {
    states.push('FETCHING');
    let summary: IngestSummary;
    try {
      summary = await ingestSource(deps, source, options);
    } catch (err) {
      if (!(err instanceof StoreWriteError)) throw err;
      states.push('INGESTING');
      report.status = 'ingest_failed';
      report.error = err.message;
      logger.warn({ sourceId: source.id, error: err.message }, 'Ingest aborted');
      if (!options.dryRun) deps.registry.markChecked(source.id, { success: false, error: err.message });
      return finish();
    }
    report.ingest = summary;

    if (summary.lastError !== undefined) {
      states.push('FETCH_FAILED');
      report.status = 'fetch_failed';
      report.error = summary.lastError;
      logger.warn(
        { sourceId: source.id, newCount: summary.newCount, error: summary.lastError },
        'Fetch failed',
      );
      if (!options.dryRun) deps.registry.markChecked(source.id, { success: false, error: summary.lastError });
      return finish();
    }

    states.push('FETCH_OK', 'INGESTING', 'INGEST_OK');
    if (!options.dryRun) deps.registry.markChecked(source.id, { success: true });
    logger.info(
      { sourceId: source.id, kind: source.kind, newCount: summary.newCount, skippedCount: summary.skippedCount },
      options.dryRun ? '[dry-run] Ingest complete' : 'Ingest complete',
    );

    if (options.render === false || options.dryRun) return finish();

    states.push('STALENESS_CHECK');
    try {
      const rendered = renderSourceAssets(deps, source.id, {
        rollingDays: options.rollingDays,
        catchUpMissing: options.catchUpMissing,
        force: options.forceRender,
        now: deps.now,
      });
      report.render = rendered;
      if (rendered.rendered.length > 0) {
        states.push('RENDERING', 'RENDER_OK');
      } else {
        states.push('RENDER_SKIPPED');
      }
    } catch (err) {
      if (!(err instanceof RenderError)) throw err;
      states.push('RENDERING', 'RENDER_FAILED');
      report.status = 'render_failed';
      report.error = err.message;
      logger.error({ sourceId: source.id, error: err.message }, 'Render failed');
    }
    return finish();
  } catch (err) {
    report.status = 'failed';
    report.error = errorMessage(err);
    logger.error({ sourceId: source.id, error: report.error }, 'Source cycle failed');
    return finish();
  } finally {
    deps.locks.release(source.id);
  }
}

export interface RunOptions {
  filter?: Omit<SourceFilter, 'uncheckedToday'>;
  /** Include sources already checked today. */
  force?: boolean;
  concurrency?: number;
  cycle?: CycleOptions;
  /** Render the global artifacts after all cycles settle. Default true. */
  renderGlobal?: boolean;
  globalKinds?: readonly AssetKind[];
}

export interface RunReport {
  reports: CycleReport[];
  global?: RenderResult;
  globalError?: string;
  durationMs: number;
}

/**
 * Sources already checked on the current day are left out unless `force` is set
 * or the filter names sources by id or host.
 */
export function selectSources(registry: SourceRegistry, options: Pick<RunOptions, 'filter' | 'force'>): Source[] {
  const filter = options.filter ?? {};
  const targeted = (filter.ids !== undefined && filter.ids.length > 0) || filter.host !== undefined;
  return registry.listEnabledSources({ ...filter, uncheckedToday: !(options.force || targeted) });
}

/**
 * Run one cycle per selected source through a bounded worker pool, then the global render.
 */
export async function runCycles(deps: CycleDeps, options: RunOptions = {}): Promise<RunReport> {
  const started = Date.now();
  const sources = selectSources(deps.registry, options);
  const cycle = options.cycle ?? {};
  logger.info({ sources: sources.length, concurrency: options.concurrency ?? 4 }, 'Run starting');

  const reports = await withConcurrency(sources, options.concurrency ?? 4, (source) =>
    runSourceCycle(deps, source, cycle),
  );
  const run: RunReport = { reports, durationMs: 0 };

  if (options.renderGlobal !== false && cycle.render !== false && !cycle.dryRun) {
    try {
      run.global = renderGlobalAssets(deps, {
        rollingDays: cycle.rollingDays,
        catchUpMissing: cycle.catchUpMissing,
        force: cycle.forceRender,
        onlyKinds: options.globalKinds,
        now: deps.now,
      });
    } catch (err) {
      if (!(err instanceof RenderError)) throw err;
      run.globalError = err.message;
      logger.error({ error: err.message }, 'Global render failed');
    }
  }

  run.durationMs = Date.now() - started;
  const failed = reports.filter((r) => r.status !== 'ok' && r.status !== 'busy').length;
  logger.info(
    {
      sources: reports.length,
      failed,
      newCount: reports.reduce((n, r) => n + (r.ingest?.newCount ?? 0), 0),
      durationMs: run.durationMs,
    },
    'Run complete',
  );
  return run;
}
