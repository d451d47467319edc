#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getFeedpulseDir, resolvePath, toIsoTimestamp } from '../shared/utils.js';
import { setLogLevel } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { isSourceKind, SOURCE_KINDS, type SourceKind } from '../source/adapter.js';
import {
  addSource,
  getSourceHealth,
  getSourceItemCounts,
  listSources,
  setSourceEnabled,
} from '../source/sourceDb.js';
import { runCycles, selectSources, type CycleOptions, type CycleReport, type RunReport } from '../engine/cycle.js';
import { createCycleDeps } from '../engine/deps.js';
import { startScheduler, stopScheduler } from '../engine/scheduler.js';
import { renderGlobalAssets, renderSourceAssets, type RenderResult } from '../render/renderer.js';
import { RenderError } from '../shared/errors.js';

const program = new Command();

program
  .name('feedpulse')
  .description('Incremental ingestion and staleness-driven analytics for blogs and video channels')
  .version('0.1.0')
  .option('--log-level <level>', 'Log level (debug, info, warning, error)')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.optsWithGlobals<{ logLevel?: string }>();
    setLogLevel(opts.logLevel);
  });

// === argument parsers ===

function parseIntArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parsePositiveIntArg(value: string): number {
  const n = parseIntArg(value);
  if (n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function collectIds(value: string, previous: number[]): number[] {
  return [...previous, parsePositiveIntArg(value)];
}

function parseKindArg(value: string): SourceKind {
  const normalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
  if (!isSourceKind(normalized)) {
    throw new InvalidArgumentError(`Expected one of: ${SOURCE_KINDS.join(', ')}.`);
  }
  return normalized;
}

function parseSinceArg(value: string): string {
  const iso = toIsoTimestamp(value);
  if (iso === null) throw new InvalidArgumentError('Expected a date such as 2024-01-31.');
  return iso;
}

function parseSecondsArg(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  return n;
}

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getFeedpulseDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig(true);
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and API key')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const dbPath = resolvePath(config.db.path);
        if (!fs.existsSync(dbPath)) {
          results.push('DB: missing (run feedpulse init)');
        } else {
          const db = initDb(dbPath);
          runMigrations(db);
          const sources = listSources(db);
          const enabled = sources.filter((s) => s.is_enabled === 1).length;
          results.push('DB: ok', `Sources: ${sources.length} (${enabled} enabled)`);
          closeDb();
        }
      } catch (err) {
        results.push(`DB: error (${err instanceof Error ? err.message : String(err)})`);
      }

      results.push(config.youtube.api_key ? 'YouTube API: configured' : 'YouTube API: (unconfigured)');
    } catch (err) {
      results.push(`Config: error (${err instanceof Error ? err.message : String(err)})`);
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === source ===
const sourceCmd = program.command('source').description('Manage sources');

sourceCmd
  .command('add <url>')
  .description('Register a blog or video channel')
  .requiredOption('-k, --kind <kind>', `Source kind (${SOURCE_KINDS.join(', ')})`, parseKindArg)
  .option('-n, --name <name>', 'Display name')
  .option('--channel-id <id>', 'Video channel id (UC...)')
  .option('--disabled', 'Register without enabling')
  .action(async (url: string, opts: { kind: SourceKind; name?: string; channelId?: string; disabled?: boolean }) => {
    const { db, cleanup } = await getDb();
    try {
      const id = addSource(db, {
        url,
        kind: opts.kind,
        name: opts.name,
        channel_id: opts.channelId,
        enabled: !opts.disabled,
      });
      if (id === null) {
        log(`Source already exists: ${url}`);
      } else {
        log(`✓ Source ${id} added: ${url}`);
      }
    } finally {
      cleanup();
    }
  });

sourceCmd
  .command('list')
  .description('List registered sources')
  .option('-k, --kind <kind>', 'Only this kind', parseKindArg)
  .action(async (opts: { kind?: SourceKind }) => {
    const { db, cleanup } = await getDb();
    try {
      const sources = listSources(db, { kind: opts.kind });
      const counts = getSourceItemCounts(db);

      if (sources.length === 0) {
        log('No sources registered. Use: feedpulse source add <url> --kind Blog');
      } else {
        for (const s of sources) {
          const enabled = s.is_enabled ? '●' : '○';
          const status = s.status === 'failed' ? ' FAILED' : '';
          log(
            `${enabled} ${String(s.id).padStart(4)} ${s.kind.padEnd(5)} ${s.name.padEnd(28)} ` +
              `${String(counts.get(s.id) ?? 0).padStart(5)} items  last: ${s.last_checked_at ?? 'never'}${status}`,
          );
        }
        log(`\n${sources.length} sources total`);
      }
    } finally {
      cleanup();
    }
  });

for (const [name, enabled] of [
  ['enable', true],
  ['disable', false],
] as const) {
  sourceCmd
    .command(`${name} <id>`)
    .description(`${enabled ? 'Enable' : 'Disable'} a source`)
    .action(async (rawId: string) => {
      const id = parsePositiveIntArg(rawId);
      const { db, cleanup } = await getDb();
      try {
        if (setSourceEnabled(db, id, enabled)) {
          log(`✓ Source ${id} ${enabled ? 'enabled' : 'disabled'}`);
        } else {
          log(`Source not found: ${id}`);
          process.exitCode = 1;
        }
      } finally {
        cleanup();
      }
    });
}

sourceCmd
  .command('health <id>')
  .description('Show item counts, date range and latest items for a source')
  .action(async (rawId: string) => {
    const id = parsePositiveIntArg(rawId);
    const { db, cleanup } = await getDb();
    try {
      const health = getSourceHealth(db, id);
      if (!health) {
        log(`Source not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      const { source } = health;
      log(`${source.name} [${source.kind}] ${source.url}`);
      log(`  Enabled:       ${source.is_enabled ? 'yes' : 'no'}`);
      log(`  Status:        ${source.status ?? 'never run'}${source.last_error ? ` (${source.last_error})` : ''}`);
      log(`  Last checked:  ${source.last_checked_at ?? 'never'}`);
      log(`  Last success:  ${source.last_success_at ?? 'never'}`);
      log(`  Items:         ${health.itemCount} (${health.undatedCount} undated)`);
      log(`  First:         ${health.firstPublishedAt ?? '-'}`);
      log(`  Last:          ${health.lastPublishedAt ?? '-'}`);
      if (health.latest.length > 0) {
        log('\nLatest:');
        for (const item of health.latest) {
          log(`  ${(item.published_at ?? 'undated').slice(0, 10).padEnd(10)}  ${item.title}`);
        }
      }
    } finally {
      cleanup();
    }
  });

// === fetch / run ===

interface SelectionOpts {
  kind?: SourceKind;
  id: number[];
  host?: string;
  force?: boolean;
}

interface FetchOpts extends SelectionOpts {
  since?: string;
  max?: number;
  dryRun?: boolean;
  sleep?: number;
  startUrl?: string;
  uploadsOnly?: boolean;
  concurrency?: number;
}

interface RenderOpts {
  catchUpMissing?: boolean;
  rollingDays?: number;
  forceRender?: boolean;
}

function addSelectionOptions(cmd: Command): Command {
  return cmd
    .option('-k, --kind <kind>', `Only sources of this kind (${SOURCE_KINDS.join(', ')})`, parseKindArg)
    .option('--id <id>', 'Only this source id (repeatable)', collectIds, [])
    .option('--host <host>', 'Only sources on this host')
    .option('--force', 'Include sources already checked today');
}

function addFetchOptions(cmd: Command): Command {
  return addSelectionOptions(cmd)
    .option('--since <date>', 'Skip items published before this date', parseSinceArg)
    .option('--max <n>', 'Max new items per source (0 = unlimited)', parseIntArg)
    .option('--dry-run', 'Crawl and count without writing')
    .option('--sleep <seconds>', 'Pause between page requests', parseSecondsArg)
    .option('--start-url <url>', 'Blog: start the crawl from this post')
    .option('--uploads-only', 'Video: only the uploads playlist')
    .option('--with-playlists', 'Video: also scan the channel playlists')
    .option('-c, --concurrency <n>', 'Sources processed in parallel', parsePositiveIntArg);
}

function addRenderOptions(cmd: Command): Command {
  return cmd
    .option('--catch-up-missing', 'Also regenerate recorded artifacts whose files are gone')
    .option('--rolling-days <n>', 'Rolling average window', parsePositiveIntArg)
    .option('--force-render', 'Regenerate artifacts even when current');
}

function cycleOptions(config: Config, opts: FetchOpts & { withPlaylists?: boolean }, render: RenderOpts | false): CycleOptions {
  const uploadsOnly = opts.withPlaylists ? false : (opts.uploadsOnly ?? config.youtube.uploads_only);
  const max = opts.max ?? config.crawl.max_items;
  return {
    since: opts.since,
    maxItems: max > 0 ? max : undefined,
    dryRun: opts.dryRun,
    startUrl: opts.startUrl,
    uploadsOnly,
    playlistsLimit: config.youtube.playlists_limit,
    render: render !== false,
    rollingDays: render ? (render.rollingDays ?? config.render.rolling_days) : undefined,
    catchUpMissing: render ? (render.catchUpMissing ?? config.render.catch_up_missing) : undefined,
    forceRender: render ? render.forceRender : undefined,
  };
}

function printCycleReports(reports: CycleReport[]): void {
  if (reports.length === 0) {
    log('No sources to process.');
    return;
  }
  for (const r of reports) {
    const counts = r.ingest ? `new ${r.ingest.newCount}, skipped ${r.ingest.skippedCount}` : '';
    const rendered = r.render ? `, rendered ${r.render.rendered.length}` : '';
    const error = r.error ? `  ${r.error}` : '';
    log(`  ${String(r.sourceId).padStart(4)} ${r.name.padEnd(28)} ${r.status.padEnd(13)} ${counts}${rendered}${error}`);
  }
  const failed = reports.filter((r) => r.status !== 'ok' && r.status !== 'busy').length;
  const added = reports.reduce((n, r) => n + (r.ingest?.newCount ?? 0), 0);
  log(`\n${reports.length} sources, ${added} new items, ${failed} failed`);
}

function printRender(result: RenderResult): void {
  const rendered = result.rendered.map((r) => `${r.kind} (${r.reason})`).join(', ') || 'none';
  log(`  ${result.scope.padEnd(12)} ${result.signal.itemCount} items  rendered: ${rendered}`);
}

function printRun(run: RunReport): void {
  printCycleReports(run.reports);
  if (run.global) printRender(run.global);
  if (run.globalError) {
    log(`Global render failed: ${run.globalError}`);
    process.exitCode = 1;
  }
}

addFetchOptions(program.command('fetch').description('Fetch new items from enabled sources')).action(
  async (opts: FetchOpts & { withPlaylists?: boolean }) => {
    const { db, config, cleanup } = await getDb();
    try {
      const deps = createCycleDeps(db, config, { sleepMs: opts.sleep !== undefined ? opts.sleep * 1000 : undefined });
      const run = await runCycles(deps, {
        filter: { kind: opts.kind, ids: opts.id, host: opts.host },
        force: opts.force,
        concurrency: opts.concurrency ?? config.crawl.concurrency,
        cycle: cycleOptions(config, opts, false),
        renderGlobal: false,
      });
      printCycleReports(run.reports);
    } finally {
      cleanup();
    }
  },
);

addRenderOptions(
  addFetchOptions(program.command('run').description('Fetch, render stale per-source artifacts, then global')),
).action(async (opts: FetchOpts & RenderOpts & { withPlaylists?: boolean }) => {
  const { db, config, cleanup } = await getDb();
  try {
    const deps = createCycleDeps(db, config, { sleepMs: opts.sleep !== undefined ? opts.sleep * 1000 : undefined });
    const run = await runCycles(deps, {
      filter: { kind: opts.kind, ids: opts.id, host: opts.host },
      force: opts.force,
      concurrency: opts.concurrency ?? config.crawl.concurrency,
      cycle: cycleOptions(config, opts, opts),
    });
    printRun(run);
  } finally {
    cleanup();
  }
});

// === render ===
program
  .command('render')
  .description('Render stale per-source artifacts without fetching')
  .option('-k, --kind <kind>', 'Only sources of this kind', parseKindArg)
  .option('--id <id>', 'Only this source id (repeatable)', collectIds, [])
  .option('--host <host>', 'Only sources on this host')
  .option('--catch-up-missing', 'Also regenerate recorded artifacts whose files are gone')
  .option('--rolling-days <n>', 'Rolling average window', parsePositiveIntArg)
  .option('--force', 'Regenerate artifacts even when current')
  .option('--outdir <dir>', 'Artifact directory')
  .action(
    async (opts: {
      kind?: SourceKind;
      id: number[];
      host?: string;
      catchUpMissing?: boolean;
      rollingDays?: number;
      force?: boolean;
      outdir?: string;
    }) => {
      const { db, config, cleanup } = await getDb();
      try {
        const deps = createCycleDeps(db, config, { outdir: opts.outdir });
        const sources = selectSources(deps.registry, {
          filter: { kind: opts.kind, ids: opts.id, host: opts.host },
          force: true,
        });
        let failed = 0;
        for (const source of sources) {
          try {
            printRender(
              renderSourceAssets(deps, source.id, {
                rollingDays: opts.rollingDays ?? config.render.rolling_days,
                catchUpMissing: opts.catchUpMissing ?? config.render.catch_up_missing,
                force: opts.force,
              }),
            );
          } catch (err) {
            if (!(err instanceof RenderError)) throw err;
            failed++;
            log(`  source:${source.id} render failed: ${err.message}`);
          }
        }
        log(`\n${sources.length} sources checked, ${failed} failed`);
        if (failed > 0) process.exitCode = 1;
      } finally {
        cleanup();
      }
    },
  );

program
  .command('render-global')
  .description('Render artifacts over all enabled sources')
  .option('--only-words', 'Only the word frequency artifact')
  .option('--rolling-days <n>', 'Rolling average window', parsePositiveIntArg)
  .option('--catch-up-missing', 'Also regenerate recorded artifacts whose files are gone')
  .option('--force', 'Regenerate artifacts even when current')
  .option('--outdir <dir>', 'Artifact directory')
  .action(
    async (opts: { onlyWords?: boolean; rollingDays?: number; catchUpMissing?: boolean; force?: boolean; outdir?: string }) => {
      const { db, config, cleanup } = await getDb();
      try {
        const deps = createCycleDeps(db, config, { outdir: opts.outdir });
        printRender(
          renderGlobalAssets(deps, {
            rollingDays: opts.rollingDays ?? config.render.rolling_days,
            catchUpMissing: opts.catchUpMissing ?? config.render.catch_up_missing,
            force: opts.force,
            onlyKinds: opts.onlyWords ? ['word_frequencies'] : undefined,
          }),
        );
      } finally {
        cleanup();
      }
    },
  );

// === schedule ===
program
  .command('schedule')
  .description('Run the full cycle on schedule.cycle_cron until interrupted')
  .action(async () => {
    const { db, config, cleanup } = await getDb();
    const deps = createCycleDeps(db, config);
    const started = startScheduler(config.schedule.cycle_cron, () =>
      runCycles(deps, {
        concurrency: config.crawl.concurrency,
        cycle: cycleOptions(config, { id: [] }, {}),
      }),
    );
    if (!started) {
      cleanup();
      process.exitCode = 1;
      return;
    }
    const shutdown = (): void => {
      stopScheduler();
      cleanup();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

// === Helper to get DB connection ===
async function getDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run feedpulse init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);

  return {
    db,
    config,
    cleanup: () => {
      closeDb();
    },
  };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
