/**
 * Scheduler: a node-cron job that runs the full fetch → render → global pass.
 * Started by `feedpulse schedule`.
 */

import cron from 'node-cron';
import { logger } from '../shared/logger.js';
import type { RunReport } from './cycle.js';

let cycleTask: cron.ScheduledTask | null = null;
let running = false;

/**
 * Start the cycle job. Returns false when the cron expression is invalid.
 * A tick that fires while the previous run is still going is skipped.
 */
export function startScheduler(cronExpr: string, run: () => Promise<RunReport>): boolean {
  if (!cron.validate(cronExpr)) {
    logger.warn({ cycleCron: cronExpr }, 'Invalid cycle_cron expression, scheduler not started');
    return false;
  }

  cycleTask = cron.schedule(cronExpr, () => {
    void runScheduledCycle(run);
  });

  logger.info({ cycleCron: cronExpr }, 'Scheduler started');
  return true;
}

export async function runScheduledCycle(run: () => Promise<RunReport>): Promise<RunReport | undefined> {
  if (running) {
    logger.warn('Previous scheduled run still in progress, skipping tick');
    return undefined;
  }
  running = true;
  logger.info('Scheduled run starting');
  try {
    const report = await run();
    logger.info({ sources: report.reports.length, durationMs: report.durationMs }, 'Scheduled run complete');
    return report;
  } catch (e) {
    logger.error({ error: e instanceof Error ? e.message : String(e) }, 'Scheduled run failed');
    return undefined;
  } finally {
    running = false;
  }
}

export function stopScheduler(): void {
  cycleTask?.stop();
  cycleTask = null;
  logger.info('Scheduler stopped');
}
