/**
 * Optional node-cron job that triggers the same gated run as GET /run.
 * Started by `ai-news-digest serve` when schedule.enabled is true.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { RunInProgressError, errorMessage } from '../shared/errors.js';
import type { RunReport } from '../engine/pipeline.js';

let runTask: ScheduledTask | null = null;

async function runScheduled(trigger: () => Promise<RunReport>): Promise<void> {
  logger.info('Scheduled run starting');
  try {
    await trigger();
  } catch (err) {
    if (err instanceof RunInProgressError) {
      logger.warn({ error: err.message }, 'Scheduled run skipped');
      return;
    }
    logger.error({ error: errorMessage(err) }, 'Scheduled run failed');
  }
}

/**
 * Start the scheduled run. Returns false when scheduling is disabled or the
 * cron expression is invalid.
 */
export function startScheduler(config: Config['schedule'], trigger: () => Promise<RunReport>): boolean {
  if (!config.enabled) {
    logger.debug('Scheduler disabled');
    return false;
  }

  if (!cron.validate(config.run_cron)) {
    logger.warn({ run_cron: config.run_cron }, 'Invalid run_cron expression, skipping scheduler');
    return false;
  }

  runTask = cron.schedule(
    config.run_cron,
    () => {
      void runScheduled(trigger);
    },
    config.timezone ? { timezone: config.timezone } : undefined,
  );

  logger.info({ run_cron: config.run_cron, timezone: config.timezone || 'local' }, 'Scheduler started');
  return true;
}

/**
 * Stop the scheduled task (for graceful shutdown).
 */
export function stopScheduler(): void {
  if (!runTask) return;
  runTask.stop();
  runTask = null;
  logger.info('Scheduler stopped');
}
