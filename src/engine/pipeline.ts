import type { ChatClient } from '../llm/client.js';
import type { SearchProvider } from '../search/provider.js';
import type { NewsStore } from '../store/adapter.js';
import { appendItems } from '../store/writer.js';
import type { WriteReport } from '../store/writer.js';
import { sendDigest } from '../push/slack.js';
import type { NotifyResult } from '../push/slack.js';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';
import { runCrew } from './crew.js';
import { fetchExistingUrls, filterNewItems } from './dedup.js';

export type RunStage =
  | 'start'
  | 'researched'
  | 'rated'
  | 'deduped'
  | 'stored'
  | 'notified'
  | 'empty'
  | 'done';

/**
 * - `published`: new items stored and the digest sent
 * - `nothing_new`: every rated item was already recorded
 * - `empty`: a generation step produced nothing usable
 * - `partial`: new items found but a store write or the digest failed
 */
export type RunOutcome = 'published' | 'nothing_new' | 'empty' | 'partial';

export interface RunReport {
  run_id: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  stages: RunStage[];
  outcome: RunOutcome;
  empty_reason?: string;
  researched: number;
  candidates: number;
  new_items: number;
  reconciliation?: { missing: string[]; unexpected: string[]; repeated: string[] };
  write: WriteReport;
  notify: NotifyResult;
}

export interface PipelineDeps {
  runId: string;
  llm: ChatClient;
  search: SearchProvider;
  store: NewsStore;
  topics: string[];
  maxToolRounds: number;
  normalizeUrls: boolean;
  notify: Config['notify'];
}

/**
 * One run: research → rating → dedup → store → notify. Every path ends in
 * `done`; failures are recorded in the report, not thrown.
 */
export async function runPipeline(deps: PipelineDeps): Promise<RunReport> {
  const startedMs = Date.now();
  const report: RunReport = {
    run_id: deps.runId,
    started_at: nowISO(),
    finished_at: '',
    duration_ms: 0,
    stages: ['start'],
    outcome: 'empty',
    researched: 0,
    candidates: 0,
    new_items: 0,
    write: { attempted: 0, written: 0 },
    notify: { status: 'skipped' },
  };

  const finish = (): RunReport => {
    report.stages.push('done');
    report.finished_at = nowISO();
    report.duration_ms = Date.now() - startedMs;
    logger.info(
      {
        run_id: report.run_id,
        outcome: report.outcome,
        candidates: report.candidates,
        new_items: report.new_items,
        written: report.write.written,
        notify: report.notify.status,
        duration_ms: report.duration_ms,
      },
      'Run complete',
    );
    return report;
  };

  logger.info({ run_id: deps.runId }, 'Run starting');

  const crew = await runCrew({
    llm: deps.llm,
    search: deps.search,
    topics: deps.topics,
    maxToolRounds: deps.maxToolRounds,
  });

  if (crew.status === 'empty') {
    if (crew.stage === 'rating') report.stages.push('researched');
    report.stages.push('empty');
    report.outcome = 'empty';
    report.empty_reason = `${crew.stage}: ${crew.reason}`;
    logger.warn({ stage: crew.stage, reason: crew.reason, raw: crew.raw.slice(0, 500) }, 'No news items found');
    return finish();
  }

  report.stages.push('researched', 'rated');
  report.researched = crew.researched;
  report.candidates = crew.items.length;
  report.reconciliation = {
    missing: crew.reconciliation.missing,
    unexpected: crew.reconciliation.unexpected,
    repeated: crew.reconciliation.repeated,
  };

  const existingUrls = await fetchExistingUrls(deps.store);
  const newItems = filterNewItems(crew.items, existingUrls, { normalize: deps.normalizeUrls });
  report.stages.push('deduped');
  report.new_items = newItems.length;

  if (newItems.length === 0) {
    logger.info({ candidates: crew.items.length }, 'No new news items, all fetched articles are already recorded');
    report.stages.push('empty');
    report.outcome = 'nothing_new';
    return finish();
  }
  logger.info({ new_items: newItems.length }, 'New news items to publish');

  report.write = await appendItems(deps.store, newItems);
  report.stages.push('stored');

  report.notify = await sendDigest(newItems, deps.notify);
  report.stages.push('notified');

  report.outcome = report.write.failed || report.notify.status === 'failed' ? 'partial' : 'published';
  return finish();
}

export function summarizeRun(report: RunReport): string {
  switch (report.outcome) {
    case 'published':
      return `News fetched and sent: ${report.new_items} new item(s) published.`;
    case 'nothing_new':
      return `No new news items: all ${report.candidates} fetched article(s) are already recorded.`;
    case 'empty':
      return `No news items found (${report.empty_reason ?? 'no usable output'}).`;
    case 'partial': {
      const digest = report.notify.status === 'failed' ? `digest failed (${report.notify.error})` : 'digest sent';
      return `Run finished with errors: ${report.write.written}/${report.new_items} item(s) stored, ${digest}.`;
    }
  }
}
