import type { ChatClient } from '../llm/client.js';
import { LlmClient } from '../llm/client.js';
import type { SearchProvider } from '../search/provider.js';
import { DuckDuckGoSearch } from '../search/provider.js';
import type { NewsStore } from '../store/adapter.js';
import { openStore } from '../store/index.js';
import type { StoreHandle } from '../store/index.js';
import type { Config } from '../shared/config.js';
import { RunInProgressError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import { runPipeline } from './pipeline.js';
import type { RunReport } from './pipeline.js';

export interface RunServices {
  llm: ChatClient;
  search: SearchProvider;
  openStore(config: Config['store']): StoreHandle;
}

export function createServices(config: Config): RunServices {
  return {
    llm: new LlmClient(config.llm),
    search: new DuckDuckGoSearch(config.search),
    openStore,
  };
}

/**
 * Stand-in for a store that could not be opened: reads and writes fail with the
 * open error, so the run degrades the same way as on any other store failure.
 */
function unavailableStore(reason: string): NewsStore {
  return {
    kind: 'unavailable',
    listUrls: () => Promise.reject(new Error(`Store unavailable: ${reason}`)),
    appendRow: () => Promise.reject(new Error(`Store unavailable: ${reason}`)),
  };
}

/**
 * Run the pipeline once against freshly opened collaborators.
 */
export async function executeRun(config: Config, services: RunServices, runId: string): Promise<RunReport> {
  let handle: StoreHandle;
  try {
    handle = services.openStore(config.store);
  } catch (err) {
    const reason = errorMessage(err);
    logger.error({ backend: config.store.backend, error: reason }, 'Could not open the store');
    handle = { store: unavailableStore(reason), close: () => undefined };
  }

  try {
    return await runPipeline({
      runId,
      llm: services.llm,
      search: services.search,
      store: handle.store,
      topics: config.topics,
      maxToolRounds: config.llm.max_tool_rounds,
      normalizeUrls: config.dedup.normalize_urls,
      notify: config.notify,
    });
  } finally {
    handle.close();
  }
}

/**
 * Allows one run at a time in this process. A trigger that arrives while a run
 * is active is rejected with `RunInProgressError`.
 */
export class RunGate {
  private activeRunId: string | null = null;
  private last: RunReport | null = null;

  get running(): boolean {
    return this.activeRunId !== null;
  }

  get lastReport(): RunReport | null {
    return this.last;
  }

  async run(task: (runId: string) => Promise<RunReport>): Promise<RunReport> {
    if (this.activeRunId !== null) {
      throw new RunInProgressError(this.activeRunId);
    }
    const runId = generateId();
    this.activeRunId = runId;
    try {
      const report = await task(runId);
      this.last = report;
      return report;
    } finally {
      this.activeRunId = null;
    }
  }
}
