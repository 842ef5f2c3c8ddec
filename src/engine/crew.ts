import type { ChatClient } from '../llm/client.js';
import type { RatedNewsItem } from '../news/schema.js';
import type { SearchProvider } from '../search/provider.js';
import { logger } from '../shared/logger.js';
import { runResearch } from './research.js';
import { runRating, reconcileRatings } from './rating.js';
import type { Reconciliation } from './rating.js';

export interface CrewDeps {
  llm: ChatClient;
  search: SearchProvider;
  topics: string[];
  maxToolRounds: number;
}

export type CrewResult =
  | { status: 'ok'; researched: number; items: RatedNewsItem[]; reconciliation: Reconciliation }
  | { status: 'empty'; stage: 'research' | 'rating'; reason: string; raw: string };

/**
 * Research then rating, in that order, once. The research report is the only
 * input of the rating step. No retries.
 */
export async function runCrew(deps: CrewDeps): Promise<CrewResult> {
  logger.info({ topics: deps.topics }, 'Research step starting');
  const research = await runResearch(deps.llm, deps.search, deps.topics, deps.maxToolRounds);

  if (research.status === 'unusable') {
    return { status: 'empty', stage: 'research', reason: research.reason, raw: research.raw };
  }
  const researched = research.data.news_items;
  if (researched.length === 0) {
    return { status: 'empty', stage: 'research', reason: 'Research found no news items', raw: research.raw };
  }
  logger.info({ items: researched.length }, 'Research step complete');

  const rating = await runRating(deps.llm, research.data, deps.topics);
  if (rating.status === 'unusable') {
    return { status: 'empty', stage: 'rating', reason: rating.reason, raw: rating.raw };
  }

  const reconciliation = reconcileRatings(researched, rating.data.news_items);
  if (reconciliation.items.length === 0) {
    return { status: 'empty', stage: 'rating', reason: 'Rating output matched no research item', raw: rating.raw };
  }
  if (
    reconciliation.missing.length > 0 ||
    reconciliation.unexpected.length > 0 ||
    reconciliation.repeated.length > 0
  ) {
    logger.warn(
      {
        missing: reconciliation.missing,
        unexpected: reconciliation.unexpected,
        repeated: reconciliation.repeated,
      },
      'Rating output does not match research items',
    );
  }
  logger.info({ rated: reconciliation.items.length }, 'Rating step complete');

  return { status: 'ok', researched: researched.length, items: reconciliation.items, reconciliation };
}
