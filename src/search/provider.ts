import ddg from 'duck-duck-scrape';
import { logger } from '../shared/logger.js';
import { SearchError, errorMessage } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

/**
 * One news hit as handed to the research agent.
 */
export interface NewsHit {
  title: string;
  url: string;
  /** ISO timestamp, when the provider reports one. */
  date?: string;
  excerpt: string;
  source?: string;
}

export interface SearchProvider {
  searchNews(query: string): Promise<NewsHit[]>;
}

/**
 * Subset of a DuckDuckGo news result this adapter reads.
 */
export interface RawNewsResult {
  title: string;
  url: string;
  excerpt: string;
  /** Unix seconds. */
  date?: number;
  syndicate?: string;
}

export type NewsSearchFn = (query: string) => Promise<{ results: RawNewsResult[] }>;

const duckDuckGoNews: NewsSearchFn = (query) =>
  ddg.searchNews(query, {
    safeSearch: ddg.SafeSearchType.OFF,
    time: ddg.SearchTimeType.DAY,
  });

function stripTags(html: string): string {
  return html
    .replace(/<[^>]+>/g, '')
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .trim();
}

/**
 * DuckDuckGo news search scoped to the last day.
 */
export class DuckDuckGoSearch implements SearchProvider {
  private readonly maxResults: number;
  private readonly maxAgeMs: number;
  private readonly timeoutMs: number;

  constructor(
    config: Config['search'],
    private readonly search: NewsSearchFn = duckDuckGoNews,
    private readonly now: () => number = Date.now,
  ) {
    this.maxResults = config.max_results;
    this.maxAgeMs = config.max_age_hours * 60 * 60 * 1000;
    this.timeoutMs = config.timeout_ms;
  }

  async searchNews(query: string): Promise<NewsHit[]> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new SearchError(`News search timed out after ${this.timeoutMs}ms`, { query })),
        this.timeoutMs,
      );
    });

    let results: RawNewsResult[];
    try {
      ({ results } = await Promise.race([this.search(query), timeout]));
    } catch (err) {
      if (err instanceof SearchError) throw err;
      throw new SearchError(`News search failed: ${errorMessage(err)}`, { query });
    } finally {
      clearTimeout(timer);
    }

    const cutoff = this.now() - this.maxAgeMs;
    const hits = results
      .filter((r) => r.date === undefined || r.date * 1000 >= cutoff)
      .slice(0, this.maxResults)
      .map((r): NewsHit => ({
        title: stripTags(r.title),
        url: r.url,
        date: r.date !== undefined ? new Date(r.date * 1000).toISOString() : undefined,
        excerpt: stripTags(r.excerpt),
        source: r.syndicate || undefined,
      }));

    logger.debug({ query, found: results.length, kept: hits.length }, 'News search complete');
    return hits;
  }
}
