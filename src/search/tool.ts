import { z } from 'zod';
import type { AgentTool } from '../llm/agent.js';
import { errorMessage } from '../shared/errors.js';
import type { SearchProvider } from './provider.js';

const SearchArgsSchema = z.object({
  query: z.string().trim().min(1),
});

/**
 * Expose a search provider to the research agent as `search_news`.
 * Provider failures are reported back to the model as text.
 */
export function createSearchNewsTool(provider: SearchProvider): AgentTool {
  return {
    name: 'search_news',
    description: 'Search for up-to-date news articles from the past day. Returns a JSON list of hits.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search keywords' },
      },
      required: ['query'],
      additionalProperties: false,
    },
    async execute(args) {
      const parsed = SearchArgsSchema.safeParse(args);
      if (!parsed.success) {
        return 'Error: search_news needs a non-empty "query" string';
      }
      try {
        const hits = await provider.searchNews(parsed.data.query);
        if (hits.length === 0) return `No news found for "${parsed.data.query}" in the past day.`;
        return JSON.stringify(hits);
      } catch (err) {
        return `Error: ${errorMessage(err)}`;
      }
    },
  };
}
