import { describe, it, expect } from 'vitest';
import { createSearchNewsTool } from '../tool.js';
import { SearchError } from '../../shared/errors.js';
import { fakeSearch } from '../../engine/__tests__/fakes.js';

const HIT = { title: 'T', url: 'https://news.example.com/a', excerpt: 'E' };

describe('search_news tool', () => {
  it('returns hits as JSON', async () => {
    const { provider, searchNews } = fakeSearch([HIT]);
    const tool = createSearchNewsTool(provider);

    expect(tool.name).toBe('search_news');
    await expect(tool.execute({ query: '  AI agents ' })).resolves.toBe(JSON.stringify([HIT]));
    expect(searchNews).toHaveBeenCalledWith('AI agents');
  });

  it('says so when nothing was found', async () => {
    const tool = createSearchNewsTool(fakeSearch([]).provider);

    await expect(tool.execute({ query: 'LLM' })).resolves.toBe('No news found for "LLM" in the past day.');
  });

  it('rejects a missing query without searching', async () => {
    const { provider, searchNews } = fakeSearch([HIT]);
    const tool = createSearchNewsTool(provider);

    await expect(tool.execute({ q: 'AI' })).resolves.toBe('Error: search_news needs a non-empty "query" string');
    await expect(tool.execute({ query: '   ' })).resolves.toBe('Error: search_news needs a non-empty "query" string');
    expect(searchNews).not.toHaveBeenCalled();
  });

  it('reports a provider failure as text', async () => {
    const { provider, searchNews } = fakeSearch();
    searchNews.mockRejectedValueOnce(new SearchError('News search timed out after 15000ms'));
    const tool = createSearchNewsTool(provider);

    await expect(tool.execute({ query: 'AI' })).resolves.toBe('Error: News search timed out after 15000ms');
  });
});
