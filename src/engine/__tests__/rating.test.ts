import { describe, it, expect } from 'vitest';
import { reconcileRatings, buildRatingTask, runRating } from '../rating.js';
import type { NewsItem, RatedNewsItem } from '../../news/schema.js';
import { reply, reportJson, scriptedLlm } from './fakes.js';

const A: NewsItem = { title: 'A', summary: 'sa', url: 'https://n.test/a', publication_date: '2024-05-01' };
const B: NewsItem = { title: 'B', summary: 'sb', url: 'https://n.test/b', publication_date: '2024-05-02' };
const C: NewsItem = { title: 'C', summary: 'sc', url: 'https://n.test/c', publication_date: '2024-05-03' };

function rated(item: NewsItem, rating: number): RatedNewsItem {
  return { ...item, rating };
}

describe('reconcileRatings', () => {
  it('attaches ratings in research order regardless of rating order', () => {
    const result = reconcileRatings([A, B, C], [rated(C, 3), rated(A, 9), rated(B, 6)]);
    expect(result.items.map((i) => [i.url, i.rating])).toEqual([
      ['https://n.test/a', 9],
      ['https://n.test/b', 6],
      ['https://n.test/c', 3],
    ]);
    expect(result.missing).toEqual([]);
    expect(result.unexpected).toEqual([]);
  });

  it('keeps research field values over rewritten ones', () => {
    const result = reconcileRatings([A], [{ ...A, title: 'Rewritten', summary: 'changed', rating: 8 }]);
    expect(result.items).toEqual([{ ...A, rating: 8 }]);
  });

  it('reports dropped and invented items', () => {
    const invented = rated({ ...C, url: 'https://n.test/invented' }, 10);
    const result = reconcileRatings([A, B], [rated(A, 5), invented]);
    expect(result.items.map((i) => i.url)).toEqual(['https://n.test/a']);
    expect(result.missing).toEqual(['https://n.test/b']);
    expect(result.unexpected).toEqual(['https://n.test/invented']);
  });

  it('collapses repeated research urls to the first occurrence', () => {
    const result = reconcileRatings([A, { ...A, title: 'A again' }], [rated(A, 4)]);
    expect(result.items).toEqual([{ ...A, rating: 4 }]);
    expect(result.repeated).toEqual(['https://n.test/a']);
  });
});

describe('runRating', () => {
  it('passes the research report as the only context and asks for JSON', async () => {
    const { client, chat } = scriptedLlm(reply(reportJson([rated(A, 7)])));

    const result = await runRating(client, { news_items: [A] }, ['AI']);

    expect(result.status).toBe('ok');
    const call = chat.mock.calls[0];
    expect(call?.[1]).toEqual({ jsonMode: true });
    expect(call?.[0][1]?.content).toContain(JSON.stringify({ news_items: [A] }, null, 2));
  });

  it('rejects ratings outside 1..10', () => {
    const schema = buildRatingTask(['AI']).schema;
    expect(schema.safeParse({ news_items: [rated(A, 0)] }).success).toBe(false);
    expect(schema.safeParse({ news_items: [rated(A, 11)] }).success).toBe(false);
    expect(schema.safeParse({ news_items: [rated(A, 10)] }).success).toBe(true);
  });
});
