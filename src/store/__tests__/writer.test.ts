import { describe, it, expect } from 'vitest';
import { appendItems } from '../writer.js';
import { MemoryStore } from '../../engine/__tests__/fakes.js';

const A = { title: 'A', summary: 'sa', url: 'https://a.test/a', publication_date: '2024-01-01', rating: 7 };
const B = { title: 'B', summary: 'sb', url: 'https://a.test/b', publication_date: '2024-01-02', rating: 3 };
const C = { title: 'C', summary: 'sc', url: 'https://a.test/c', publication_date: '2024-01-03', rating: 10 };

describe('appendItems', () => {
  it('makes no store calls for an empty batch', async () => {
    const store = new MemoryStore();

    await expect(appendItems(store, [])).resolves.toEqual({ attempted: 0, written: 0 });
    expect(store.appendCalls).toBe(0);
    expect(store.listCalls).toBe(0);
  });

  it('appends one row per item in order', async () => {
    const store = new MemoryStore();

    await expect(appendItems(store, [A, B])).resolves.toEqual({ attempted: 2, written: 2 });
    expect(store.rows).toEqual([
      ['2024-01-01', 'A', 'sa', 'https://a.test/a', 7],
      ['2024-01-02', 'B', 'sb', 'https://a.test/b', 3],
    ]);
  });

  it('stops at the first failing row and keeps earlier rows', async () => {
    const store = new MemoryStore();
    store.failAppendAt = 1;

    await expect(appendItems(store, [A, B, C])).resolves.toEqual({
      attempted: 3,
      written: 1,
      failed: { url: 'https://a.test/b', error: 'write rejected' },
    });
    expect(store.appendCalls).toBe(2);
    expect(store.rows.map((row) => row[1])).toEqual(['A']);
  });

  it('writes the same batch twice when asked twice', async () => {
    const store = new MemoryStore();

    await appendItems(store, [A]);
    await appendItems(store, [A]);

    expect(store.rows).toHaveLength(2);
  });
});
