import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmClient } from '../client.js';
import { ConfigSchema } from '../../shared/config.js';
import { LlmError } from '../../shared/errors.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function llmConfig(overrides: Record<string, unknown> = {}) {
  return ConfigSchema.parse({ llm: { api_key: 'test-key', ...overrides } }).llm;
}

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), { ...init, headers: { 'Content-Type': 'application/json' } });
}

function mockFetch(respond: () => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>().mockImplementation(respond);
  globalThis.fetch = fetchMock;
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof mockFetch>): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
}

const COMPLETION = {
  model: 'gpt-4o-mini-2024',
  choices: [{ message: { content: '{"news_items": []}' } }],
  usage: { total_tokens: 42 },
};

describe('LlmClient', () => {
  it('posts a chat completion request and returns the content', async () => {
    const fetchMock = mockFetch(() => Promise.resolve(jsonResponse(COMPLETION)));
    const client = new LlmClient(llmConfig());

    const result = await client.chat([{ role: 'user', content: 'hi' }], { jsonMode: true });

    expect(result).toEqual({
      content: '{"news_items": []}',
      tool_calls: [],
      model: 'gpt-4o-mini-2024',
      token_count: 42,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(sentBody(fetchMock)).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hi' }],
      max_tokens: 4000,
      temperature: 0.2,
      response_format: { type: 'json_object' },
    });
  });

  it('sends tools and returns tool calls', async () => {
    const fetchMock = mockFetch(() =>
      Promise.resolve(
        jsonResponse({
          model: 'm',
          choices: [
            {
              message: {
                content: null,
                tool_calls: [{ id: 'c1', type: 'function', function: { name: 'search_news', arguments: '{"query":"AI"}' } }],
              },
            },
          ],
        }),
      ),
    );
    const client = new LlmClient(llmConfig({ base_url: 'https://llm.example.test/v1/' }));
    const tools = [
      { type: 'function' as const, function: { name: 'search_news', description: 'd', parameters: {} } },
    ];

    const result = await client.chat([{ role: 'user', content: 'hi' }], { tools });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://llm.example.test/v1/chat/completions');
    expect(sentBody(fetchMock)).toMatchObject({ tools, tool_choice: 'auto' });
    expect(result.content).toBeNull();
    expect(result.tool_calls).toEqual([
      { id: 'c1', type: 'function', function: { name: 'search_news', arguments: '{"query":"AI"}' } },
    ]);
    expect(result.token_count).toBe(0);
  });

  it('throws LlmError on a non-ok response', async () => {
    mockFetch(() =>
      Promise.resolve(new Response('boom', { status: 500, statusText: 'Internal Server Error' })),
    );
    const client = new LlmClient(llmConfig());

    const attempt = client.chat([{ role: 'user', content: 'hi' }]);
    await expect(attempt).rejects.toBeInstanceOf(LlmError);
    await expect(attempt).rejects.toThrow('LLM API error: 500 Internal Server Error');
  });

  it('throws on empty content without tool calls', async () => {
    mockFetch(() => Promise.resolve(jsonResponse({ model: 'm', choices: [{ message: { content: '' } }] })));
    const client = new LlmClient(llmConfig());

    await expect(client.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow('LLM returned empty content');
  });

  it('throws on an unexpected response shape', async () => {
    mockFetch(() => Promise.resolve(jsonResponse({ choices: [] })));
    const client = new LlmClient(llmConfig());

    await expect(client.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'LLM response has an unexpected shape',
    );
  });

  it('reports a timeout', async () => {
    mockFetch(() => Promise.reject(Object.assign(new Error('aborted'), { name: 'TimeoutError' })));
    const client = new LlmClient(llmConfig({ timeout_ms: 500 }));

    await expect(client.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'LLM request timed out after 500ms',
    );
  });

  it('reports a transport failure', async () => {
    mockFetch(() => Promise.reject(new TypeError('fetch failed')));
    const client = new LlmClient(llmConfig());

    await expect(client.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow('LLM request failed: fetch failed');
  });

  it('knows whether an api key is set', () => {
    expect(new LlmClient(llmConfig()).isConfigured()).toBe(true);
    expect(new LlmClient(llmConfig({ api_key: '' })).isConfigured()).toBe(false);
  });
});
