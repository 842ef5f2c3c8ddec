import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type LlmMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: LlmToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface LlmToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ChatOptions {
  tools?: LlmToolSpec[];
  /** Ask the model for a bare JSON object (`response_format: json_object`). */
  jsonMode?: boolean;
}

export interface LlmResponse {
  content: string | null;
  tool_calls: LlmToolCall[];
  model: string;
  token_count: number;
}

/**
 * Anything that can hold a chat turn. `LlmClient` in production, a stub in tests.
 */
export interface ChatClient {
  chat(messages: LlmMessage[], options?: ChatOptions): Promise<LlmResponse>;
}

// OpenAI-compatible chat completions response (partial)
const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({ name: z.string(), arguments: z.string().default('{}') }),
});

const ChatCompletionSchema = z.object({
  model: z.string().default(''),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(null),
          tool_calls: z.array(ToolCallSchema).nullish(),
        }),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number().optional() }).partial().optional(),
});

export class LlmClient implements ChatClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
  }

  async chat(messages: LlmMessage[], options: ChatOptions = {}): Promise<LlmResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const payload: Record<string, unknown> = {
      model: this.model,
      messages,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    };
    if (options.tools && options.tools.length > 0) {
      payload['tools'] = options.tools;
      payload['tool_choice'] = 'auto';
    }
    if (options.jsonMode) {
      payload['response_format'] = { type: 'json_object' };
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url, model: this.model });
      }
      throw new LlmError(`LLM request failed: ${errorMessage(err)}`, { url, model: this.model });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }

    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError('LLM response has an unexpected shape', {
        response: JSON.stringify(json).slice(0, 200),
      });
    }

    const data = parsed.data;
    const message = data.choices[0]?.message;
    const toolCalls = message?.tool_calls ?? [];
    const content = message?.content ?? null;

    if (!content && toolCalls.length === 0) {
      throw new LlmError('LLM returned empty content', { model: data.model });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug(
      { model: data.model, tokens: tokenCount, tool_calls: toolCalls.length },
      'LLM call completed',
    );

    return {
      content,
      tool_calls: toolCalls,
      model: data.model || this.model,
      token_count: tokenCount,
    };
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }
}
