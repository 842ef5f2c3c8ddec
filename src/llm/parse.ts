import type { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { ChatClient } from './client.js';
import { buildRepairPrompt } from './prompts.js';

/**
 * Strip markdown code fences from LLM output.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Try to parse and validate JSON from LLM output.
 * Returns the parsed data, or a string error message if it fails.
 */
function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): { data: T } | string {
  try {
    const json: unknown = JSON.parse(raw);
    const result = schema.safeParse(json);
    if (result.success) return { data: result.data };
    return result.error.message;
  } catch (err) {
    return errorMessage(err);
  }
}

/**
 * Parse LLM JSON output with one repair-retry on parse or validation failure.
 */
export async function parseWithRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: ChatClient,
  systemMessage: string,
): Promise<T> {
  const cleaned = stripCodeFences(rawOutput);

  const firstResult = tryParse(schema, cleaned);
  if (typeof firstResult !== 'string') return firstResult.data;

  logger.warn({ error: firstResult.slice(0, 300), raw: cleaned.slice(0, 200) }, 'LLM output invalid, attempting repair');

  let repairContent: string | null;
  try {
    const repairResponse = await client.chat(
      [
        { role: 'system', content: systemMessage },
        { role: 'user', content: buildRepairPrompt(firstResult, cleaned) },
      ],
      { jsonMode: true },
    );
    repairContent = repairResponse.content;
  } catch (err) {
    throw new LlmError(`LLM repair call failed: ${errorMessage(err)}`);
  }

  const repairedCleaned = stripCodeFences(repairContent ?? '');
  const repairedResult = tryParse(schema, repairedCleaned);
  if (typeof repairedResult !== 'string') return repairedResult.data;

  throw new LlmError('LLM output invalid after repair attempt', {
    original_error: firstResult.slice(0, 500),
    repair_error: repairedResult.slice(0, 500),
    raw: repairedCleaned.slice(0, 500),
  });
}
