import type { z } from 'zod';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { ChatClient, LlmMessage, LlmToolCall, LlmToolSpec } from './client.js';
import { parseWithRetry } from './parse.js';
import { buildAgentSystemPrompt, buildTaskPrompt, buildToolBudgetPrompt } from './prompts.js';

/**
 * A function the model may call while working on a task.
 * `execute` receives the decoded JSON arguments and returns the text handed back to the model.
 */
export interface AgentTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  execute(args: unknown): Promise<string>;
}

export interface AgentDefinition {
  role: string;
  goal: string;
  backstory: string;
  tools: AgentTool[];
}

export interface TaskDefinition<T> {
  name: string;
  description: string;
  expectedOutput: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Outcome of one delegated task. Downstream code branches on `status` and never
 * assumes the shape of `raw`.
 */
export type TaskResult<T> =
  | { status: 'ok'; data: T; raw: string }
  | { status: 'unusable'; raw: string; reason: string };

export interface RunTaskOptions {
  context?: string;
  maxToolRounds: number;
}

function toToolSpec(tool: AgentTool): LlmToolSpec {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

async function invokeTool(tools: AgentTool[], call: LlmToolCall): Promise<string> {
  const tool = tools.find((t) => t.name === call.function.name);
  if (!tool) {
    logger.warn({ tool: call.function.name }, 'Model called an unknown tool');
    return `Error: unknown tool "${call.function.name}"`;
  }

  let args: unknown;
  try {
    args = JSON.parse(call.function.arguments || '{}');
  } catch (err) {
    return `Error: tool arguments are not valid JSON (${errorMessage(err)})`;
  }

  try {
    return await tool.execute(args);
  } catch (err) {
    logger.warn({ tool: tool.name, error: errorMessage(err) }, 'Tool call failed');
    return `Error: ${errorMessage(err)}`;
  }
}

/**
 * Run one task with one agent: let the model call the agent's tools for up to
 * `maxToolRounds` rounds, then parse its final answer against the task schema
 * (one repair attempt). Transport and shape failures come back as `unusable`.
 */
export async function runAgentTask<T>(
  client: ChatClient,
  agent: AgentDefinition,
  task: TaskDefinition<T>,
  options: RunTaskOptions,
): Promise<TaskResult<T>> {
  const systemPrompt = buildAgentSystemPrompt(agent);
  const messages: LlmMessage[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: buildTaskPrompt(task, options.context) },
  ];
  const toolSpecs = agent.tools.map(toToolSpec);
  const hasTools = toolSpecs.length > 0;

  let raw = '';
  try {
    for (let round = 0; ; round++) {
      const allowTools = hasTools && round < options.maxToolRounds;
      if (hasTools && !allowTools) {
        messages.push({ role: 'user', content: buildToolBudgetPrompt() });
      }

      const response = await client.chat(messages, allowTools ? { tools: toolSpecs } : { jsonMode: true });

      if (!allowTools || response.tool_calls.length === 0) {
        raw = response.content ?? '';
        break;
      }

      messages.push({ role: 'assistant', content: response.content, tool_calls: response.tool_calls });
      for (const call of response.tool_calls) {
        logger.debug({ task: task.name, tool: call.function.name, round }, 'Agent tool call');
        messages.push({ role: 'tool', tool_call_id: call.id, content: await invokeTool(agent.tools, call) });
      }
    }

    const data = await parseWithRetry(task.schema, raw, client, systemPrompt);
    return { status: 'ok', data, raw };
  } catch (err) {
    const reason = errorMessage(err);
    logger.warn({ task: task.name, error: reason }, 'Task produced no usable result');
    return { status: 'unusable', raw, reason };
  }
}
