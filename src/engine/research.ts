import { runAgentTask } from '../llm/agent.js';
import type { AgentDefinition, TaskDefinition, TaskResult } from '../llm/agent.js';
import type { ChatClient } from '../llm/client.js';
import { NewsReportSchema } from '../news/schema.js';
import type { NewsReport } from '../news/schema.js';
import { createSearchNewsTool } from '../search/tool.js';
import type { SearchProvider } from '../search/provider.js';

export function buildResearcher(topics: string[], search: SearchProvider): AgentDefinition {
  const keywords = topics.join(', ');
  return {
    role: 'Senior News Researcher',
    goal: `Find the most relevant and recent news articles related to these keywords: ${keywords}.`,
    backstory: `You are an expert technology news researcher with a talent for finding the most impactful stories.
Use the 'search_news' tool to find key news items.
Focus on quality over quantity, ensuring each item is recent and highly relevant.`,
    tools: [createSearchNewsTool(search)],
  };
}

export function buildResearchTask(topics: string[]): TaskDefinition<NewsReport> {
  const keywords = topics.join(', ');
  return {
    name: 'research',
    description: `Research the latest news, updates, and significant developments related to: ${keywords}.
Your final report should contain news items.
Prioritize the most significant news from authoritative sources like company blogs, reputable tech news sites, and official announcements.
Exclude non-English and duplicate articles.`,
    expectedOutput: `A JSON object of the form {"news_items": [{"title": string, "summary": string, "url": string, "publication_date": "YYYY-MM-DD"}]}.
Each item needs a title, a summary (up to 5 lines), the article URL and its publication date. Do not include a rating.`,
    schema: NewsReportSchema,
  };
}

/**
 * Gather candidate news items on `topics`. Items come back without a rating.
 */
export function runResearch(
  client: ChatClient,
  search: SearchProvider,
  topics: string[],
  maxToolRounds: number,
): Promise<TaskResult<NewsReport>> {
  return runAgentTask(client, buildResearcher(topics, search), buildResearchTask(topics), {
    maxToolRounds,
  });
}
