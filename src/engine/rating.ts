import { runAgentTask } from '../llm/agent.js';
import type { AgentDefinition, TaskDefinition, TaskResult } from '../llm/agent.js';
import type { ChatClient } from '../llm/client.js';
import { RatedNewsReportSchema } from '../news/schema.js';
import type { NewsItem, NewsReport, RatedNewsItem, RatedNewsReport } from '../news/schema.js';

export function buildAnalyst(topics: string[]): AgentDefinition {
  const keywords = topics.join(', ');
  return {
    role: 'Senior News Analyst',
    goal: `Analyze each news article and provide a rating from 1 to 10 based on its relevance to the keywords: ${keywords}, significance, and novelty.`,
    backstory: `You are a seasoned technology analyst with a sharp eye for what's truly important in the AI space.
You can quickly assess the significance of a news story and assign it a clear, numerical rating from 1 to 10.
Your ratings help prioritize what's most important to read.`,
    tools: [],
  };
}

export function buildRatingTask(topics: string[]): TaskDefinition<RatedNewsReport> {
  const keywords = topics.join(', ');
  return {
    name: 'rating',
    description: `Analyze the list of news articles provided. For each article, provide a rating from 1 to 10.
The rating should be based on:
1. Relevance to the keywords: ${keywords}.
2. The significance of the news (e.g., major product launch, breakthrough research).
3. Novelty (is this new information or a rehash of old news?).

Your final output should be the same list of news items provided as input, but with a 'rating' field (an integer from 1 to 10) added to each item.`,
    expectedOutput: `A JSON object of the form {"news_items": [{"title": string, "summary": string, "url": string, "publication_date": "YYYY-MM-DD", "rating": integer}]}.
It must contain exactly the news items provided as input, unchanged, each with a 'rating' field (an integer from 1 to 10). Do not add or drop items.`,
    schema: RatedNewsReportSchema,
  };
}

/**
 * Score every item of a research report. The report is the task's only input.
 */
export function runRating(
  client: ChatClient,
  report: NewsReport,
  topics: string[],
): Promise<TaskResult<RatedNewsReport>> {
  return runAgentTask(client, buildAnalyst(topics), buildRatingTask(topics), {
    context: JSON.stringify(report, null, 2),
    maxToolRounds: 1,
  });
}

export interface Reconciliation {
  items: RatedNewsItem[];
  /** Research urls the rating step left out. */
  missing: string[];
  /** Urls the rating step returned that research never produced. */
  unexpected: string[];
  /** Repeated urls collapsed within the research batch. */
  repeated: string[];
}

/**
 * Re-key the rating output by url and rebuild each item from its research
 * original plus the rating, in research order.
 */
export function reconcileRatings(researched: NewsItem[], rated: RatedNewsItem[]): Reconciliation {
  const ratingByUrl = new Map<string, number>();
  for (const item of rated) {
    if (!ratingByUrl.has(item.url)) ratingByUrl.set(item.url, item.rating);
  }

  const seen = new Set<string>();
  const items: RatedNewsItem[] = [];
  const missing: string[] = [];
  const repeated: string[] = [];

  for (const item of researched) {
    if (seen.has(item.url)) {
      repeated.push(item.url);
      continue;
    }
    seen.add(item.url);

    const rating = ratingByUrl.get(item.url);
    if (rating === undefined) {
      missing.push(item.url);
      continue;
    }
    items.push({
      title: item.title,
      summary: item.summary,
      url: item.url,
      publication_date: item.publication_date,
      rating,
    });
  }

  const unexpected = [...ratingByUrl.keys()].filter((url) => !seen.has(url));

  return { items, missing, unexpected, repeated };
}
