/**
 * Slack notifier. Renders accepted items as one mrkdwn digest and posts it to
 * an incoming webhook.
 */

import type { RatedNewsItem } from '../news/schema.js';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

export type NotifyResult =
  | { status: 'sent'; items: number }
  | { status: 'skipped' }
  | { status: 'failed'; error: string };

export function renderDigestItem(item: RatedNewsItem): string {
  return [
    `*Title:* ${item.title}`,
    `*Summary:* ${item.summary}`,
    `Rating: ${item.rating}/10`,
    `<${item.url}|Read More>  |  Published on: ${item.publication_date}`,
    '---',
  ]
    .map((line) => `${line}\n`)
    .join('');
}

export function renderDigest(items: readonly RatedNewsItem[], title: string): string {
  return `*${title}*\n\n${items.map(renderDigestItem).join('')}`;
}

/**
 * Post the digest for `items` as a single webhook message. Never throws:
 * failures come back as `{ status: 'failed' }`.
 */
export async function sendDigest(
  items: readonly RatedNewsItem[],
  config: Config['notify'],
): Promise<NotifyResult> {
  if (items.length === 0) {
    logger.info('No items to notify, skipping digest');
    return { status: 'skipped' };
  }
  if (!config.webhook_url) {
    logger.error('Slack webhook URL is not configured (SLACK_WEBHOOK_URL)');
    return { status: 'failed', error: 'Slack webhook URL is not configured' };
  }

  const text = renderDigest(items, config.title);

  try {
    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal: AbortSignal.timeout(config.timeout_ms),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const error = `Webhook responded ${response.status} ${response.statusText}`.trim();
      logger.error({ status: response.status, body: body.slice(0, 200) }, 'Error sending message to Slack');
      return { status: 'failed', error };
    }
  } catch (err) {
    const error =
      err instanceof Error && err.name === 'TimeoutError'
        ? `Webhook timed out after ${config.timeout_ms}ms`
        : errorMessage(err);
    logger.error({ error }, 'Error sending message to Slack');
    return { status: 'failed', error };
  }

  logger.info({ items: items.length }, 'Digest sent to Slack');
  return { status: 'sent', items: items.length };
}
