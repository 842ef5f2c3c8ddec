import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { decodeServiceAccount } from '../store/credentials.js';
import { LlmClient } from '../llm/client.js';

/**
 * One line per collaborator, saying whether it is configured.
 */
export function doctorReport(config: Config): string[] {
  const lines = [
    `Topics: ${config.topics.join(', ')}`,
    `LLM: ${new LlmClient(config.llm).isConfigured() ? `configured (${config.llm.model})` : 'unconfigured'}`,
    `Slack webhook: ${config.notify.webhook_url ? 'configured' : 'unconfigured'}`,
  ];

  if (config.store.backend === 'sqlite') {
    lines.push(`Store: sqlite (${resolvePath(config.store.sqlite.path)})`);
  } else {
    const sheet = config.store.sheets.spreadsheet_id ? 'spreadsheet set' : 'spreadsheet missing';
    let creds: string;
    try {
      creds = `credentials ok (${decodeServiceAccount(config.store.sheets.credentials_base64).client_email})`;
    } catch (err) {
      creds = `credentials error (${errorMessage(err)})`;
    }
    lines.push(`Store: sheets, ${sheet}, ${creds}`);
  }

  lines.push(`Schedule: ${config.schedule.enabled ? config.schedule.run_cron : 'disabled'}`);
  return lines;
}
