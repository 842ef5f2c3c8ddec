import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getAppDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_TOPICS = ['AI', 'OpenAI', 'LLM', 'AI Agents'];

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(10000),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4o-mini'),
      max_tokens: z.number().default(4000),
      temperature: z.number().default(0.2),
      timeout_ms: z.number().default(60000),
      max_tool_rounds: z.number().int().min(1).default(6),
    })
    .default({}),

  topics: z.array(z.string().min(1)).min(1).default(DEFAULT_TOPICS),

  search: z
    .object({
      max_results: z.number().int().min(1).default(25),
      max_age_hours: z.number().min(1).default(24),
      timeout_ms: z.number().default(15000),
    })
    .default({}),

  store: z
    .object({
      backend: z.enum(['sheets', 'sqlite']).default('sheets'),
      timeout_ms: z.number().default(15000),
      sheets: z
        .object({
          spreadsheet_id: z.string().default(''),
          sheet_name: z.string().default('Sheet1'),
          url_column: z.string().regex(/^[A-Z]+$/).default('D'),
          credentials_base64: z.string().default(''),
        })
        .default({}),
      sqlite: z
        .object({
          path: z.string().default('~/.ai-news-digest/news.db'),
        })
        .default({}),
    })
    .default({}),

  notify: z
    .object({
      webhook_url: z.string().default(''),
      title: z.string().default('AI News Summary'),
      timeout_ms: z.number().default(10000),
    })
    .default({}),

  dedup: z
    .object({
      normalize_urls: z.boolean().default(false),
    })
    .default({}),

  schedule: z
    .object({
      enabled: z.boolean().default(false),
      run_cron: z.string().default('0 8 * * *'),
      timezone: z.string().default(''),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  raw[key] = created;
  return created;
}

/**
 * Overlay secrets and deployment settings from the environment onto a raw config object.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const apiKey = env['AI_NEWS_DIGEST_LLM_API_KEY'] ?? env['OPENAI_API_KEY'];
  const baseUrl = env['AI_NEWS_DIGEST_LLM_BASE_URL'];
  const model = env['AI_NEWS_DIGEST_LLM_MODEL'];
  if (apiKey || baseUrl || model) {
    const llm = section(raw, 'llm');
    if (apiKey) llm['api_key'] = apiKey;
    if (baseUrl) llm['base_url'] = baseUrl;
    if (model) llm['model'] = model;
  }

  const webhook = env['SLACK_WEBHOOK_URL'];
  if (webhook) section(raw, 'notify')['webhook_url'] = webhook;

  const credentials = env['GOOGLE_CREDENTIALS_BASE64'];
  const sheetId = env['AI_NEWS_DIGEST_SHEET_ID'];
  if (credentials || sheetId) {
    const sheets = section(section(raw, 'store'), 'sheets');
    if (credentials) sheets['credentials_base64'] = credentials;
    if (sheetId) sheets['spreadsheet_id'] = sheetId;
  }

  const port = env['PORT'];
  if (port) section(raw, 'server')['port'] = Number(port);

  return raw;
}

export function parseConfig(raw: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('ai-news-digest', {
    searchPlaces: [
      'ai-news-digest.config.yaml',
      'ai-news-digest.config.yml',
      '.ai-news-digestrc.yaml',
      '.ai-news-digestrc.yml',
    ],
    searchStrategy: 'none',
  });

  const envConfigPath = process.env['AI_NEWS_DIGEST_CONFIG'];
  const defaultConfigPath = path.join(getAppDir(), 'config.yaml');

  let loaded: unknown;

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    loaded = (await explorer.load(resolved))?.config;
  } else {
    const local = await explorer.search();
    if (local) {
      logger.debug({ file: local.filepath }, 'Using local config file');
      loaded = local.config;
    } else if (fs.existsSync(defaultConfigPath)) {
      loaded = (await explorer.load(defaultConfigPath))?.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const rawConfig = isRecord(loaded) ? structuredClone(loaded) : {};
  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}
