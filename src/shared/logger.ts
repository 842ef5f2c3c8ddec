import pino from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const isTest = nodeEnv === 'test' || process.env['VITEST'] !== undefined;

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : 'info'),
  transport:
    nodeEnv !== 'production' && !isTest
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: [
      'api_key',
      'apiKey',
      'private_key',
      'webhook_url',
      'credentials_base64',
      '*.api_key',
      '*.private_key',
      '*.webhook_url',
      '*.credentials_base64',
    ],
    censor: '***REDACTED***',
  },
});
