import fs from 'node:fs';
import { z } from 'zod';
import { CredentialError, errorMessage } from '../shared/errors.js';

export const ServiceAccountSchema = z.object({
  type: z.literal('service_account').optional(),
  project_id: z.string().optional(),
  client_email: z.string().email(),
  private_key: z.string().min(1),
  token_uri: z.string().url().optional(),
});

export type ServiceAccount = z.infer<typeof ServiceAccountSchema>;

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

function parseServiceAccountJson(json: string, origin: string): ServiceAccount {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new CredentialError(`Service account credential from ${origin} is not valid JSON`, {
      cause: errorMessage(err),
    });
  }

  const parsed = ServiceAccountSchema.safeParse(data);
  if (!parsed.success) {
    throw new CredentialError(`Service account credential from ${origin} is incomplete`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Decode a base64 service-account credential into memory.
 * Nothing is written to disk; the value lives as long as the caller holds it.
 */
export function decodeServiceAccount(encoded: string): ServiceAccount {
  const compact = encoded.replace(/\s+/g, '');
  if (!compact) {
    throw new CredentialError('GOOGLE_CREDENTIALS_BASE64 is not set');
  }
  if (!BASE64_PATTERN.test(compact)) {
    throw new CredentialError('GOOGLE_CREDENTIALS_BASE64 is not valid base64');
  }
  return parseServiceAccountJson(Buffer.from(compact, 'base64').toString('utf-8'), 'GOOGLE_CREDENTIALS_BASE64');
}

/**
 * Read a service-account JSON key file and return the base64 string to put in
 * GOOGLE_CREDENTIALS_BASE64.
 */
export function encodeServiceAccountFile(filePath: string): string {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new CredentialError(`Cannot read credential file: ${filePath}`, { cause: errorMessage(err) });
  }
  parseServiceAccountJson(content, filePath);
  return Buffer.from(content, 'utf-8').toString('base64');
}
