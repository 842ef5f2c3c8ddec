export class NewsDigestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'NewsDigestError';
  }
}

export class ConfigError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class CredentialError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CREDENTIAL_ERROR', details);
    this.name = 'CredentialError';
  }
}

export class DbError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class LlmError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class SearchError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SEARCH_ERROR', details);
    this.name = 'SearchError';
  }
}

export class StoreError extends NewsDigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export class RunInProgressError extends NewsDigestError {
  constructor(runId: string) {
    super(`A run is already in progress (${runId})`, 'RUN_IN_PROGRESS', { run_id: runId });
    this.name = 'RunInProgressError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
