import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

const credential = {
  client_email: 'registrations@test-project.iam.gserviceaccount.com',
  private_key: 'test-private-key',
};

const baseEnv = {
  GOOGLE_SERVICE_ACCOUNT_JSON: JSON.stringify(credential),
  SHEETS_SPREADSHEET_ID: 'spreadsheet-1',
};

function captureConfigError(env: Record<string, string | undefined>): ConfigError {
  try {
    loadConfig(env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }

  throw new Error('Expected loadConfig to fail.');
}

describe('loadConfig', () => {
  it('applies defaults for everything optional', () => {
    expect(loadConfig(baseEnv)).toEqual({
      credential,
      spreadsheetId: 'spreadsheet-1',
      worksheetName: 'Sheet1',
      cacheTtlMs: 60_000,
      retry: {
        maxAttempts: 5,
        initialDelayMs: 1000,
      },
      event: {
        title: 'Charity Climb',
      },
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      SHEETS_WORKSHEET_NAME: 'Spring Comp',
      CACHE_TTL_SECONDS: '30',
      RETRY_MAX_ATTEMPTS: '3',
      RETRY_INITIAL_DELAY_MS: '250',
      EVENT_TITLE: 'Boulder Bash',
      EVENT_DATE: '  May 2, 2026 ',
      EVENT_LOCATION: '',
      PAYMENT_HANDLE: '@climb-fund',
      LOG_LEVEL: 'debug',
    });

    expect(config.worksheetName).toBe('Spring Comp');
    expect(config.cacheTtlMs).toBe(30_000);
    expect(config.retry).toEqual({ maxAttempts: 3, initialDelayMs: 250 });
    expect(config.event).toEqual({
      title: 'Boulder Bash',
      date: 'May 2, 2026',
      location: undefined,
      paymentHandle: '@climb-fund',
    });
    expect(config.logLevel).toBe('debug');
  });

  it('lists every missing required variable', () => {
    const error = captureConfigError({});

    expect(error.issues).toEqual(['GOOGLE_SERVICE_ACCOUNT_JSON: Required', 'SHEETS_SPREADSHEET_ID: Required']);
  });

  it('rejects out-of-range numbers and unknown log levels', () => {
    const error = captureConfigError({ ...baseEnv, RETRY_MAX_ATTEMPTS: '0', LOG_LEVEL: 'verbose' });

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^RETRY_MAX_ATTEMPTS: /);
    expect(error.issues[1]).toMatch(/^LOG_LEVEL: /);
  });

  it('rejects a credential that is not JSON', () => {
    const error = captureConfigError({ ...baseEnv, GOOGLE_SERVICE_ACCOUNT_JSON: '{not json' });

    expect(error.issues).toEqual(['GOOGLE_SERVICE_ACCOUNT_JSON: must be valid JSON']);
    expect(error.message).toBe('Invalid configuration: GOOGLE_SERVICE_ACCOUNT_JSON: must be valid JSON');
  });
});
