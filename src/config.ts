import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './lib/logger';
import type { EventDetails } from './types';

export const MINIMUM_DONATION = 20;
export const DEFAULT_DONATION = 20;
export const PRIZE_POOL_REFRESH_INTERVAL_SECONDS = 60;
export const RECENT_REGISTRATIONS_COUNT = 10;

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1),
  SHEETS_SPREADSHEET_ID: z.string().trim().min(1),
  SHEETS_WORKSHEET_NAME: z.string().min(1).default('Sheet1'),
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(60),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  EVENT_TITLE: z.string().trim().min(1).default('Charity Climb'),
  EVENT_DATE: optionalText,
  EVENT_LOCATION: optionalText,
  PAYMENT_HANDLE: optionalText,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  /** Parsed service-account key; checked further when authenticating. */
  credential: unknown;
  spreadsheetId: string;
  worksheetName: string;
  cacheTtlMs: number;
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
  };
  event: EventDetails;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }

  const values = parsed.data;

  return {
    credential: parseCredentialJson(values.GOOGLE_SERVICE_ACCOUNT_JSON),
    spreadsheetId: values.SHEETS_SPREADSHEET_ID,
    worksheetName: values.SHEETS_WORKSHEET_NAME,
    cacheTtlMs: values.CACHE_TTL_SECONDS * 1000,
    retry: {
      maxAttempts: values.RETRY_MAX_ATTEMPTS,
      initialDelayMs: values.RETRY_INITIAL_DELAY_MS,
    },
    event: {
      title: values.EVENT_TITLE,
      date: values.EVENT_DATE,
      location: values.EVENT_LOCATION,
      paymentHandle: values.PAYMENT_HANDLE,
    },
    logLevel: values.LOG_LEVEL,
  };
}

function parseCredentialJson(raw: string): unknown {
  try {
    const credential: unknown = JSON.parse(raw);
    return credential;
  } catch {
    throw new ConfigError(['GOOGLE_SERVICE_ACCOUNT_JSON: must be valid JSON']);
  }
}
