import { google } from 'googleapis';
import { z } from 'zod';
import { AuthError, getErrorMessage } from '../errors';
import { createLogger } from '../lib/logger';
import type { SheetsClient } from '../types';

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

const logger = createLogger('google-auth');

let clientPromise: Promise<SheetsClient> | null = null;

/**
 * Authenticates a service account and confirms the key by requesting one
 * access token. Later tokens are cached and refreshed by the auth library.
 */
export async function authenticate(credential: unknown): Promise<SheetsClient> {
  const parsed = serviceAccountSchema.safeParse(credential);

  if (!parsed.success) {
    throw new AuthError('Service account credential is malformed (client_email and private_key are required).');
  }

  const auth = new google.auth.GoogleAuth({
    credentials: {
      client_email: parsed.data.client_email,
      private_key: parsed.data.private_key,
    },
    scopes: SHEETS_SCOPES,
  });

  const getAccessToken = async (): Promise<string> => {
    const token = await auth.getAccessToken();

    if (!token) {
      throw new AuthError('Google did not issue an access token.');
    }

    return token;
  };

  try {
    await getAccessToken();
  } catch (error: unknown) {
    logger.error(`Failed to authenticate with Google Sheets: ${getErrorMessage(error)}`);
    throw error instanceof AuthError
      ? error
      : new AuthError(`Service account was rejected: ${getErrorMessage(error)}`, { cause: error });
  }

  logger.info(`Authenticated with Google Sheets API as ${parsed.data.client_email}`);

  return { getAccessToken };
}

/** Process-wide client: created on first use, shared afterwards. */
export function getSheetsClient(credential: unknown): Promise<SheetsClient> {
  if (clientPromise) {
    return clientPromise;
  }

  clientPromise = authenticate(credential).catch((error: unknown) => {
    clientPromise = null;
    throw error;
  });

  return clientPromise;
}
