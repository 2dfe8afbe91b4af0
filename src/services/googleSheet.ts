import { z } from 'zod';
import {
  AuthError,
  NotFoundError,
  RemoteStoreError,
  TransientRemoteError,
  getErrorMessage,
} from '../errors';
import type { SheetRow, SheetsClient, TableHandle } from '../types';

const SHEETS_API_BASE = 'https://sheets.googleapis.com/v4/spreadsheets';

const spreadsheetMetadataSchema = z.object({
  spreadsheetId: z.string(),
  sheets: z.array(
    z.object({
      properties: z.object({
        sheetId: z.number(),
        title: z.string(),
      }),
    }),
  ),
});

const valueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).optional(),
});

const appendResponseSchema = z.object({
  updates: z
    .object({
      updatedRows: z.number().optional(),
    })
    .optional(),
});

const googleApiErrorSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
    })
    .optional(),
});

type SpreadsheetMetadata = z.infer<typeof spreadsheetMetadataSchema>;

interface ApiRequestInit extends Omit<RequestInit, 'headers'> {
  headers?: Record<string, string>;
}

export async function openSheetTable(
  client: SheetsClient,
  spreadsheetId: string,
  sheetTitle: string,
): Promise<TableHandle> {
  const metadata = await getSpreadsheetMetadata(client, spreadsheetId);
  const sheet = metadata.sheets.find((entry) => entry.properties.title === sheetTitle);

  if (!sheet) {
    throw new NotFoundError(`Worksheet "${sheetTitle}" was not found in spreadsheet ${spreadsheetId}.`);
  }

  const range = toSheetRange(sheet.properties.title);

  return {
    appendRow: (row) => appendSheetRow(client, spreadsheetId, range, row),
    getAllValues: () => getSheetValues(client, spreadsheetId, range),
  };
}

/** A1 range covering a whole worksheet, quoted so titles with spaces resolve. */
export function toSheetRange(sheetTitle: string): string {
  return `'${sheetTitle.replace(/'/g, "''")}'`;
}

async function getSpreadsheetMetadata(client: SheetsClient, spreadsheetId: string): Promise<SpreadsheetMetadata> {
  const params = new URLSearchParams({
    fields: 'spreadsheetId,sheets.properties(sheetId,title)',
  });

  return googleApiFetch(
    `${SHEETS_API_BASE}/${encodeURIComponent(spreadsheetId)}?${params.toString()}`,
    client,
    spreadsheetMetadataSchema,
  );
}

async function appendSheetRow(client: SheetsClient, spreadsheetId: string, range: string, row: SheetRow): Promise<void> {
  const params = new URLSearchParams({
    valueInputOption: 'RAW',
    insertDataOption: 'INSERT_ROWS',
  });

  await googleApiFetch(
    `${SHEETS_API_BASE}/${encodeURIComponent(spreadsheetId)}/values/${encodeURIComponent(range)}:append?${params.toString()}`,
    client,
    appendResponseSchema,
    {
      method: 'POST',
      body: JSON.stringify({
        majorDimension: 'ROWS',
        values: [row],
      }),
    },
  );
}

async function getSheetValues(client: SheetsClient, spreadsheetId: string, range: string): Promise<string[][]> {
  const params = new URLSearchParams({
    majorDimension: 'ROWS',
    valueRenderOption: 'FORMATTED_VALUE',
  });

  const response = await googleApiFetch(
    `${SHEETS_API_BASE}/${encodeURIComponent(spreadsheetId)}/values/${encodeURIComponent(range)}?${params.toString()}`,
    client,
    valueRangeSchema,
  );

  return (response.values ?? []).map((row) => row.map((cell) => String(cell)));
}

async function googleApiFetch<T>(
  url: string,
  client: SheetsClient,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: ApiRequestInit = {},
): Promise<T> {
  const accessToken = await client.getAccessToken();

  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
        ...init.headers,
      },
    });
  } catch (error: unknown) {
    throw new TransientRemoteError(`Google API request could not be sent: ${getErrorMessage(error)}`, null, {
      cause: error,
    });
  }

  if (!response.ok) {
    const errorPayload = googleApiErrorSchema.safeParse(await response.json().catch(() => null));
    const message =
      (errorPayload.success ? errorPayload.data.error?.message : undefined) ??
      `Google API request failed (${response.status}).`;
    throw toRemoteError(response.status, message);
  }

  const parsed = schema.safeParse(await response.json());

  if (!parsed.success) {
    throw new RemoteStoreError(`Unexpected Google API response (${response.status}).`, response.status);
  }

  return parsed.data;
}

function toRemoteError(status: number, message: string): Error {
  if (status === 401 || status === 403) {
    return new AuthError(message);
  }

  if (status === 404) {
    return new NotFoundError(message);
  }

  if (status === 429 || status >= 500) {
    return new TransientRemoteError(message, status);
  }

  return new RemoteStoreError(message, status);
}
