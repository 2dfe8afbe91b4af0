import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSheetsRegistrationService } from '../src/app';
import type { AppConfig } from '../src/config';
import { setLogLevel } from '../src/lib/logger';

vi.mock('googleapis', () => ({
  google: {
    auth: {
      GoogleAuth: vi.fn(function () {
        return { getAccessToken: async () => 'token-123' };
      }),
    },
  },
}));

const config: AppConfig = {
  credential: {
    client_email: 'registrations@test-project.iam.gserviceaccount.com',
    private_key: 'test-private-key',
  },
  spreadsheetId: 'spreadsheet-1',
  worksheetName: 'Sheet1',
  cacheTtlMs: 60_000,
  retry: { maxAttempts: 2, initialDelayMs: 0 },
  event: { title: 'Charity Climb' },
  logLevel: 'silent',
};

function toResponse(payload: unknown, ok = true, status = 200): Response {
  return {
    ok,
    status,
    json: async () => payload,
  } as Response;
}

afterEach(() => {
  vi.unstubAllGlobals();
  setLogLevel('info');
});

describe('createSheetsRegistrationService', () => {
  it('writes through the Sheets API and reads the new row back', async () => {
    setLogLevel('silent');
    const rows: Array<Array<string | number>> = [['timestamp', 'name', 'email', 'category', 'amount']];
    const fetchMock = vi.fn(async (input: Parameters<typeof fetch>[0], init?: Parameters<typeof fetch>[1]) => {
      const url = String(input);

      if (url.includes(':append?')) {
        const body = JSON.parse(String(init?.body)) as { values: Array<Array<string | number>> };
        rows.push(...body.values);
        return toResponse({ updates: { updatedRows: 1 } });
      }

      if (url.includes('/values/')) {
        return toResponse({ values: rows });
      }

      return toResponse({
        spreadsheetId: 'spreadsheet-1',
        sheets: [{ properties: { sheetId: 0, title: 'Sheet1' } }],
      });
    });
    vi.stubGlobal('fetch', fetchMock);

    const service = createSheetsRegistrationService(config);

    await expect(
      service.appendRegistration({ name: 'Ada', email: 'ada@example.com', category: 'Women', amount: 25 }),
    ).resolves.toBe(true);
    await expect(service.getPrizePoolStats()).resolves.toEqual({
      totalAmount: 25,
      participantCount: 1,
      menCount: 0,
      womenCount: 1,
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
