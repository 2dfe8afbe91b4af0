import type { AppConfig } from './config';
import { getSheetsClient } from './services/googleAuth';
import { openSheetTable } from './services/googleSheet';
import { createRegistrationService, type RegistrationService } from './services/registrations';

export function createSheetsRegistrationService(config: AppConfig): RegistrationService {
  return createRegistrationService({
    openTable: async () => {
      const client = await getSheetsClient(config.credential);
      return openSheetTable(client, config.spreadsheetId, config.worksheetName);
    },
    retry: config.retry,
    cacheTtlMs: config.cacheTtlMs,
  });
}
