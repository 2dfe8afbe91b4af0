import { getErrorMessage } from '../errors';
import { formatCurrency } from '../lib/format';
import { createLogger } from '../lib/logger';
import { EMPTY_PRIZE_POOL, summarizePrizePool, takeRecent } from '../lib/prizePool';
import { freezeTable, parseRegistrationValues, toRegistrationRow } from '../lib/registrationRows';
import { runWithBackoff, type RetryOptions } from '../lib/retry';
import { createTtlCache } from '../lib/ttlCache';
import type {
  PrizePoolStats,
  RegistrationInput,
  RegistrationRecord,
  RegistrationTable,
  TableHandle,
} from '../types';

export const DEFAULT_CACHE_TTL_MS = 60_000;
export const DEFAULT_RECENT_LIMIT = 10;

const EMPTY_TABLE: RegistrationTable = Object.freeze([]);

const logger = createLogger('registrations');

export interface RegistrationServiceOptions {
  /** Resolves the worksheet; called lazily and at most once per success. */
  openTable: () => Promise<TableHandle>;
  retry?: Omit<RetryOptions, 'label'>;
  cacheTtlMs?: number;
  now?: () => Date;
}

export interface RegistrationService {
  /** Appends one row. Resolves `false` instead of throwing when the write fails. */
  appendRegistration: (input: RegistrationInput) => Promise<boolean>;
  /** Cached worksheet snapshot; empty when the sheet cannot be read. */
  getAllRegistrations: () => Promise<RegistrationTable>;
  getPrizePoolStats: () => Promise<PrizePoolStats>;
  getRecentRegistrations: (limit?: number) => Promise<RegistrationTable>;
  invalidateRegistrations: () => void;
  invalidatePrizePoolStats: () => void;
  refresh: () => void;
}

export function createRegistrationService(options: RegistrationServiceOptions): RegistrationService {
  const now = options.now ?? (() => new Date());
  const clock = () => now().getTime();
  const ttlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
  const registrationsCache = createTtlCache<RegistrationTable>(ttlMs, clock);
  const statsCache = createTtlCache<PrizePoolStats>(ttlMs, clock);

  let tablePromise: Promise<TableHandle> | null = null;

  const getTable = (): Promise<TableHandle> => {
    if (tablePromise) {
      return tablePromise;
    }

    tablePromise = runWithBackoff(options.openTable, { ...options.retry, label: 'Open worksheet' }).catch(
      (error: unknown) => {
        tablePromise = null;
        throw error;
      },
    );

    return tablePromise;
  };

  // Returns null when the sheet could not be read, so callers can avoid caching the fallback.
  const readSnapshot = async (): Promise<RegistrationTable | null> => {
    const cached = registrationsCache.get();
    if (cached) {
      return cached;
    }

    try {
      const table = await getTable();
      const values = await runWithBackoff(() => table.getAllValues(), {
        ...options.retry,
        label: 'Fetch registrations',
      });
      const snapshot = freezeTable(parseRegistrationValues(values));

      registrationsCache.set(snapshot);
      logger.info(`Fetched ${snapshot.length} registrations from sheet`);
      return snapshot;
    } catch (error: unknown) {
      logger.error(`Failed to fetch registrations: ${getErrorMessage(error)}`);
      return null;
    }
  };

  const invalidateRegistrations = () => registrationsCache.invalidate();
  const invalidatePrizePoolStats = () => statsCache.invalidate();

  return {
    appendRegistration: async (input) => {
      const record: RegistrationRecord = {
        timestamp: now().toISOString(),
        name: input.name,
        email: input.email,
        category: input.category,
        amount: input.amount,
      };

      try {
        const table = await getTable();
        await runWithBackoff(() => table.appendRow(toRegistrationRow(record)), {
          ...options.retry,
          label: 'Append registration',
        });
      } catch (error: unknown) {
        logger.error(`Failed to append registration: ${getErrorMessage(error)}`);
        return false;
      }

      invalidateRegistrations();
      invalidatePrizePoolStats();
      logger.info(`Registered ${record.name} (${record.category}) - ${formatCurrency(input.amount)}`);
      return true;
    },

    getAllRegistrations: async () => (await readSnapshot()) ?? EMPTY_TABLE,

    getPrizePoolStats: async () => {
      const cached = statsCache.get();
      if (cached) {
        return cached;
      }

      const snapshot = await readSnapshot();
      if (!snapshot) {
        return { ...EMPTY_PRIZE_POOL };
      }

      const stats = Object.freeze(summarizePrizePool(snapshot));
      statsCache.set(stats);
      logger.info(`Prize pool stats: ${formatCurrency(stats.totalAmount)}, ${stats.participantCount} participants`);
      return stats;
    },

    getRecentRegistrations: async (limit = DEFAULT_RECENT_LIMIT) =>
      takeRecent((await readSnapshot()) ?? EMPTY_TABLE, limit),

    invalidateRegistrations,
    invalidatePrizePoolStats,
    refresh: () => {
      invalidateRegistrations();
      invalidatePrizePoolStats();
    },
  };
}
