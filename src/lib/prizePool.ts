import type { Category, PrizePoolStats, RegistrationTable } from '../types';

export const EMPTY_PRIZE_POOL: Readonly<PrizePoolStats> = Object.freeze({
  totalAmount: 0,
  participantCount: 0,
  menCount: 0,
  womenCount: 0,
});

export function summarizePrizePool(table: RegistrationTable): PrizePoolStats {
  if (table.length === 0) {
    return { ...EMPTY_PRIZE_POOL };
  }

  return {
    totalAmount: table.reduce((total, record) => total + (record.amount ?? 0), 0),
    participantCount: table.length,
    menCount: countCategory(table, 'Men'),
    womenCount: countCategory(table, 'Women'),
  };
}

/** Last `limit` records, newest first. */
export function takeRecent(table: RegistrationTable, limit: number): RegistrationTable {
  const count = Math.floor(limit);

  if (!(count > 0)) {
    return [];
  }

  return table.slice(-count).reverse();
}

function countCategory(table: RegistrationTable, category: Category): number {
  return table.filter((record) => record.category === category).length;
}
