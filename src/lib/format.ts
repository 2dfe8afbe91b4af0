import type { EventDetails, PrizePoolStats, RegistrationTable } from '../types';

export const NO_REGISTRATIONS_MESSAGE = 'No registrations yet. Be the first to register!';

export function formatNumberWithCommas(value: number, decimals?: number): string {
  const opts: Intl.NumberFormatOptions = {
    useGrouping: true,
    maximumFractionDigits: 20,
  };
  if (decimals !== undefined) {
    opts.minimumFractionDigits = decimals;
    opts.maximumFractionDigits = decimals;
  }
  return new Intl.NumberFormat('en-US', opts).format(value);
}

export function formatCurrency(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}$${formatNumberWithCommas(Math.abs(value), 2)}`;
}

export function renderPrizePool(stats: PrizePoolStats): string[] {
  return [
    `Pledged prize pool: ${formatCurrency(stats.totalAmount)}`,
    `Participants: ${stats.participantCount} | Men: ${stats.menCount} | Women: ${stats.womenCount}`,
  ];
}

// Public list: no emails, no pledge amounts.
export function renderRecentRegistrations(table: RegistrationTable): string[] {
  if (table.length === 0) {
    return [NO_REGISTRATIONS_MESSAGE];
  }

  return table.map((record) => `- ${record.name} joined! (${record.category})`);
}

export function renderRegistrationConfirmation(amount: number, event: EventDetails): string[] {
  const lines = [`You're registered for ${event.title}!`];

  if (event.paymentHandle) {
    lines.push(`Now complete your ${formatCurrency(amount)} donation via ${event.paymentHandle}.`);
  } else {
    lines.push(`Now complete your ${formatCurrency(amount)} donation.`);
  }

  if (event.date) {
    lines.push(`Date: ${event.date}`);
  }

  if (event.location) {
    lines.push(`Location: ${event.location}`);
  }

  return lines;
}
