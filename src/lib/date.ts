export function formatShortLocalDateTime(date = new Date()): string {
  return new Intl.DateTimeFormat(undefined, {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
  }).format(date);
}

export function buildLastUpdatedLabel(date = new Date()): string {
  return `Last updated: ${formatShortLocalDateTime(date)}`;
}
