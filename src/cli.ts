import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { createSheetsRegistrationService } from './app';
import {
  DEFAULT_DONATION,
  PRIZE_POOL_REFRESH_INTERVAL_SECONDS,
  RECENT_REGISTRATIONS_COUNT,
  loadConfig,
} from './config';
import { getErrorMessage } from './errors';
import { buildLastUpdatedLabel } from './lib/date';
import { renderPrizePool, renderRecentRegistrations, renderRegistrationConfirmation } from './lib/format';
import { setLogLevel } from './lib/logger';
import { validateRegistration } from './lib/validation';
import type { RegistrationService } from './services/registrations';
import type { EventDetails } from './types';

export const REGISTRATION_FAILED_MESSAGE = 'Registration failed. Please try again.';
export const CONNECTIVITY_MESSAGE = 'Unable to load prize pool data. Please check your internet connection.';

const USAGE = [
  'Usage: charity-climb <command> [options]',
  '',
  'Commands:',
  '  register --name <name> --email <email> --category <Men|Women> [--amount <amount>]',
  '  pool [--limit <count>]',
  '  refresh [--limit <count>]',
  '  watch [--limit <count>]',
];

export interface CliContext {
  service: RegistrationService;
  event: EventDetails;
  write: (line: string) => void;
}

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error: unknown) {
    context.write(getErrorMessage(error));
    USAGE.forEach((line) => context.write(line));
    return 1;
  }

  const { positionals, values } = parsed;
  const [command] = positionals;
  const limit = values.limit === undefined ? RECENT_REGISTRATIONS_COUNT : Number(values.limit);

  switch (command) {
    case 'register':
      return register(context, {
        name: values.name ?? '',
        email: values.email ?? '',
        category: values.category ?? '',
        amount: values.amount === undefined ? DEFAULT_DONATION : Number(values.amount),
      });
    case 'pool':
      await printPool(context, limit);
      return 0;
    case 'refresh':
      context.service.refresh();
      await printPool(context, limit);
      return 0;
    case 'watch':
      watchPool(context, limit);
      return 0;
    default:
      USAGE.forEach((line) => context.write(line));
      return command === undefined ? 0 : 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      name: { type: 'string' },
      email: { type: 'string' },
      category: { type: 'string' },
      amount: { type: 'string' },
      limit: { type: 'string' },
    },
  });
}

async function register(
  context: CliContext,
  form: { name: string; email: string; category: string; amount: number },
): Promise<number> {
  const result = validateRegistration(form);

  if (!result.ok) {
    result.errors.forEach((error) => context.write(error));
    return 1;
  }

  const saved = await context.service.appendRegistration(result.registration);

  if (!saved) {
    context.write(REGISTRATION_FAILED_MESSAGE);
    return 1;
  }

  renderRegistrationConfirmation(result.registration.amount, context.event).forEach((line) => context.write(line));
  return 0;
}

async function printPool(context: CliContext, limit: number): Promise<void> {
  const stats = await context.service.getPrizePoolStats();
  const recent = await context.service.getRecentRegistrations(limit);

  context.write(context.event.title);
  renderPrizePool(stats).forEach((line) => context.write(line));
  context.write('');
  context.write('Recent registrations:');
  renderRecentRegistrations(recent).forEach((line) => context.write(line));
  context.write(buildLastUpdatedLabel());
}

function watchPool(context: CliContext, limit: number): void {
  const tick = () => {
    printPool(context, limit).catch((error: unknown) => {
      context.write(`${CONNECTIVITY_MESSAGE} (${getErrorMessage(error)})`);
    });
  };

  tick();
  setInterval(tick, PRIZE_POOL_REFRESH_INTERVAL_SECONDS * 1000);
}

export function reportFatalError(error: unknown, write: (line: string) => void): void {
  write(CONNECTIVITY_MESSAGE);
  write(`Error: ${getErrorMessage(error)}`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  process.exitCode = await runCli(process.argv.slice(2), {
    service: createSheetsRegistrationService(config),
    event: config.event,
    write: (line) => console.log(line),
  });
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((error: unknown) => {
    reportFatalError(error, (line) => console.error(line));
    process.exitCode = 1;
  });
}
