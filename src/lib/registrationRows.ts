import { ParseError } from '../errors';
import {
  REGISTRATION_FIELDS,
  type RegistrationField,
  type RegistrationRecord,
  type RegistrationTable,
  type SheetRow,
} from '../types';
import { createLogger } from './logger';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const logger = createLogger('rows');

type ColumnIndex = Record<RegistrationField, number>;

export function toRegistrationRow(record: RegistrationRecord): SheetRow {
  return [record.timestamp, record.name, record.email, record.category, record.amount ?? ''];
}

export function parseAmountCell(cell: string): number {
  const trimmed = cell.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ParseError(`"${cell}" is not a numeric amount.`);
  }

  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new ParseError(`"${cell}" is out of range.`);
  }

  return value;
}

/**
 * Turns raw worksheet values (header row first) into registration records.
 * Blank rows are skipped; an unreadable amount becomes `null`.
 */
export function parseRegistrationValues(values: string[][]): RegistrationRecord[] {
  if (values.length <= 1) {
    return [];
  }

  const [header, ...rows] = values;
  const columns = resolveColumns(header);

  return rows.filter((row) => !isBlankRow(row)).map((row) => toRecord(row, columns));
}

export function freezeTable(records: RegistrationRecord[]): RegistrationTable {
  return Object.freeze(records.map((record) => Object.freeze(record)));
}

function resolveColumns(header: string[]): ColumnIndex {
  const normalized = header.map((cell) => cell.trim().toLowerCase());

  return REGISTRATION_FIELDS.reduce<ColumnIndex>(
    (columns, field, position) => {
      const index = normalized.indexOf(field);
      columns[field] = index === -1 ? position : index;
      return columns;
    },
    { timestamp: 0, name: 1, email: 2, category: 3, amount: 4 },
  );
}

function toRecord(row: string[], columns: ColumnIndex): RegistrationRecord {
  const cell = (field: RegistrationField) => row[columns[field]] ?? '';

  return {
    timestamp: cell('timestamp'),
    name: cell('name'),
    email: cell('email'),
    category: cell('category'),
    amount: readAmount(cell('amount')),
  };
}

function readAmount(cell: string): number | null {
  try {
    return parseAmountCell(cell);
  } catch (error: unknown) {
    if (error instanceof ParseError) {
      logger.debug(`Excluding amount: ${error.message}`);
      return null;
    }

    throw error;
  }
}

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell.trim().length === 0);
}
