export const CATEGORY_OPTIONS = ['Men', 'Women'] as const;

export const REGISTRATION_FIELDS = ['timestamp', 'name', 'email', 'category', 'amount'] as const;

export type Category = (typeof CATEGORY_OPTIONS)[number];

export type RegistrationField = (typeof REGISTRATION_FIELDS)[number];

export interface RegistrationInput {
  name: string;
  email: string;
  category: Category;
  amount: number;
}

export interface RegistrationRecord {
  timestamp: string;
  name: string;
  email: string;
  // Rows written by hand into the sheet may carry any label.
  category: string;
  amount: number | null;
}

export type RegistrationTable = readonly RegistrationRecord[];

export interface PrizePoolStats {
  totalAmount: number;
  participantCount: number;
  menCount: number;
  womenCount: number;
}

export type SheetCellValue = string | number;

export type SheetRow = SheetCellValue[];

export interface SheetsClient {
  getAccessToken: () => Promise<string>;
}

export interface TableHandle {
  appendRow: (row: SheetRow) => Promise<void>;
  getAllValues: () => Promise<string[][]>;
}

export interface EventDetails {
  title: string;
  date?: string;
  location?: string;
  paymentHandle?: string;
}
