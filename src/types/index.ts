import type { Money } from "../models/money.js";

/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

export type SectionLevel = 1 | 2 | 3;

export interface Section {
  level: SectionLevel;
  /** Header text without the leading `#`s. Empty for an implicit chapter. */
  title: string;
  /** Chapter created for days that appear before any `#` header. */
  implicit?: boolean;
  date?: IsoDate;
  weekday?: string;
  /** Free text after the date, e.g. "- Oslo - Bergen". */
  location?: string;
  itinerary?: string[];
  /** 1-based line of the header; 0 for an implicit chapter. */
  line: number;
  /** Header line as read from the file; rebuilt from the title when absent. */
  heading?: string;
  /** Raw lines between this header and the next header. */
  body: string[];
  children: Section[];
}

export interface DiaryDocument {
  fileName: string;
  /** Lines before the first header. */
  preamble: string[];
  chapters: Section[];
}

export interface ReconciliationMarker {
  raw: string;
  bank: string;
  date: IsoDate;
  money: Money;
  settled?: Money;
}

export interface ExpenseRecord {
  readonly date: IsoDate;
  readonly money: Money;
  readonly category?: string;
  readonly description: string;
  readonly fileName: string;
  readonly line: number;
  readonly raw: string;
  readonly chapter: string;
  readonly section: string;
  readonly cash: boolean;
  readonly reconciliation?: ReconciliationMarker;
  readonly paidBy?: string;
  readonly shareCount?: number;
}

export const BANK_FORMATS = ["n26", "wise", "banknorwegian", "remember"] as const;
export type BankFormat = (typeof BANK_FORMATS)[number];

export interface TransactionRecord {
  readonly date: IsoDate;
  /** Signed, in the transaction currency. Spend is negative. */
  readonly money: Money;
  /** Signed amount deducted in the account currency, when it differs. */
  readonly settled?: Money;
  readonly description: string;
  readonly source: BankFormat;
  readonly bank: string;
  readonly sourceFile: string;
  /** CSV line number, sheet row, or JSON transaction id. */
  readonly row: number | string;
  readonly id?: string;
  readonly merchantCategory?: string;
}

export interface RowError {
  row: number | string;
  message: string;
}

export interface StatementImport {
  format: BankFormat;
  source: string;
  transactions: TransactionRecord[];
  rowErrors: RowError[];
  /** Rows deliberately left out (pending transfers, fees, interest, duplicates). */
  ignored: number;
}

export type MatchResult =
  | { state: "matched"; expense: ExpenseRecord; transaction: TransactionRecord; dayDifference: number }
  | { state: "diary-only"; expense: ExpenseRecord }
  | { state: "bank-only"; transaction: TransactionRecord };

export type MatchState = MatchResult["state"];

export interface ReconciliationReport {
  results: MatchResult[];
  matched: number;
  diaryOnly: number;
  bankOnly: number;
}

export interface DateRange {
  from?: IsoDate;
  to?: IsoDate;
}
