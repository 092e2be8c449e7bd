import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { stringify } from "csv-stringify/sync";
import { isBankFormat } from "../adapters/index.js";
import { readCsvTable } from "../adapters/csvRows.js";
import { Money } from "../models/money.js";
import type { ExpenseRecord, TransactionRecord } from "../types/index.js";
import { isIsoDate } from "../utils/dates.js";
import { matchTransactions } from "./reconciliationMatcher.js";

export const LEDGER_COLUMNS = [
  "date",
  "currency",
  "amount",
  "description",
  "bank",
  "bank_currency",
  "deducted_amount",
  "merchant_category",
  "source_file",
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];
export type LedgerRow = Record<LedgerColumn, string>;

export interface LedgerPlan {
  /** Full ledger content in write order: open rows by date, then commented-out rows. */
  rows: LedgerRow[];
  added: number;
  /** Earlier rows that a diary expense now accounts for. */
  removed: number;
  duplicates: number;
}

export function toLedgerRow(transaction: TransactionRecord): LedgerRow {
  const deducted = transaction.settled ?? transaction.money;
  return {
    date: transaction.date,
    currency: transaction.money.currency,
    amount: transaction.money.abs().toDecimalString(),
    description: transaction.description,
    bank: transaction.bank,
    bank_currency: deducted.currency,
    deducted_amount: deducted.abs().toDecimalString(),
    merchant_category: transaction.merchantCategory ?? "",
    source_file: transaction.sourceFile,
  };
}

function isCommentedOut(row: LedgerRow): boolean {
  return row.date.startsWith("#");
}

/** Same purchase seen in two exports; cash withdrawals may or may not carry the "ATM: " prefix. */
export function ledgerKey(row: LedgerRow): string {
  return JSON.stringify([
    row.date.replace(/^#+/, ""),
    row.currency,
    row.amount,
    row.description.replace(/^ATM: /, ""),
    row.bank,
  ]);
}

/** Reads a ledger row back as a spend transaction, or null when it no longer parses. */
export function ledgerRowToTransaction(row: LedgerRow, index: number): TransactionRecord | null {
  const source = row.bank.toLowerCase();
  const money = Money.parse(row.amount, row.currency);
  const deducted = Money.parse(row.deducted_amount, row.bank_currency || row.currency);
  if (!isIsoDate(row.date) || !isBankFormat(source) || !money || !deducted) return null;

  return {
    date: row.date,
    money: money.abs().negate(),
    settled: deducted.sameCurrency(money) ? undefined : deducted.abs().negate(),
    description: row.description,
    source,
    bank: row.bank,
    sourceFile: row.source_file,
    row: index + 2,
    merchantCategory: row.merchant_category || undefined,
  };
}

/**
 * Bank transactions no diary line accounts for, kept in a CSV file so they can
 * be reviewed by hand. Rows whose date is prefixed with `#` have been looked
 * at and stay in the file as they are.
 */
export class NonReconciledStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<LedgerRow[]> {
    if (!existsSync(this.filePath)) return [];
    const { rows } = await readCsvTable(await readFile(this.filePath));
    return rows.map(({ values }) => {
      const cell = (column: LedgerColumn): string => values[column] ?? "";
      return {
        date: cell("date"),
        currency: cell("currency"),
        amount: cell("amount"),
        description: cell("description"),
        bank: cell("bank"),
        bank_currency: cell("bank_currency"),
        deducted_amount: cell("deducted_amount"),
        merchant_category: cell("merchant_category"),
        source_file: cell("source_file"),
      };
    });
  }

  /**
   * Merges new unmatched transactions into the existing rows. Open rows that
   * one of `openExpenses` now pays for are dropped.
   */
  plan(
    existing: LedgerRow[],
    unmatched: readonly TransactionRecord[],
    openExpenses: readonly ExpenseRecord[],
    toleranceDays: number
  ): LedgerPlan {
    const commented = existing.filter(isCommentedOut);
    const open = existing.filter((row) => !isCommentedOut(row));

    const candidates = open.map((row, index) => ({ row, transaction: ledgerRowToTransaction(row, index) }));
    const parsed = candidates.flatMap(({ transaction }) => (transaction ? [transaction] : []));
    const report = matchTransactions(openExpenses, parsed, { toleranceDays });
    const settled = new Set(
      report.results.flatMap((result) => (result.state === "matched" ? [result.transaction] : []))
    );
    const kept = candidates.filter(({ transaction }) => !transaction || !settled.has(transaction)).map(({ row }) => row);

    const commentedKeys = new Set(commented.map(ledgerKey));
    const seen = new Set(kept.map(ledgerKey));
    const additions: LedgerRow[] = [];
    let duplicates = 0;
    for (const transaction of unmatched) {
      const row = toLedgerRow(transaction);
      const key = ledgerKey(row);
      if (seen.has(key) || commentedKeys.has(key)) {
        duplicates += 1;
        continue;
      }
      seen.add(key);
      additions.push(row);
    }

    const active = [...kept, ...additions]
      .filter((row) => !commentedKeys.has(ledgerKey(row)))
      .sort((a, b) => a.date.localeCompare(b.date));
    const parked = [...commented].sort((a, b) => a.date.replace(/^#+/, "").localeCompare(b.date.replace(/^#+/, "")));

    return {
      rows: [...active, ...parked],
      added: additions.length,
      removed: open.length - kept.length,
      duplicates,
    };
  }

  render(rows: LedgerRow[]): string {
    return stringify(rows, {
      header: true,
      columns: [...LEDGER_COLUMNS],
    });
  }

  async save(rows: LedgerRow[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, this.render(rows), "utf-8");
  }
}
