import { readFile, writeFile } from "fs/promises";
import { basename } from "path";
import { getBankAdapter } from "../adapters/index.js";
import type {
  BankFormat,
  DateRange,
  DiaryDocument,
  ExpenseRecord,
  ReconciliationReport,
  StatementImport,
  TransactionRecord,
} from "../types/index.js";
import { isWithinRange } from "../utils/dates.js";
import { parseDiary } from "./diaryParser.js";
import { applyReconciliationMarkers, formatReconciliationMarker, type MarkerEdit } from "./diaryWriter.js";
import { extractExpenses } from "./expenseExtractor.js";
import { type LedgerPlan, NonReconciledStore } from "./nonReconciledStore.js";
import { matchTransactions } from "./reconciliationMatcher.js";

export interface ReconcileOptions extends DateRange {
  statementFiles: string[];
  format: BankFormat;
  diaryFiles: string[];
  ledgerFile: string;
  defaultCurrency?: string;
  toleranceDays?: number;
  expenseSections?: string[];
  dryRun?: boolean;
}

export interface ReconcileSelection {
  expenses: ExpenseRecord[];
  transactions: TransactionRecord[];
  /** Transactions a diary marker already records. */
  alreadyReconciled: TransactionRecord[];
  skipped: { cash: number; reconciled: number; credits: number; duplicates: number };
}

export interface PlannedMarkers {
  fileName: string;
  edits: MarkerEdit[];
}

export interface ReconcileOutcome {
  imports: StatementImport[];
  selection: ReconcileSelection;
  report: ReconciliationReport;
  markers: PlannedMarkers[];
  ledger: LedgerPlan;
  /** Files written; empty on a dry run. */
  modifiedFiles: string[];
}

function markerKey(bank: string, date: string, currency: string, amount: string): string {
  return [bank.toLowerCase(), date, currency, amount].join("|");
}

/**
 * Narrows both sides to what still needs pairing. Markers are collected from
 * every diary line; only unmarked non-cash lines inside the range are paired.
 * Bank credits and transactions that a marker already records are left out.
 */
export function selectForMatching(
  expenses: readonly ExpenseRecord[],
  transactions: readonly TransactionRecord[],
  range: DateRange = {}
): ReconcileSelection {
  const skipped = { cash: 0, reconciled: 0, credits: 0, duplicates: 0 };
  const marked = new Set<string>();
  const open: ExpenseRecord[] = [];

  for (const expense of expenses) {
    const marker = expense.reconciliation;
    if (marker) {
      marked.add(markerKey(marker.bank, marker.date, marker.money.currency, marker.money.abs().toDecimalString()));
      skipped.reconciled += 1;
    } else if (expense.cash) {
      skipped.cash += 1;
    } else if (isWithinRange(expense.date, range.from, range.to)) {
      open.push(expense);
    }
  }

  const seenIds = new Set<string>();
  const pending: TransactionRecord[] = [];
  const alreadyReconciled: TransactionRecord[] = [];
  for (const transaction of transactions) {
    if (!transaction.money.isNegative) {
      skipped.credits += 1;
      continue;
    }
    if (transaction.id) {
      const idKey = `${transaction.source}:${transaction.id}`;
      if (seenIds.has(idKey)) {
        skipped.duplicates += 1;
        continue;
      }
      seenIds.add(idKey);
    }
    const key = markerKey(
      transaction.bank,
      transaction.date,
      transaction.money.currency,
      transaction.money.abs().toDecimalString()
    );
    if (marked.has(key)) {
      alreadyReconciled.push(transaction);
    } else {
      pending.push(transaction);
    }
  }

  return { expenses: open, transactions: pending, alreadyReconciled, skipped };
}

function planMarkers(report: ReconciliationReport): PlannedMarkers[] {
  const byFile = new Map<string, MarkerEdit[]>();
  for (const result of report.results) {
    if (result.state !== "matched") continue;
    const edits = byFile.get(result.expense.fileName) ?? [];
    edits.push({
      line: result.expense.line,
      expected: result.expense.raw,
      marker: formatReconciliationMarker(result.transaction),
    });
    byFile.set(result.expense.fileName, edits);
  }
  return [...byFile].map(([fileName, edits]) => ({ fileName, edits }));
}

/**
 * Imports bank statements, pairs them with diary expenses, marks the paired
 * diary lines and records the rest in the non-reconciled ledger.
 */
export async function reconcileStatement(options: ReconcileOptions): Promise<ReconcileOutcome> {
  const adapter = getBankAdapter(options.format, { defaultCurrency: options.defaultCurrency });
  const imports: StatementImport[] = [];
  for (const file of options.statementFiles) {
    imports.push(await adapter.parse(await readFile(file), basename(file)));
  }

  const texts = new Map<string, string>();
  const documents: DiaryDocument[] = [];
  for (const file of options.diaryFiles) {
    const text = await readFile(file, "utf-8");
    texts.set(file, text);
    documents.push(parseDiary(text, file));
  }

  const expenses = extractExpenses(documents, { sections: options.expenseSections });
  const selection = selectForMatching(
    expenses,
    imports.flatMap((statement) => statement.transactions),
    { from: options.from, to: options.to }
  );
  const toleranceDays = options.toleranceDays ?? 0;
  const report = matchTransactions(selection.expenses, selection.transactions, { toleranceDays });

  const markers = planMarkers(report);
  const store = new NonReconciledStore(options.ledgerFile);
  const openExpenses = report.results.flatMap((result) => (result.state === "diary-only" ? [result.expense] : []));
  const unmatched = report.results.flatMap((result) => (result.state === "bank-only" ? [result.transaction] : []));
  const ledger = store.plan(await store.load(), unmatched, openExpenses, toleranceDays);

  const modifiedFiles: string[] = [];
  if (!options.dryRun) {
    for (const { fileName, edits } of markers) {
      const text = texts.get(fileName) ?? (await readFile(fileName, "utf-8"));
      await writeFile(fileName, applyReconciliationMarkers(text, fileName, edits), "utf-8");
      modifiedFiles.push(fileName);
    }
    await store.save(ledger.rows);
    modifiedFiles.push(options.ledgerFile);
  }

  return { imports, selection, report, markers, ledger, modifiedFiles };
}
