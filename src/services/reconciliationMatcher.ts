import type { ExpenseRecord, MatchResult, ReconciliationReport, TransactionRecord } from "../types/index.js";
import { daysBetween } from "../utils/dates.js";

export interface MatchOptions {
  /** Largest accepted distance in calendar days between diary and bank date. */
  toleranceDays?: number;
}

interface Candidate {
  expenseIndex: number;
  transactionIndex: number;
  dayDifference: number;
}

/**
 * The diary records spend as a positive amount, banks as a negative one.
 * A transaction paid in a foreign currency can also be recorded in the
 * diary by what the account was charged.
 */
export function amountsAgree(expense: ExpenseRecord, transaction: TransactionRecord): boolean {
  if (expense.money.equals(transaction.money.negate())) return true;
  return transaction.settled !== undefined && expense.money.equals(transaction.settled.negate());
}

/**
 * Pairs diary expenses with bank transactions, one to one. Closest dates win;
 * ties go to the earlier diary line, then the earlier statement row.
 */
export function matchTransactions(
  expenses: readonly ExpenseRecord[],
  transactions: readonly TransactionRecord[],
  options: MatchOptions = {}
): ReconciliationReport {
  const tolerance = options.toleranceDays ?? 0;
  if (!Number.isInteger(tolerance) || tolerance < 0) {
    throw new RangeError(`Date tolerance must be a non-negative integer, got ${tolerance}`);
  }

  const candidates: Candidate[] = [];
  expenses.forEach((expense, expenseIndex) => {
    transactions.forEach((transaction, transactionIndex) => {
      if (!amountsAgree(expense, transaction)) return;
      const dayDifference = Math.abs(daysBetween(expense.date, transaction.date));
      if (dayDifference <= tolerance) {
        candidates.push({ expenseIndex, transactionIndex, dayDifference });
      }
    });
  });

  candidates.sort(
    (a, b) =>
      a.dayDifference - b.dayDifference ||
      a.expenseIndex - b.expenseIndex ||
      a.transactionIndex - b.transactionIndex
  );

  const pairedExpense = new Map<number, Candidate>();
  const usedTransactions = new Set<number>();
  for (const candidate of candidates) {
    if (pairedExpense.has(candidate.expenseIndex) || usedTransactions.has(candidate.transactionIndex)) continue;
    pairedExpense.set(candidate.expenseIndex, candidate);
    usedTransactions.add(candidate.transactionIndex);
  }

  const results: MatchResult[] = expenses.map((expense, index): MatchResult => {
    const pair = pairedExpense.get(index);
    return pair
      ? {
          state: "matched",
          expense,
          transaction: transactions[pair.transactionIndex],
          dayDifference: pair.dayDifference,
        }
      : { state: "diary-only", expense };
  });
  transactions.forEach((transaction, index) => {
    if (!usedTransactions.has(index)) results.push({ state: "bank-only", transaction });
  });

  return {
    results,
    matched: pairedExpense.size,
    diaryOnly: expenses.length - pairedExpense.size,
    bankOnly: transactions.length - usedTransactions.size,
  };
}
