import type { DateRange, DiaryDocument, ExpenseRecord, IsoDate } from "../types/index.js";
import { listDays, titleMatches } from "./diaryTree.js";
import { classifyBody } from "./lineClassifier.js";

export const DEFAULT_EXPENSE_SECTIONS = ["Expenses"];

export interface ExtractOptions extends DateRange {
  /** Subsection titles that hold expense lines (case-insensitive). */
  sections?: string[];
}

export interface UnaccountedLine {
  date: IsoDate;
  heading: string;
  fileName: string;
  line: number;
  text: string;
}

export interface ExpenseBook {
  expenses: ExpenseRecord[];
  /** Prose found inside expense subsections. */
  unaccounted: UnaccountedLine[];
}

export function extractExpenseBook(documents: DiaryDocument[], options: ExtractOptions = {}): ExpenseBook {
  const sections = options.sections?.length ? options.sections : DEFAULT_EXPENSE_SECTIONS;
  const expenses: ExpenseRecord[] = [];
  const unaccounted: UnaccountedLine[] = [];

  for (const { document, chapter, day } of listDays(documents, options)) {
    for (const subsection of day.children) {
      if (!sections.some((wanted) => titleMatches(subsection.title, wanted))) continue;

      for (const classified of classifyBody(subsection)) {
        if (classified.kind === "prose" || classified.kind === "tracker") {
          unaccounted.push({
            date: day.date,
            heading: day.title,
            fileName: document.fileName,
            line: classified.line,
            text: classified.text.trim(),
          });
          continue;
        }
        if (classified.kind !== "expense") continue;

        const { expense } = classified;
        const record: ExpenseRecord = {
          date: day.date,
          money: expense.money,
          category: expense.category,
          description: expense.description,
          fileName: document.fileName,
          line: classified.line,
          raw: classified.text,
          chapter: chapter.title,
          section: subsection.title,
          cash: expense.cash,
          reconciliation: expense.reconciliation,
          paidBy: expense.paidBy,
          shareCount: expense.shareCount,
        };
        expenses.push(Object.freeze(record));
      }
    }
  }

  return { expenses, unaccounted };
}

export function extractExpenses(documents: DiaryDocument[], options: ExtractOptions = {}): ExpenseRecord[] {
  return extractExpenseBook(documents, options).expenses;
}
