import { Money } from "../models/money.js";
import type { DateRange, DiaryDocument, ExpenseRecord, IsoDate } from "../types/index.js";
import { bodyText, listDays, titleMatches } from "./diaryTree.js";
import { extractExpenseBook, type ExtractOptions, type UnaccountedLine } from "./expenseExtractor.js";

export const UNCATEGORIZED = "uncategorized";

export interface CurrencySummary {
  total: Money;
  count: number;
  byCategory: Record<string, Money>;
}

export type ExpenseSummary = Record<string, CurrencySummary>;

export interface ExpenseDigest {
  summary: ExpenseSummary;
  /** currency → payer → amount paid */
  byPayer: Record<string, Record<string, Money>>;
  /** Own share of expenses marked DIVn. */
  sharedPerHead: Record<string, Money>;
  /** Own share of everything: full amounts, DIVn lines divided. */
  personal: Record<string, Money>;
  unaccounted: UnaccountedLine[];
}

export interface SubsectionExtract {
  date: IsoDate;
  weekday?: string;
  chapter: string;
  heading: string;
  title: string;
  fileName: string;
  /** Line of the day header. */
  line: number;
  body: string;
}

// Keys are free diary text ("constructor", "__proto__"), so only own properties count
function addTo(bucket: Record<string, Money>, key: string, money: Money): void {
  const current = Object.hasOwn(bucket, key) ? bucket[key] : undefined;
  Object.defineProperty(bucket, key, {
    value: current ? current.plus(money) : money,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function summarizeRecords(expenses: ExpenseRecord[]): ExpenseSummary {
  const summary: ExpenseSummary = {};
  for (const expense of expenses) {
    const { currency } = expense.money;
    const entry = (summary[currency] ??= { total: Money.zero(currency), count: 0, byCategory: {} });
    entry.total = entry.total.plus(expense.money);
    entry.count += 1;
    addTo(entry.byCategory, expense.category ?? UNCATEGORIZED, expense.money);
  }
  return summary;
}

/**
 * Per-currency totals of expense lines, with per-category sub-totals.
 * An empty range or a diary without expenses gives `{}`.
 */
export function summarize(documents: DiaryDocument[], options: ExtractOptions = {}): ExpenseSummary {
  return summarizeRecords(extractExpenseBook(documents, options).expenses);
}

export function digestExpenses(documents: DiaryDocument[], options: ExtractOptions = {}): ExpenseDigest {
  const { expenses, unaccounted } = extractExpenseBook(documents, options);
  const byPayer: Record<string, Record<string, Money>> = {};
  const sharedPerHead: Record<string, Money> = {};
  const personal: Record<string, Money> = {};

  for (const expense of expenses) {
    const { currency } = expense.money;
    if (expense.paidBy) {
      addTo((byPayer[currency] ??= {}), expense.paidBy, expense.money);
    }

    let own = expense.money;
    if (expense.shareCount) {
      own = expense.money.divide(expense.shareCount);
      addTo(sharedPerHead, currency, own);
    }
    addTo(personal, currency, own);
  }

  return { summary: summarizeRecords(expenses), byPayer, sharedPerHead, personal, unaccounted };
}

/** Bodies of every subsection with the given title, in diary order. */
export function selectSubsection(
  documents: DiaryDocument[],
  title: string,
  range: DateRange = {}
): SubsectionExtract[] {
  return selectSubsections(documents, [title], range);
}

/**
 * Same for several titles: day by day, and within a day in the order the
 * titles are given.
 */
export function selectSubsections(
  documents: DiaryDocument[],
  titles: string[],
  range: DateRange = {}
): SubsectionExtract[] {
  const extracts: SubsectionExtract[] = [];
  for (const { document, chapter, day } of listDays(documents, range)) {
    const wanted = titles.flatMap((title) => day.children.filter((child) => titleMatches(child.title, title)));
    for (const subsection of wanted) {
      extracts.push({
        date: day.date,
        weekday: day.weekday,
        chapter: chapter.title,
        heading: day.title,
        title: subsection.title,
        fileName: document.fileName,
        line: day.line,
        body: bodyText(subsection),
      });
    }
  }
  return extracts;
}

export interface SubsectionTitleReport {
  notAllowed: Array<{ title: string; chapter: string; heading: string }>;
  /** Allowed titles never used. */
  missing: string[];
  found: string[];
}

export function findSubsectionTitles(documents: DiaryDocument[], allowed: string[]): SubsectionTitleReport {
  const found = new Set<string>();
  const notAllowed: SubsectionTitleReport["notAllowed"] = [];

  for (const { chapter, day } of listDays(documents)) {
    for (const subsection of day.children) {
      found.add(subsection.title);
      if (!allowed.some((title) => titleMatches(title, subsection.title))) {
        notAllowed.push({ title: subsection.title, chapter: chapter.title, heading: day.title });
      }
    }
  }

  const foundList = [...found];
  return {
    notAllowed,
    missing: allowed.filter((title) => !foundList.some((used) => titleMatches(used, title))),
    found: foundList,
  };
}

export interface OrderingProblem {
  kind: "out-of-order" | "duplicate";
  fileName: string;
  line: number;
  heading: string;
  previous: string;
}

/**
 * Days are allowed out of order, so these are warnings for the lint command.
 */
export function findOrderingProblems(documents: DiaryDocument[]): OrderingProblem[] {
  const problems: OrderingProblem[] = [];
  for (const document of documents) {
    let previous: { date: IsoDate; heading: string } | undefined;
    for (const { day } of listDays([document])) {
      if (previous && day.date <= previous.date) {
        problems.push({
          kind: day.date === previous.date ? "duplicate" : "out-of-order",
          fileName: document.fileName,
          line: day.line,
          heading: day.title,
          previous: previous.heading,
        });
      }
      if (!previous || day.date > previous.date) {
        previous = { date: day.date, heading: day.title };
      }
    }
  }
  return problems;
}

export interface DayEntry {
  chapter: string;
  date: IsoDate;
  weekday?: string;
  location?: string;
  itinerary: string[];
  fileName: string;
  line: number;
  content: string;
  subsections: Record<string, string>;
}

/** Flattened days sorted by date, then file, then position. */
export function toJsonEntries(documents: DiaryDocument[], range: DateRange = {}): DayEntry[] {
  const entries = listDays(documents, range).map(({ document, chapter, day }) => ({
    chapter: chapter.title,
    date: day.date,
    weekday: day.weekday,
    location: day.location,
    itinerary: day.itinerary ?? [],
    fileName: document.fileName,
    line: day.line,
    content: bodyText(day),
    subsections: Object.fromEntries(day.children.map((child) => [child.title, bodyText(child)])),
  }));

  return entries.sort(
    (a, b) => a.date.localeCompare(b.date) || a.fileName.localeCompare(b.fileName) || a.line - b.line
  );
}
