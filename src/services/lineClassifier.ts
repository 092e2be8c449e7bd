import { Money } from "../models/money.js";
import type { ReconciliationMarker, Section } from "../types/index.js";
import { isIsoDate } from "../utils/dates.js";

export interface ExpenseLine {
  money: Money;
  category?: string;
  description: string;
  cash: boolean;
  reconciliation?: ReconciliationMarker;
  paidBy?: string;
  shareCount?: number;
}

export interface TrackerLine {
  time: string;
  latitude: number;
  longitude: number;
  note?: string;
}

interface LineBase {
  /** 1-based line in the source file, 0 when unknown. */
  line: number;
  text: string;
}

export type ClassifiedLine =
  | (LineBase & { kind: "blank" })
  | (LineBase & { kind: "prose" })
  | (LineBase & { kind: "expense"; expense: ExpenseLine })
  | (LineBase & { kind: "tracker"; tracker: TrackerLine });

export type LineKind = ClassifiedLine["kind"];

// * EUR 7.10 - groceries - Lidl (milk, bread)
const EXPENSE_PATTERN = /^(?:[*-]\s+)?([A-Z]{3})\s+([-+]?\d[\d.,]*)(?:\s+-\s+(.*?))?\s*$/;
// * 08:15 59.9139, 10.7522 - left the harbour
const TRACKER_PATTERN =
  /^(?:[*-]\s+)?([01]?\d|2[0-3]):([0-5]\d)\s+([-+]?\d{1,2}(?:\.\d+)?)\s*,\s*([-+]?\d{1,3}(?:\.\d+)?)(?:\s+(?:-\s+)?(.*?))?\s*$/;
// (reconciled: N26 - 2026-01-21 - BGN:50.00) or (... - NOK:250.00/EUR:23.50)
const RECONCILED_PATTERN =
  /\(reconciled:\s*([\w-]+)\s*-\s*(\d{4}-\d{2}-\d{2})\s*-\s*([A-Z]{3}):(-?\d+(?:\.\d+)?)(?:\/([A-Z]{3}):(-?\d+(?:\.\d+)?))?\)/;
const CASH_PATTERN = /\(cash\)/i;
const PAID_BY_PATTERN = /(?:^|\s-\s)paid by (\S+)/i;
const SHARE_PATTERN = /(?:^|\s-\s)DIV(\d+)\b/;

let knownCurrencies: Set<string> | undefined;

function isCurrencyCode(code: string): boolean {
  knownCurrencies ??= new Set(Intl.supportedValuesOf("currency"));
  return knownCurrencies.has(code);
}

function parseMarker(text: string): ReconciliationMarker | undefined {
  const match = text.match(RECONCILED_PATTERN);
  if (!match || !isIsoDate(match[2])) return undefined;

  const money = Money.parse(match[4], match[3]);
  if (!money) return undefined;
  const settled = match[5] && match[6] ? Money.parse(match[6], match[5]) ?? undefined : undefined;

  return { raw: match[0], bank: match[1], date: match[2], money, settled };
}

export function parseExpenseLine(text: string): ExpenseLine | null {
  const match = text.trim().match(EXPENSE_PATTERN);
  if (!match || !isCurrencyCode(match[1])) return null;

  const money = Money.parse(match[2], match[1]);
  if (!money) return null;

  const rest = match[3] ?? "";
  const reconciliation = parseMarker(rest);
  const cleaned = reconciliation ? rest.replace(reconciliation.raw, "").trim() : rest;

  const separator = cleaned.indexOf(" - ");
  const category = (separator >= 0 ? cleaned.slice(0, separator) : cleaned).trim() || undefined;
  const description = separator >= 0 ? cleaned.slice(separator + 3).trim() : "";

  const share = description.match(SHARE_PATTERN);
  const shareCount = share ? Number(share[1]) : undefined;

  return {
    money,
    category,
    description,
    cash: CASH_PATTERN.test(rest),
    reconciliation,
    paidBy: description.match(PAID_BY_PATTERN)?.[1],
    shareCount: shareCount && shareCount > 0 ? shareCount : undefined,
  };
}

export function parseTrackerLine(text: string): TrackerLine | null {
  const match = text.trim().match(TRACKER_PATTERN);
  if (!match) return null;

  const latitude = Number(match[3]);
  const longitude = Number(match[4]);
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;

  return {
    time: `${match[1].padStart(2, "0")}:${match[2]}`,
    latitude,
    longitude,
    note: match[5] || undefined,
  };
}

/**
 * Never throws: anything that is not a recognised structured line is prose.
 */
export function classifyLine(text: string, line = 0): ClassifiedLine {
  if (!text.trim()) {
    return { kind: "blank", line, text };
  }

  const expense = parseExpenseLine(text);
  if (expense) {
    return { kind: "expense", line, text, expense };
  }

  const tracker = parseTrackerLine(text);
  if (tracker) {
    return { kind: "tracker", line, text, tracker };
  }

  return { kind: "prose", line, text };
}

/** Classifies the body of a day or subsection with file line numbers. */
export function classifyBody(section: Section): ClassifiedLine[] {
  return section.body.map((text, index) => classifyLine(text, section.line + index + 1));
}
