import { SectionNotFoundError, WriteConflictError } from "../errors/index.js";
import type { Money } from "../models/money.js";
import type { DiaryDocument, IsoDate, Section, TransactionRecord } from "../types/index.js";
import { englishWeekday } from "../utils/dates.js";
import { cloneDocument, findSubsection, listDays } from "./diaryTree.js";

export const WRITE_MODES = ["create", "existing-day", "strict"] as const;
export type WriteMode = (typeof WRITE_MODES)[number];

export type AppendAction = "created-day" | "created-section" | "appended" | "exists";

export interface AppendRequest {
  date: IsoDate;
  section: string;
  /** Omit to only make sure the day and subsection exist. */
  line?: string;
  mode?: WriteMode;
}

export interface AppendResult {
  document: DiaryDocument;
  action: AppendAction;
}

export interface MarkerEdit {
  /** 1-based line in the file. */
  line: number;
  /** Line text at the time the diary was read. */
  expected: string;
  marker: string;
}

export function formatDayHeading(date: IsoDate): string {
  return `## ${englishWeekday(date)} ${date}`;
}

export function formatExpenseLine(entry: { money: Money; category: string; description: string }): string {
  return `* ${entry.money.currency} ${entry.money.toDecimalString()} - ${entry.category} - ${entry.description}`;
}

/** "(reconciled: N26 - 2026-01-21 - BGN:50.00)", with "/EUR:25.57" when settled in another currency. */
export function formatReconciliationMarker(transaction: TransactionRecord): string {
  const charged = `${transaction.money.currency}:${transaction.money.abs().toDecimalString()}`;
  const settled = transaction.settled
    ? `/${transaction.settled.currency}:${transaction.settled.abs().toDecimalString()}`
    : "";
  return `(reconciled: ${transaction.bank} - ${transaction.date} - ${charged}${settled})`;
}

function subsectionTitle(name: string): string {
  const trimmed = name.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
}

function lastDescendant(section: Section): Section {
  const last = section.children[section.children.length - 1];
  return last ? lastDescendant(last) : section;
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

function detachTrailingBlanks(lines: string[]): string[] {
  let start = lines.length;
  while (start > 0 && isBlank(lines[start - 1])) start -= 1;
  return lines.splice(start);
}

/**
 * Makes room for a new header right after `previous` (or after the preamble).
 * Returns the blank lines that belonged after the old content; they move to
 * the end of what gets inserted.
 */
function openGap(document: DiaryDocument, previous: Section | undefined, atEnd: boolean): string[] {
  const lines =
    previous && !(previous.implicit && previous.body.length === 0) ? previous.body : document.preamble;
  if (lines.length === 0) return atEnd ? [] : [""];

  const trailing = detachTrailingBlanks(lines);
  // A file that is empty or only blank starts directly with the new header
  if (lines.length > 0 || lines !== document.preamble) lines.push("");
  if (trailing.length) return trailing;
  return atEnd ? [] : [""];
}

function newSection(level: 2 | 3, title: string, date?: IsoDate): Section {
  return {
    level,
    title,
    date,
    weekday: date ? englishWeekday(date) : undefined,
    line: 0,
    body: [],
    children: [],
  };
}

function appendLine(body: string[], line: string): void {
  let end = body.length;
  while (end > 0 && isBlank(body[end - 1])) end -= 1;
  if (end > 0) {
    body.splice(end, 0, line);
  } else if (body.length > 0) {
    body.splice(1, 0, line);
  } else {
    body.push("", line);
  }
}

function insertDay(document: DiaryDocument, date: IsoDate): { day: Section; atEnd: boolean; previous?: Section } {
  const day = newSection(2, `${englishWeekday(date)} ${date}`, date);

  const later = listDays([document]).find((ref) => ref.day.date > date);
  if (later) {
    const siblings = later.chapter.children;
    const index = siblings.indexOf(later.day);
    const previous = index > 0 ? lastDescendant(siblings[index - 1]) : later.chapter;
    siblings.splice(index, 0, day);
    return { day, atEnd: false, previous };
  }

  let chapter = document.chapters[document.chapters.length - 1];
  if (!chapter) {
    chapter = { level: 1, title: "", implicit: true, line: 0, body: [], children: [] };
    document.chapters.push(chapter);
  }
  const previous = lastDescendant(chapter);
  chapter.children.push(day);
  return { day, atEnd: true, previous };
}

function isLastInFile(document: DiaryDocument, section: Section): boolean {
  const lastChapter = document.chapters[document.chapters.length - 1];
  return lastChapter !== undefined && lastDescendant(lastChapter) === section;
}

/**
 * Adds a line at the end of a day's subsection, creating the day and the
 * subsection as the mode allows. The input document is left untouched.
 */
export function appendEntry(source: DiaryDocument, request: AppendRequest): AppendResult {
  const mode = request.mode ?? "create";
  const document = cloneDocument(source);
  const line = request.line;

  const day = listDays([document]).find((ref) => ref.day.date === request.date)?.day;

  if (!day) {
    if (mode !== "create") throw new SectionNotFoundError(request.date);

    const placed = insertDay(document, request.date);
    const tail = openGap(document, placed.previous, placed.atEnd);
    const subsection = newSection(3, subsectionTitle(request.section));
    placed.day.body = [""];
    subsection.body = line === undefined ? [] : ["", line];
    subsection.body.push(...tail);
    placed.day.children.push(subsection);
    return { document, action: "created-day" };
  }

  let subsection = findSubsection(day, request.section);
  if (!subsection) {
    if (mode === "strict") throw new SectionNotFoundError(request.date, request.section);

    const previous = lastDescendant(day);
    const tail = openGap(document, previous, isLastInFile(document, previous));
    subsection = newSection(3, subsectionTitle(request.section));
    subsection.body = line === undefined ? [] : ["", line];
    subsection.body.push(...tail);
    day.children.push(subsection);
    return { document, action: "created-section" };
  }

  if (line === undefined) {
    return { document, action: "exists" };
  }
  appendLine(subsection.body, line);
  return { document, action: "appended" };
}

/**
 * Appends reconciliation markers to diary lines. Every target line must still
 * read as it did when the expenses were extracted.
 */
export function applyReconciliationMarkers(text: string, fileName: string, edits: MarkerEdit[]): string {
  const lines = text.split("\n");
  for (const edit of edits) {
    const current = lines[edit.line - 1];
    if (current === undefined || current !== edit.expected) {
      throw new WriteConflictError(fileName, edit.line, edit.expected);
    }
    const ending = current.endsWith("\r") ? "\r" : "";
    lines[edit.line - 1] = `${current.trimEnd()} ${edit.marker}${ending}`;
  }
  return lines.join("\n");
}
