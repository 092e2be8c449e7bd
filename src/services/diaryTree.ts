import type { DateRange, DiaryDocument, Section } from "../types/index.js";
import { isWithinRange } from "../utils/dates.js";

export interface DayRef {
  document: DiaryDocument;
  chapter: Section;
  day: Section & { date: string };
}

function isDay(section: Section): section is Section & { date: string } {
  return section.level === 2 && typeof section.date === "string";
}

/** Day sections of every document, in file order, limited to the range. */
export function listDays(documents: DiaryDocument[], range: DateRange = {}): DayRef[] {
  const days: DayRef[] = [];
  for (const document of documents) {
    for (const chapter of document.chapters) {
      for (const day of chapter.children) {
        if (isDay(day) && isWithinRange(day.date, range.from, range.to)) {
          days.push({ document, chapter, day });
        }
      }
    }
  }
  return days;
}

export function titleMatches(title: string, wanted: string): boolean {
  return title.trim().toLowerCase() === wanted.trim().toLowerCase();
}

export function findSubsection(day: Section, title: string): Section | undefined {
  return day.children.find((child) => titleMatches(child.title, title));
}

/** Subsection body without leading and trailing blank lines. */
export function bodyText(section: Section): string {
  const lines = [...section.body];
  while (lines.length && !lines[0].trim()) lines.shift();
  while (lines.length && !lines[lines.length - 1].trim()) lines.pop();
  return lines.join("\n");
}

function cloneSection(section: Section): Section {
  return {
    ...section,
    itinerary: section.itinerary ? [...section.itinerary] : undefined,
    body: [...section.body],
    children: section.children.map(cloneSection),
  };
}

export function cloneDocument(document: DiaryDocument): DiaryDocument {
  return {
    fileName: document.fileName,
    preamble: [...document.preamble],
    chapters: document.chapters.map(cloneSection),
  };
}
