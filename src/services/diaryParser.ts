import { ParseError } from "../errors/index.js";
import type { DiaryDocument, Section } from "../types/index.js";
import { englishWeekday, isIsoDate, weekdayIndex, weekdayOf } from "../utils/dates.js";

const HEADER_PATTERN = /^(#{1,6})(?:[ \t]+(.*?))?\s*$/;
const FENCE_PATTERN = /^\s*(?:```|~~~)/;
// "Monday 2026-01-20 - Oslo - Bergen", weekday optional
const DAY_TITLE_PATTERN = /^(?:(\p{L}+),?\s+)?(\d{4}-\d{2}-\d{2})(?=\s|$)(.*)$/u;
const DATE_TOKEN_PATTERN = /\d{4}-\d{2}-\d{2}/;

interface DayTitle {
  date: string;
  weekday?: string;
  location?: string;
  itinerary?: string[];
}

/**
 * Builds the chapter → day → subsection tree of a diary.
 *
 * Body lines are kept verbatim so that serializing the tree again gives back
 * the same text. Body lines are never validated here; only headers can fail.
 */
export class DiaryParser {
  parse(text: string, fileName = "<diary>"): DiaryDocument {
    const document: DiaryDocument = { fileName, preamble: [], chapters: [] };
    const lines = text.split("\n");

    let chapter: Section | undefined;
    let day: Section | undefined;
    let current: Section | undefined;
    let inFence = false;

    lines.forEach((raw, index) => {
      const line = index + 1;
      const header = inFence ? null : raw.match(HEADER_PATTERN);

      // #### and deeper belong to the body of the enclosing section
      if (!header || header[1].length > 3) {
        if (FENCE_PATTERN.test(raw)) inFence = !inFence;
        (current ? current.body : document.preamble).push(raw);
        return;
      }

      const level = header[1].length;
      const title = (header[2] ?? "").trim();
      const context = { fileName, line, heading: raw.trim() };

      if (level === 1) {
        chapter = { level: 1, title, line, heading: raw, body: [], children: [] };
        document.chapters.push(chapter);
        day = undefined;
        current = chapter;
        return;
      }

      if (level === 2) {
        const parsed = this.parseDayTitle(title, context);
        if (!chapter) {
          chapter = { level: 1, title: "", implicit: true, line: 0, body: [], children: [] };
          document.chapters.push(chapter);
        }
        day = { level: 2, title, line, heading: raw, ...parsed, body: [], children: [] };
        chapter.children.push(day);
        current = day;
        return;
      }

      if (!day) {
        throw new ParseError("Subsection header (###) must be inside a day section (##)", context);
      }
      const subsection: Section = { level: 3, title, line, heading: raw, body: [], children: [] };
      day.children.push(subsection);
      current = subsection;
    });

    return document;
  }

  private parseDayTitle(title: string, context: { fileName: string; line: number; heading: string }): DayTitle {
    const match = title.match(DAY_TITLE_PATTERN);
    if (!match) {
      const message = DATE_TOKEN_PATTERN.test(title)
        ? "Day header must start with '[Weekday] YYYY-MM-DD'"
        : "Day header has no date (expected '## Weekday YYYY-MM-DD ...')";
      throw new ParseError(message, context);
    }

    const [, weekday, date, rest] = match;

    if (!isIsoDate(date)) {
      throw new ParseError(`Invalid date ${date}`, context);
    }

    if (weekday) {
      const index = weekdayIndex(weekday);
      if (index === null) {
        throw new ParseError(`Unknown weekday '${weekday}'`, context);
      }
      if (index !== weekdayOf(date)) {
        throw new ParseError(
          `Weekday mismatch: '${weekday}' is not the correct day for ${date} (should be ${englishWeekday(date)})`,
          context
        );
      }
    }

    const location = rest.trim() || undefined;
    const itinerary = location
      ?.replace(/^-\s*/, "")
      .split(/\s+-\s+/)
      .map((part) => part.trim())
      .filter(Boolean);

    return { date, weekday, location, itinerary };
  }
}

const parser = new DiaryParser();

export function parseDiary(text: string, fileName?: string): DiaryDocument {
  return parser.parse(text, fileName);
}
