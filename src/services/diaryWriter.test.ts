import { describe, expect, it } from "vitest";
import { SectionNotFoundError, WriteConflictError } from "../errors/index.js";
import { Money } from "../models/money.js";
import type { TransactionRecord } from "../types/index.js";
import { parseDiary } from "./diaryParser.js";
import { serializeDiary } from "./diarySerializer.js";
import {
  appendEntry,
  applyReconciliationMarkers,
  formatDayHeading,
  formatExpenseLine,
  formatReconciliationMarker,
} from "./diaryWriter.js";

const DIARY = "# January\n\n## Tuesday 2026-01-20\n\n### Expenses\n\n* EUR 5.00 - coffee - Cafe\n";
const LINE = "* EUR 7.10 - groceries - Lidl";

function append(text: string, request: Parameters<typeof appendEntry>[1]) {
  const result = appendEntry(parseDiary(text, "diary.md"), request);
  return { action: result.action, text: serializeDiary(result.document) };
}

function money(amount: string, currency: string): Money {
  const parsed = Money.parse(amount, currency);
  if (!parsed) throw new Error(`bad amount ${amount}`);
  return parsed;
}

describe("formatting", () => {
  it("builds day headings with the English weekday", () => {
    expect(formatDayHeading("2026-01-20")).toBe("## Tuesday 2026-01-20");
  });

  it("builds expense lines", () => {
    expect(formatExpenseLine({ money: money("7.1", "eur"), category: "groceries", description: "Lidl" })).toBe(LINE);
  });

  it("builds reconciliation markers from absolute amounts", () => {
    const tx: TransactionRecord = {
      date: "2026-01-21",
      money: money("-50", "BGN"),
      settled: money("-25.57", "EUR"),
      description: "Happy Bar",
      source: "n26",
      bank: "N26",
      sourceFile: "n26.csv",
      row: 3,
    };
    expect(formatReconciliationMarker(tx)).toBe("(reconciled: N26 - 2026-01-21 - BGN:50.00/EUR:25.57)");
  });
});

describe("appendEntry", () => {
  it("appends after the last line of an existing subsection", () => {
    const result = append(DIARY, { date: "2026-01-20", section: "expenses", line: LINE });

    expect(result.action).toBe("appended");
    expect(result.text).toBe(`# January\n\n## Tuesday 2026-01-20\n\n### Expenses\n\n* EUR 5.00 - coffee - Cafe\n${LINE}\n`);
  });

  it("adds a new day at the end of the last chapter", () => {
    const result = append(DIARY, { date: "2026-01-22", section: "expenses", line: LINE });

    expect(result.action).toBe("created-day");
    expect(result.text).toBe(`${DIARY}\n## Thursday 2026-01-22\n\n### Expenses\n\n${LINE}\n`);
  });

  it("keeps days in date order", () => {
    const result = append(DIARY, { date: "2026-01-19", section: "expenses", line: LINE });

    expect(result.text).toBe(
      `# January\n\n## Monday 2026-01-19\n\n### Expenses\n\n${LINE}\n\n## Tuesday 2026-01-20\n\n### Expenses\n\n* EUR 5.00 - coffee - Cafe\n`
    );
  });

  it("adds a missing subsection under an existing day", () => {
    const result = append(DIARY, { date: "2026-01-20", section: "transport", line: "* EUR 2.00 - transport - Bus" });

    expect(result.action).toBe("created-section");
    expect(result.text).toBe(`${DIARY}\n### Transport\n\n* EUR 2.00 - transport - Bus\n`);
  });

  it("starts an empty file with the day heading", () => {
    const result = append("", { date: "2026-01-20", section: "expenses", line: LINE });
    expect(result.text).toBe(`## Tuesday 2026-01-20\n\n### Expenses\n\n${LINE}\n`);
  });

  it("reports an existing subsection when there is no line", () => {
    expect(append(DIARY, { date: "2026-01-20", section: "Expenses" })).toEqual({ action: "exists", text: DIARY });
  });

  it("leaves the input document unchanged", () => {
    const document = parseDiary(DIARY, "diary.md");
    appendEntry(document, { date: "2026-01-20", section: "expenses", line: LINE });
    expect(serializeDiary(document)).toBe(DIARY);
  });

  it("refuses to create what the mode forbids", () => {
    expect(() => append(DIARY, { date: "2026-01-22", section: "expenses", line: LINE, mode: "existing-day" })).toThrow(
      SectionNotFoundError
    );
    expect(() => append(DIARY, { date: "2026-01-20", section: "transport", line: LINE, mode: "strict" })).toThrow(
      'No "transport" subsection under 2026-01-20 and creating it is not allowed'
    );
    expect(append(DIARY, { date: "2026-01-20", section: "transport", line: LINE, mode: "existing-day" }).action).toBe(
      "created-section"
    );
  });
});

describe("applyReconciliationMarkers", () => {
  const marker = "(reconciled: N26 - 2026-01-20 - EUR:5.00)";

  it("appends the marker to the target line", () => {
    const updated = applyReconciliationMarkers(DIARY, "diary.md", [
      { line: 7, expected: "* EUR 5.00 - coffee - Cafe", marker },
    ]);
    expect(updated.split("\n")[6]).toBe(`* EUR 5.00 - coffee - Cafe ${marker}`);
  });

  it("keeps CRLF line endings", () => {
    const text = "### Expenses\r\n* EUR 5.00 - coffee - Cafe\r\nafter\r\n";
    const updated = applyReconciliationMarkers(text, "diary.md", [
      { line: 2, expected: "* EUR 5.00 - coffee - Cafe\r", marker },
    ]);
    expect(updated).toBe(`### Expenses\r\n* EUR 5.00 - coffee - Cafe ${marker}\r\nafter\r\n`);
  });

  it("fails when the line changed", () => {
    expect(() =>
      applyReconciliationMarkers(DIARY, "diary.md", [{ line: 7, expected: "* EUR 6.00 - coffee - Cafe", marker }])
    ).toThrow(WriteConflictError);
  });
});
