import { parseArgs } from "util";
import { getConfig } from "../config/index.js";
import type { Money } from "../models/money.js";
import {
  digestExpenses,
  findOrderingProblems,
  findSubsectionTitles,
  selectSubsections,
  toJsonEntries,
} from "../services/digestService.js";
import type { DateRange } from "../types/index.js";
import { type CliDeps, type CliIO, UsageError, consoleIO, loadDiaries, requireDate, runCommand } from "./common.js";

export const DIGEST_USAGE = `Usage: diary-digest [--diary FILE]... [--from DATE] [--to DATE] <command>

Commands:
  expenses [--section TITLE]... [--json]   Expense totals per currency and category
  select-subsection --section TITLE...    Print the named subsections
  export-json                             All days as JSON
  find-all-subsections                    Subsection titles outside the allowed list
  check-order                             Days that are out of order or repeated`;

function moneyLines(bucket: Record<string, Money>): string[] {
  return Object.values(bucket).map((money) => ` * ${money}`);
}

function printExpenses(io: CliIO, digest: ReturnType<typeof digestExpenses>): void {
  io.out("# Unaccounted text under expenses (look through)");
  io.out("");
  for (const line of digest.unaccounted) {
    io.out(`${line.date}: ${line.text}`);
  }
  io.out("");

  io.out("# Expenses by payer");
  io.out("");
  for (const payers of Object.values(digest.byPayer)) {
    for (const [payer, money] of Object.entries(payers)) {
      io.out(` * ${money} - ${payer}`);
    }
  }
  io.out("");

  io.out("# Expenses by category");
  io.out("");
  for (const summary of Object.values(digest.summary)) {
    for (const [category, money] of Object.entries(summary.byCategory)) {
      io.out(` * ${money} - ${category}`);
    }
  }
  io.out("");

  io.out("# Totals");
  io.out("");
  for (const summary of Object.values(digest.summary)) {
    io.out(`Total expenses: ${summary.total} (${summary.count} lines)`);
  }
  const shared = moneyLines(digest.sharedPerHead);
  if (shared.length) {
    io.out("Shared expenses per head:");
    shared.forEach((line) => io.out(line));
  }
  const personal = moneyLines(digest.personal);
  if (personal.length) {
    io.out("My expenses:");
    personal.forEach((line) => io.out(line));
  }
}

export async function runDigest(argv: string[], io: CliIO = consoleIO, deps: CliDeps = {}): Promise<number> {
  return runCommand(io, async () => {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        diary: { type: "string", multiple: true },
        from: { type: "string" },
        to: { type: "string" },
        section: { type: "string", multiple: true },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      io.out(DIGEST_USAGE);
      return 0;
    }
    const [command, ...extra] = positionals;
    if (!command || extra.length) {
      throw new UsageError(command ? `Unexpected arguments: ${extra.join(" ")}` : `Missing command\n${DIGEST_USAGE}`);
    }

    const settings = deps.config ?? getConfig();
    const range: DateRange = { from: requireDate(values.from, "--from"), to: requireDate(values.to, "--to") };
    const files = values.diary?.length ? values.diary : settings.diaryFiles;
    const documents = (await loadDiaries(files, io)).map((diary) => diary.document);

    switch (command) {
      case "expenses": {
        const digest = digestExpenses(documents, {
          ...range,
          sections: values.section?.length ? values.section : settings.expenseSections,
        });
        if (values.json) {
          io.out(JSON.stringify(digest, null, 2));
        } else {
          printExpenses(io, digest);
        }
        return 0;
      }

      case "select-subsection": {
        if (!values.section?.length) throw new UsageError("select-subsection needs at least one --section");
        let chapter: string | undefined;
        let day: string | undefined;
        for (const extract of selectSubsections(documents, values.section, range)) {
          if (extract.chapter && extract.chapter !== chapter) {
            io.out(`# ${extract.chapter}`);
            io.out("");
          }
          chapter = extract.chapter;
          const dayKey = `${extract.fileName}:${extract.line}`;
          if (dayKey !== day) {
            io.out(`## ${extract.heading}`);
            io.out("");
          }
          day = dayKey;
          io.out(`### ${extract.title}`);
          io.out(extract.body);
          io.out("");
        }
        return 0;
      }

      case "export-json":
        io.out(JSON.stringify(toJsonEntries(documents, range), null, 2));
        return 0;

      case "find-all-subsections": {
        const report = findSubsectionTitles(documents, settings.allowedSubsections);
        for (const entry of report.notAllowed) {
          io.out(`Not allowed: ${entry.title} in ${entry.chapter || "(no chapter)"} -> ${entry.heading}`);
        }
        io.out(`Allowed but missing: ${report.missing.join(", ") || "-"}`);
        const unknown = [...new Set(report.notAllowed.map((entry) => entry.title))];
        io.out(`Not allowed but found: ${unknown.join(", ") || "-"}`);
        return 0;
      }

      case "check-order": {
        const problems = findOrderingProblems(documents);
        for (const problem of problems) {
          const what = problem.kind === "duplicate" ? "repeats" : "comes after";
          io.err(`⚠️  ${problem.fileName}:${problem.line} ${problem.heading} ${what} ${problem.previous}`);
        }
        if (!problems.length) io.out("✅ Days are in order");
        return 0;
      }

      default:
        throw new UsageError(`Unknown command "${command}"\n${DIGEST_USAGE}`);
    }
  });
}
