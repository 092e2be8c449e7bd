import { readFile, writeFile } from "fs/promises";
import { parseArgs } from "util";
import { diaryFileForYear, getConfig } from "../config/index.js";
import { Money } from "../models/money.js";
import { parseDiary } from "../services/diaryParser.js";
import { serializeDiary } from "../services/diarySerializer.js";
import { type AppendAction, WRITE_MODES, type WriteMode, appendEntry, formatExpenseLine } from "../services/diaryWriter.js";
import { GitService, execGit } from "../services/gitService.js";
import { toIsoDate } from "../utils/dates.js";
import { type CliDeps, type CliIO, UsageError, consoleIO, requireDate, runCommand } from "./common.js";

export const UPDATE_USAGE = `Usage: diary-update [--diary FILE] [--date DATE] [--section TITLE]
                    [--line TEXT | --amount N --description TEXT [--currency CCY] [--type CATEGORY]]
                    [--mode create|existing-day|strict] [--dry-run] [--commit] [--push]`;

const ACTION_TEXT: Record<AppendAction, (date: string, section: string) => string> = {
  "created-day": (date, section) => `Created day ${date} with "${section}"`,
  "created-section": (date, section) => `Created "${section}" under ${date}`,
  appended: (date, section) => `Added to "${section}" under ${date}`,
  exists: (date, section) => `"${section}" already exists under ${date}`,
};

function isWriteMode(value: string): value is WriteMode {
  return WRITE_MODES.some((mode) => mode === value);
}

export async function runUpdate(argv: string[], io: CliIO = consoleIO, deps: CliDeps = {}): Promise<number> {
  return runCommand(io, async () => {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        diary: { type: "string" },
        date: { type: "string", short: "d" },
        section: { type: "string", short: "s" },
        line: { type: "string", short: "l" },
        amount: { type: "string", short: "a" },
        description: { type: "string" },
        currency: { type: "string", short: "c" },
        type: { type: "string", short: "t" },
        mode: { type: "string" },
        "dry-run": { type: "boolean", short: "n", default: false },
        commit: { type: "boolean", default: false },
        push: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      io.out(UPDATE_USAGE);
      return 0;
    }
    if (positionals.length) throw new UsageError(`Unexpected arguments: ${positionals.join(" ")}`);
    const mode = values.mode ?? "create";
    if (!isWriteMode(mode)) {
      throw new UsageError(`Unknown --mode "${mode}" (expected ${WRITE_MODES.join(", ")})`);
    }

    const config = deps.config ?? getConfig();
    const date = requireDate(values.date, "--date") ?? toIsoDate(new Date());
    const section = values.section ?? "expenses";

    let line: string | undefined;
    if (values.line) {
      line = /^[*-]\s/.test(values.line) ? values.line : `* ${values.line}`;
    } else if (values.amount !== undefined && values.description) {
      const money = Money.parse(values.amount, values.currency ?? config.defaultCurrency);
      if (!money) throw new UsageError(`Invalid --amount "${values.amount}"`);
      line = formatExpenseLine({ money, category: values.type ?? "groceries", description: values.description });
    } else if (values.description || values.amount !== undefined) {
      throw new UsageError("--amount and --description go together. Use --line for other entries.");
    }

    const diaryFile = values.diary ?? diaryFileForYear(config, Number(date.slice(0, 4)));
    const original = await readFile(diaryFile, "utf-8");
    const { document, action } = appendEntry(parseDiary(original, diaryFile), {
      date,
      section,
      line,
      mode,
    });
    const updated = serializeDiary(document);

    if (values["dry-run"]) {
      io.out("=== DRY RUN ===");
      io.out(`Would update: ${diaryFile}`);
      io.out(`Action: ${ACTION_TEXT[action](date, section)}`);
      if (line) io.out(`Line: ${line}`);
      if (values.commit || values.push) io.out("Would commit changes");
      if (values.push) io.out("Would push to remote");
      return 0;
    }

    if (updated !== original) {
      await writeFile(diaryFile, updated, "utf-8");
      io.out(`✅ Updated ${diaryFile}`);
    }
    io.out(ACTION_TEXT[action](date, section));
    if (line) io.out(`Added: ${line}`);

    if (values.commit || values.push) {
      const git = deps.git ?? new GitService(execGit, { log: (message) => io.out(message), error: (message) => io.err(message) });
      const outcomes = git.commitFiles([diaryFile], `Add ${date} ${section}`);
      if ([...outcomes.values()].includes("failed")) return 1;
      if (values.push) {
        for (const root of outcomes.keys()) {
          if (!git.push(root)) return 1;
        }
      }
    }
    return 0;
  });
}
