import { existsSync } from "fs";
import { basename } from "path";
import { parseArgs } from "util";
import { isBankFormat } from "../adapters/index.js";
import { getConfig } from "../config/index.js";
import { GitService, execGit } from "../services/gitService.js";
import { type ReconcileOutcome, reconcileStatement } from "../services/reconciliationService.js";
import { BANK_FORMATS, type ExpenseRecord, type TransactionRecord } from "../types/index.js";
import { type CliDeps, type CliIO, UsageError, consoleIO, requireDate, runCommand } from "./common.js";

export const RECONCILE_USAGE = `Usage: diary-reconcile <statement>... [--format ${BANK_FORMATS.join("|")}]
                       [--diary FILE]... [--output FILE] [--currency CCY] [--date-tolerance DAYS]
                       [--from DATE] [--to DATE] [--dry-run] [--no-commit] [--verbose]`;

function describeTransaction(transaction: TransactionRecord): string {
  return `${transaction.date} ${transaction.money.abs()} '${transaction.description}'`;
}

function describeExpense(expense: ExpenseRecord): string {
  return `${expense.money} - ${expense.category ?? "uncategorized"} - ${expense.description}`;
}

function printDetails(io: CliIO, outcome: ReconcileOutcome): void {
  const { results } = outcome.report;
  const matched = results.flatMap((result) => (result.state === "matched" ? [result] : []));
  const unmatched = results.flatMap((result) => (result.state === "bank-only" ? [result.transaction] : []));

  if (matched.length) {
    io.out("");
    io.out("--- Matched expenses ---");
    for (const { transaction, expense, dayDifference } of matched) {
      io.out(`  ${describeTransaction(transaction)}`);
      const offset = dayDifference ? ` (${dayDifference} day${dayDifference === 1 ? "" : "s"} apart)` : "";
      io.out(`    -> ${describeExpense(expense)}${offset}`);
    }
  }
  if (unmatched.length) {
    io.out("");
    io.out("--- Unmatched expenses (need manual review) ---");
    for (const transaction of unmatched) {
      io.out(`  ${describeTransaction(transaction)}`);
    }
  }
}

function commitMessage(statements: string[], outcome: ReconcileOutcome): string {
  const details: string[] = [];
  if (outcome.report.matched) details.push(`${outcome.report.matched} matched`);
  if (outcome.ledger.added) details.push(`${outcome.ledger.added} new unmatched`);
  if (outcome.ledger.removed) details.push(`${outcome.ledger.removed} cleaned up`);
  const names = statements.map((file) => basename(file)).join(", ");
  return details.length ? `reconcile-expenses: ${names} (${details.join(", ")})` : `reconcile-expenses: ${names}`;
}

export async function runReconcile(argv: string[], io: CliIO = consoleIO, deps: CliDeps = {}): Promise<number> {
  return runCommand(io, async () => {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        format: { type: "string", short: "f" },
        diary: { type: "string", short: "d", multiple: true },
        output: { type: "string", short: "o" },
        currency: { type: "string" },
        "date-tolerance": { type: "string" },
        from: { type: "string" },
        to: { type: "string" },
        "dry-run": { type: "boolean", short: "n", default: false },
        "no-commit": { type: "boolean", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      io.out(RECONCILE_USAGE);
      return 0;
    }
    if (!positionals.length) throw new UsageError(`No statement file given\n${RECONCILE_USAGE}`);

    const format = values.format ?? "n26";
    if (!isBankFormat(format)) {
      throw new UsageError(`Unknown --format "${format}" (expected ${BANK_FORMATS.join(", ")})`);
    }

    const config = deps.config ?? getConfig();
    let toleranceDays = config.dateToleranceDays;
    if (values["date-tolerance"] !== undefined) {
      toleranceDays = Number(values["date-tolerance"]);
      if (!Number.isInteger(toleranceDays) || toleranceDays < 0) {
        throw new UsageError(`Invalid --date-tolerance "${values["date-tolerance"]}"`);
      }
    }

    const requested = values.diary?.length ? values.diary : config.diaryFiles;
    const diaryFiles = requested.filter((file) => {
      if (existsSync(file)) return true;
      io.err(`⚠️  Diary not found, skipping ${file}`);
      return false;
    });
    if (!diaryFiles.length) throw new UsageError("No diary files to reconcile against (use --diary or DIARY_FILES)");

    const ledgerFile = values.output ?? config.nonReconciledFile;
    const dryRun = values["dry-run"] ?? false;
    const verbose = values.verbose ?? false;
    const outcome = await reconcileStatement({
      statementFiles: positionals,
      format,
      diaryFiles,
      ledgerFile,
      defaultCurrency: values.currency ?? config.defaultCurrency,
      toleranceDays,
      expenseSections: config.expenseSections,
      from: requireDate(values.from, "--from"),
      to: requireDate(values.to, "--to"),
      dryRun,
    });

    for (const statement of outcome.imports) {
      io.out(`📄 ${statement.source}: ${statement.transactions.length} transactions, ${statement.ignored} ignored`);
      for (const problem of statement.rowErrors) {
        io.err(`⚠️  ${statement.source} row ${problem.row}: ${problem.message}`);
      }
    }
    const { selection, report, ledger } = outcome;
    io.out(`Found ${selection.expenses.length} open expenses in ${diaryFiles.length} diary file(s)`);
    if (verbose) {
      io.out(`Skipped ${selection.skipped.cash} cash and ${selection.skipped.reconciled} reconciled diary lines`);
      io.out(`Skipped ${selection.skipped.credits} credits and ${selection.skipped.duplicates} duplicate bank rows`);
    }

    io.out("");
    io.out("=== Results ===");
    if (selection.alreadyReconciled.length) io.out(`Already reconciled: ${selection.alreadyReconciled.length}`);
    io.out(`Matched: ${report.matched}`);
    io.out(`Unmatched: ${report.bankOnly}`);

    if (verbose || dryRun) printDetails(io, outcome);

    io.out("");
    if (dryRun) {
      io.out(`Non-reconciled file (${ledgerFile}):`);
      io.out(`  Would add ${ledger.added} new entries`);
      io.out(`  Would remove ${ledger.removed} entries (now matched)`);
      io.out(`  Would skip ${ledger.duplicates} duplicates`);
      io.out("");
      io.out("(Dry run - no files modified)");
      return 0;
    }

    for (const { fileName, edits } of outcome.markers) {
      io.out(`✅ Marked ${edits.length} entries as reconciled in ${fileName}`);
    }
    io.out(`✅ Updated ${ledgerFile}: ${ledger.added} added, ${ledger.removed} removed, ${ledger.duplicates} duplicates skipped`);

    if (!values["no-commit"]) {
      const git = deps.git ?? new GitService(execGit, { log: (message) => io.out(message), error: (message) => io.err(message) });
      const outcomes = git.commitFiles(outcome.modifiedFiles, commitMessage(positionals, outcome));
      if ([...outcomes.values()].includes("failed")) return 1;
    }
    return 0;
  });
}
