import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config/index.js";
import { type GitResult, GitService } from "../services/gitService.js";
import type { CliIO } from "./common.js";
import { runReconcile } from "./reconcile.js";

const DIARY = [
  "# January",
  "",
  "## Tuesday 2026-01-20",
  "",
  "### Expenses",
  "",
  "* EUR 7.10 - groceries - Lidl",
  "* EUR 12.00 - dinner - Pizza (reconciled: N26 - 2026-01-19 - EUR:12.00)",
  "",
  "## Wednesday 2026-01-21",
  "",
  "### Expenses",
  "",
  "* BGN 50.00 - bar - Happy Bar",
  "* EUR 4.00 - snacks - Kiosk",
  "",
].join("\n");

const STATEMENT = [
  "Date,Payee,Amount (EUR),Original Amount,Original Currency",
  "2026-01-20,Lidl,-7.10,,",
  "2026-01-22,Happy Bar,-25.57,-50.00,BGN",
  "2026-01-19,Pizza,-12.00,,",
  "2026-01-23,Bookshop,-15.00,,",
  "",
].join("\n");

function recorder() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (message) => out.push(message),
    err: (message) => err.push(message),
    readStdin: async () => "",
  };
  return { io, out, err };
}

describe("diary-reconcile", () => {
  let dir: string;
  let diaryFile: string;
  let statementFile: string;
  let ledgerFile: string;
  let gitCalls: string[][];
  let git: GitService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "reconcile-cli-"));
    diaryFile = join(dir, "diary-2026.md");
    statementFile = join(dir, "n26-january.csv");
    ledgerFile = join(dir, "non-reconciled.csv");
    await writeFile(diaryFile, DIARY, "utf-8");
    await writeFile(statementFile, STATEMENT, "utf-8");

    gitCalls = [];
    git = new GitService(
      (args): GitResult => {
        gitCalls.push(args);
        if (args[0] === "rev-parse") return { status: 0, stdout: `${dir}\n`, stderr: "" };
        return { status: args[0] === "diff" ? 1 : 0, stdout: "", stderr: "" };
      },
      { log: () => undefined, error: () => undefined }
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const config = () => loadConfig({ DIARY_FILES: diaryFile, DIARY_NON_RECONCILED_FILE: ledgerFile });

  it("reports what it would do on a dry run", async () => {
    const { io, out } = recorder();

    const status = await runReconcile([statementFile, "--date-tolerance", "1", "--dry-run"], io, { config: config(), git });

    expect(status).toBe(0);
    expect(out).toEqual([
      "📄 n26-january.csv: 4 transactions, 0 ignored",
      "Found 3 open expenses in 1 diary file(s)",
      "",
      "=== Results ===",
      "Already reconciled: 1",
      "Matched: 2",
      "Unmatched: 1",
      "",
      "--- Matched expenses ---",
      "  2026-01-20 EUR 7.10 'Lidl'",
      "    -> EUR 7.10 - groceries - Lidl",
      "  2026-01-22 BGN 50.00 'Happy Bar'",
      "    -> BGN 50.00 - bar - Happy Bar (1 day apart)",
      "",
      "--- Unmatched expenses (need manual review) ---",
      "  2026-01-23 EUR 15.00 'Bookshop'",
      "",
      `Non-reconciled file (${ledgerFile}):`,
      "  Would add 1 new entries",
      "  Would remove 0 entries (now matched)",
      "  Would skip 0 duplicates",
      "",
      "(Dry run - no files modified)",
    ]);
    expect(await readFile(diaryFile, "utf-8")).toBe(DIARY);
    expect(existsSync(ledgerFile)).toBe(false);
    expect(gitCalls).toEqual([]);
  });

  it("uses exact dates without a tolerance", async () => {
    const { io, out } = recorder();

    await runReconcile([statementFile, "--dry-run"], io, { config: config(), git });
    expect(out).toContain("Matched: 1");
    expect(out).toContain("Unmatched: 2");
  });

  it("marks the diary, writes the ledger and commits", async () => {
    const { io, out } = recorder();

    const status = await runReconcile([statementFile, "--date-tolerance", "1"], io, { config: config(), git });

    expect(status).toBe(0);
    expect(out.slice(-2)).toEqual([
      `✅ Marked 2 entries as reconciled in ${diaryFile}`,
      `✅ Updated ${ledgerFile}: 1 added, 0 removed, 0 duplicates skipped`,
    ]);
    expect((await readFile(diaryFile, "utf-8")).split("\n")[13]).toBe(
      "* BGN 50.00 - bar - Happy Bar (reconciled: N26 - 2026-01-22 - BGN:50.00/EUR:25.57)"
    );
    expect(gitCalls).toContainEqual(["add", "--", "diary-2026.md", "non-reconciled.csv"]);
    expect(gitCalls).toContainEqual([
      "commit",
      "-m",
      "reconcile-expenses: n26-january.csv (2 matched, 1 new unmatched)",
    ]);
  });

  it("skips the commit with --no-commit", async () => {
    const { io } = recorder();

    await runReconcile([statementFile, "--no-commit"], io, { config: config(), git });
    expect(gitCalls).toEqual([]);
    expect(existsSync(ledgerFile)).toBe(true);
  });

  it("rejects unknown formats", async () => {
    const { io, err } = recorder();

    expect(await runReconcile([statementFile, "--format", "ing"], io, { config: config(), git })).toBe(1);
    expect(err).toEqual(['❌ Unknown --format "ing" (expected n26, wise, banknorwegian, remember)']);
  });

  it("needs at least one diary that exists", async () => {
    const { io, err } = recorder();
    const missing = join(dir, "diary-2025.md");

    expect(await runReconcile([statementFile, "--diary", missing], io, { config: config(), git })).toBe(1);
    expect(err).toEqual([
      `⚠️  Diary not found, skipping ${missing}`,
      "❌ No diary files to reconcile against (use --diary or DIARY_FILES)",
    ]);
  });
});
