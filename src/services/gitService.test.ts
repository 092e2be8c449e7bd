import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type GitResult, GitService } from "./gitService.js";

const ok = (stdout = ""): GitResult => ({ status: 0, stdout, stderr: "" });
const fail = (stderr: string, status = 1): GitResult => ({ status, stdout: "", stderr });

function fakeGit(responses: Record<string, GitResult>) {
  const calls: Array<{ args: string[]; cwd: string }> = [];
  const messages: string[] = [];
  const git = new GitService(
    (args, cwd) => {
      calls.push({ args, cwd });
      return responses[args[0]] ?? ok();
    },
    {
      log: (message) => messages.push(message),
      error: (message) => messages.push(message),
    }
  );
  return { git, calls, messages };
}

describe("GitService.commit", () => {
  it("stages the files relative to the repository and commits", () => {
    const { git, calls, messages } = fakeGit({ diff: fail("", 1) });

    expect(git.commit("/repo", ["/repo/diary/diary-2026.md"], "Add 2026-01-20 expenses")).toBe("committed");
    expect(calls.map((call) => call.args)).toEqual([
      ["add", "--", "diary/diary-2026.md"],
      ["diff", "--cached", "--quiet"],
      ["commit", "-m", "Add 2026-01-20 expenses"],
    ]);
    expect(calls.every((call) => call.cwd === "/repo")).toBe(true);
    expect(messages).toEqual(["✅ Committed: Add 2026-01-20 expenses"]);
  });

  it("does not commit when nothing is staged", () => {
    const { git, calls } = fakeGit({ diff: ok() });

    expect(git.commit("/repo", ["/repo/diary.md"], "message")).toBe("nothing-to-commit");
    expect(calls).toHaveLength(2);
  });

  it("reports a failed commit", () => {
    const { git, messages } = fakeGit({ diff: fail(""), commit: fail("hook rejected\n") });

    expect(git.commit("/repo", ["/repo/diary.md"], "message")).toBe("failed");
    expect(messages).toEqual(["❌ git commit failed: hook rejected"]);
  });
});

describe("GitService.push", () => {
  it("returns false when the push fails", () => {
    const { git, messages } = fakeGit({ push: fail("no upstream") });

    expect(git.push("/repo")).toBe(false);
    expect(messages).toEqual(["❌ git push failed: no upstream"]);
  });
});

describe("GitService.commitFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "git-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("skips missing files and files outside a repository", async () => {
    const diary = join(dir, "diary.md");
    await writeFile(diary, "# January\n", "utf-8");

    const { git, calls, messages } = fakeGit({ "rev-parse": fail("not a git repository", 128) });
    const outcomes = git.commitFiles([diary, join(dir, "missing.md")], "message");

    expect(outcomes.size).toBe(0);
    expect(calls).toEqual([{ args: ["rev-parse", "--show-toplevel"], cwd: dir }]);
    expect(messages).toEqual([`Not in a git repository, skipping ${diary}`]);
  });

  it("commits each repository once", async () => {
    const diary = join(dir, "diary.md");
    const ledger = join(dir, "ledger.csv");
    await writeFile(diary, "# January\n", "utf-8");
    await writeFile(ledger, "date\n", "utf-8");

    const { git, calls } = fakeGit({ "rev-parse": ok(`${dir}\n`), diff: fail("") });
    const outcomes = git.commitFiles([diary, ledger], "message");

    expect([...outcomes]).toEqual([[dir, "committed"]]);
    expect(calls.filter((call) => call.args[0] === "add")).toEqual([
      { args: ["add", "--", "diary.md", "ledger.csv"], cwd: dir },
    ]);
  });
});
