import { execFileSync } from "child_process";
import { existsSync, statSync } from "fs";
import { dirname, relative, resolve } from "path";

export interface GitResult {
  status: number;
  stdout: string;
  stderr: string;
}

/** Runs `git <args>` in `cwd`. Swapped out in tests. */
export type GitRunner = (args: string[], cwd: string) => GitResult;

export const execGit: GitRunner = (args, cwd) => {
  try {
    const stdout = execFileSync("git", args, { cwd, encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] });
    return { status: 0, stdout, stderr: "" };
  } catch (error) {
    if (error instanceof Error && "status" in error && typeof error.status === "number") {
      const output = (key: string): string => {
        const value: unknown = Reflect.get(error, key);
        return typeof value === "string" ? value : "";
      };
      return { status: error.status, stdout: output("stdout"), stderr: output("stderr") };
    }
    throw error;
  }
};

export type CommitOutcome = "committed" | "nothing-to-commit" | "failed";

export interface GitLogger {
  log(message: string): void;
  error(message: string): void;
}

export class GitService {
  constructor(
    private readonly run: GitRunner = execGit,
    private readonly logger: GitLogger = console
  ) {}

  findRoot(filePath: string): string | null {
    const cwd = existsSync(filePath) && statSync(filePath).isDirectory() ? filePath : dirname(filePath);
    const result = this.run(["rev-parse", "--show-toplevel"], cwd);
    return result.status === 0 ? result.stdout.trim() : null;
  }

  commit(repoRoot: string, files: string[], message: string): CommitOutcome {
    const paths = files.map((file) => relative(repoRoot, resolve(file)));

    const added = this.run(["add", "--", ...paths], repoRoot);
    if (added.status !== 0) {
      this.logger.error(`❌ git add failed: ${added.stderr.trim()}`);
      return "failed";
    }

    if (this.run(["diff", "--cached", "--quiet"], repoRoot).status === 0) {
      this.logger.log("Nothing to commit");
      return "nothing-to-commit";
    }

    const committed = this.run(["commit", "-m", message], repoRoot);
    if (committed.status !== 0) {
      this.logger.error(`❌ git commit failed: ${committed.stderr.trim()}`);
      return "failed";
    }
    this.logger.log(`✅ Committed: ${message}`);
    return "committed";
  }

  push(repoRoot: string): boolean {
    const pushed = this.run(["push"], repoRoot);
    if (pushed.status !== 0) {
      this.logger.error(`❌ git push failed: ${pushed.stderr.trim()}`);
      return false;
    }
    this.logger.log("✅ Pushed to remote");
    return true;
  }

  /**
   * Commits each file in the repository that holds it. Files outside any
   * repository are skipped.
   */
  commitFiles(files: string[], message: string): Map<string, CommitOutcome> {
    const byRoot = new Map<string, string[]>();
    for (const file of files) {
      if (!existsSync(file)) continue;
      const root = this.findRoot(file);
      if (!root) {
        this.logger.log(`Not in a git repository, skipping ${file}`);
        continue;
      }
      byRoot.set(root, [...(byRoot.get(root) ?? []), file]);
    }

    const outcomes = new Map<string, CommitOutcome>();
    for (const [root, rootFiles] of byRoot) {
      outcomes.set(root, this.commit(root, rootFiles, message));
    }
    return outcomes;
  }
}
