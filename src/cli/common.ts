import { readFile } from "fs/promises";
import type { DiaryConfig } from "../config/index.js";
import { DiaryError } from "../errors/index.js";
import type { GitService } from "../services/gitService.js";
import { parseDiary } from "../services/diaryParser.js";
import type { DiaryDocument } from "../types/index.js";
import { isIsoDate } from "../utils/dates.js";

/** Where a command prints. Tests pass a recorder instead of the console. */
export interface CliIO {
  out(message: string): void;
  err(message: string): void;
  readStdin(): Promise<string>;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Collaborators a command would otherwise build from the environment. */
export interface CliDeps {
  config?: DiaryConfig;
  git?: GitService;
}

export const consoleIO: CliIO = {
  out: (message) => console.log(message),
  err: (message) => console.error(message),
  readStdin: readProcessStdin,
};

export class UsageError extends DiaryError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function requireDate(value: string | undefined, option: string): string | undefined {
  if (value === undefined) return undefined;
  if (!isIsoDate(value)) {
    throw new UsageError(`Invalid date for ${option}: "${value}" (expected YYYY-MM-DD)`);
  }
  return value;
}

/** Parsed diaries with the text each was read from. */
export interface LoadedDiary {
  fileName: string;
  text: string;
  document: DiaryDocument;
}

export async function loadDiaries(files: string[], io: CliIO): Promise<LoadedDiary[]> {
  if (files.length === 0) {
    const text = await io.readStdin();
    return [{ fileName: "<stdin>", text, document: parseDiary(text, "<stdin>") }];
  }
  const diaries: LoadedDiary[] = [];
  for (const fileName of files) {
    const text = await readFile(fileName, "utf-8");
    diaries.push({ fileName, text, document: parseDiary(text, fileName) });
  }
  return diaries;
}

/**
 * Runs a command body and turns diary errors and bad arguments into exit
 * status 1. Anything else is a bug and propagates.
 */
export async function runCommand(io: CliIO, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof DiaryError) {
      io.err(`❌ ${error.message}`);
      return 1;
    }
    if (error instanceof Error && "code" in error) {
      const code = String(error.code);
      if (code === "ENOENT") {
        io.err(`❌ File not found: ${"path" in error ? String(error.path) : error.message}`);
        return 1;
      }
      if (code.startsWith("ERR_PARSE_ARGS")) {
        io.err(`❌ ${error.message}`);
        return 1;
      }
    }
    throw error;
  }
}
