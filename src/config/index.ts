import { homedir } from "os";
import { delimiter, join } from "path";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";

export const DEFAULT_ALLOWED_SUBSECTIONS = [
  "Time accounting",
  "Expenses",
  "Mistakes and incidents",
  "Maintenance",
  "Equipment bought",
  "Embarkments and disembarkments",
  "Times and positions",
];

const list = (separator: string) =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(separator)
        .map((item) => item.trim())
        .filter(Boolean)
    );

const ConfigSchema = z.object({
  DIARY_FILES: list(delimiter),
  DIARY_DIR: z.string().min(1).default(join(homedir(), "diary")),
  DIARY_NON_RECONCILED_FILE: z.string().min(1).default("non-reconciled.csv"),
  DIARY_DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Za-z]{3}$/, "must be a three-letter currency code")
    .default("EUR")
    .transform((code) => code.toUpperCase()),
  DIARY_DATE_TOLERANCE_DAYS: z.coerce.number().int().min(0).default(0),
  DIARY_EXPENSE_SECTIONS: list(","),
  DIARY_ALLOWED_SUBSECTIONS: list(","),
});

export interface DiaryConfig {
  /** Diary files read when no --diary option is given. */
  diaryFiles: string[];
  diaryDir: string;
  nonReconciledFile: string;
  defaultCurrency: string;
  dateToleranceDays: number;
  expenseSections: string[];
  allowedSubsections: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DiaryConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const values = parsed.data;
  return {
    diaryFiles: values.DIARY_FILES,
    diaryDir: values.DIARY_DIR,
    nonReconciledFile: values.DIARY_NON_RECONCILED_FILE,
    defaultCurrency: values.DIARY_DEFAULT_CURRENCY,
    dateToleranceDays: values.DIARY_DATE_TOLERANCE_DAYS,
    expenseSections: values.DIARY_EXPENSE_SECTIONS.length ? values.DIARY_EXPENSE_SECTIONS : ["Expenses"],
    allowedSubsections: values.DIARY_ALLOWED_SUBSECTIONS.length
      ? values.DIARY_ALLOWED_SUBSECTIONS
      : DEFAULT_ALLOWED_SUBSECTIONS,
  };
}

// Read on first use so that dotenv has run by then
let configInstance: DiaryConfig | null = null;

export function getConfig(): DiaryConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/** Diary file for a year, e.g. `~/diary/diary-2026.md`. */
export function diaryFileForYear(config: DiaryConfig, year: number): string {
  return join(config.diaryDir, `diary-${year}.md`);
}
