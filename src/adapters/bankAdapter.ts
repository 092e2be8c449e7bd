import { FormatError } from "../errors/index.js";
import type { BankFormat, RowError, StatementImport, TransactionRecord } from "../types/index.js";

export interface BankAdapter {
  readonly format: BankFormat;
  readonly bankName: string;
  parse(input: Buffer, source: string): Promise<StatementImport>;
}

export interface AdapterOptions {
  /** Account currency when the export does not say. */
  defaultCurrency?: string;
}

/**
 * Picks the first header present among the alternatives, or throws a
 * FormatError naming the preferred one.
 */
export function requireColumn(
  headers: string[],
  alternatives: readonly string[],
  context: { format: BankFormat; source: string }
): string {
  const found = optionalColumn(headers, alternatives);
  if (found) return found;

  const [preferred, ...others] = alternatives;
  const hint = others.length ? ` (or ${others.map((name) => `"${name}"`).join(", ")})` : "";
  throw new FormatError(`Missing column "${preferred}"${hint}`, { ...context, field: preferred });
}

export function optionalColumn(headers: string[], alternatives: readonly string[]): string | undefined {
  return alternatives.find((name) => headers.includes(name));
}

/** Collects rows and row-level failures for one statement file. */
export class StatementBuilder {
  private readonly transactions: TransactionRecord[] = [];
  private readonly rowErrors: RowError[] = [];
  private ignored = 0;

  constructor(
    private readonly format: BankFormat,
    private readonly source: string
  ) {}

  add(transaction: TransactionRecord): void {
    this.transactions.push(Object.freeze(transaction));
  }

  fail(row: number | string, message: string): void {
    this.rowErrors.push({ row, message });
  }

  ignore(): void {
    this.ignored += 1;
  }

  build(): StatementImport {
    return {
      format: this.format,
      source: this.source,
      transactions: this.transactions,
      rowErrors: this.rowErrors,
      ignored: this.ignored,
    };
  }
}

export function describeWithArea(description: string, area: string): string {
  if (!area || description.toUpperCase().includes(area.toUpperCase())) return description;
  return description ? `${description} (${area})` : area;
}

export function markAtm(description: string): string {
  return description.startsWith("ATM: ") ? description : `ATM: ${description}`;
}
