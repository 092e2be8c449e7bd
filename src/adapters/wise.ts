import { Money } from "../models/money.js";
import type { StatementImport } from "../types/index.js";
import { normalizeBankDate } from "../utils/dates.js";
import { type BankAdapter, StatementBuilder, optionalColumn, requireColumn } from "./bankAdapter.js";
import { readCsvTable } from "./csvRows.js";

const REQUIRED = [
  "Status",
  "Direction",
  "Created on",
  "Source amount (after fees)",
  "Source currency",
  "Target amount (after fees)",
  "Target currency",
  "Target name",
] as const;

const SIGN_BY_DIRECTION: Record<string, 1 | -1> = { OUT: -1, IN: 1 };

/**
 * Wise transaction history CSV. A row moves money from the source side to the
 * target side; what the merchant received is the target amount.
 */
export class WiseAdapter implements BankAdapter {
  readonly format = "wise" as const;
  readonly bankName = "Wise";

  async parse(input: Buffer, source: string): Promise<StatementImport> {
    const { headers, rows } = await readCsvTable(input);
    const context = { format: this.format, source };
    for (const column of REQUIRED) {
      requireColumn(headers, [column], context);
    }
    const finishedColumn = optionalColumn(headers, ["Finished on"]);
    const noteColumn = optionalColumn(headers, ["Note", "Reference"]);
    const idColumn = optionalColumn(headers, ["ID"]);
    const categoryColumn = optionalColumn(headers, ["Category"]);
    const sourceNameColumn = optionalColumn(headers, ["Source name"]);

    const statement = new StatementBuilder(this.format, source);

    for (const { line, values } of rows) {
      const value = (column: string | undefined): string => (column ? values[column]?.trim() ?? "" : "");

      const sign = SIGN_BY_DIRECTION[value("Direction").toUpperCase()];
      // Pending/cancelled rows and NEUTRAL conversions between own balances
      if (value("Status").toUpperCase() !== "COMPLETED" || !sign) {
        statement.ignore();
        continue;
      }

      const rawDate = value(finishedColumn) || value("Created on");
      const date = normalizeBankDate(rawDate);
      if (!date) {
        statement.fail(line, `Unparseable date "${rawDate}"`);
        continue;
      }

      const sourceCurrency = value("Source currency").toUpperCase();
      const targetCurrency = value("Target currency").toUpperCase() || sourceCurrency;
      const sourceAmount = Money.parse(value("Source amount (after fees)"), sourceCurrency);
      const targetAmount = value("Target amount (after fees)")
        ? Money.parse(value("Target amount (after fees)"), targetCurrency)
        : sourceAmount;
      if (!sourceAmount || !targetAmount) {
        statement.fail(line, "Unparseable source or target amount");
        continue;
      }

      const money = sign < 0 ? targetAmount.abs().negate() : targetAmount.abs();
      const debited = sign < 0 ? sourceAmount.abs().negate() : sourceAmount.abs();
      const counterparty = sign < 0 ? value("Target name") : value(sourceNameColumn) || value("Target name");
      const note = value(noteColumn);

      statement.add({
        date,
        money,
        settled: debited.sameCurrency(money) ? undefined : debited,
        description: note ? `${counterparty} (${note})` : counterparty,
        source: this.format,
        bank: this.bankName,
        sourceFile: source,
        row: line,
        id: value(idColumn) || undefined,
        merchantCategory: value(categoryColumn) || undefined,
      });
    }

    return statement.build();
  }
}
