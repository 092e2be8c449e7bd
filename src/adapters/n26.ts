import { Money } from "../models/money.js";
import type { StatementImport } from "../types/index.js";
import { normalizeBankDate } from "../utils/dates.js";
import { type AdapterOptions, type BankAdapter, StatementBuilder, optionalColumn, requireColumn } from "./bankAdapter.js";
import { readCsvTable } from "./csvRows.js";

const DATE_COLUMNS = ["Value Date", "Booking Date", "Date"] as const;
const AMOUNT_COLUMNS = ["Amount (EUR)", "Amount"] as const;
const DESCRIPTION_COLUMNS = ["Partner Name", "Payee", "Payment Reference"] as const;
const ORIGINAL_AMOUNT_COLUMNS = ["Original Amount", "Amount (Foreign Currency)"] as const;
const ORIGINAL_CURRENCY_COLUMNS = ["Original Currency", "Type Foreign Currency"] as const;

/**
 * N26 CSV export. Amounts use a dot, dates are ISO. Card payments abroad
 * carry the charged amount in "Original Amount" / "Original Currency".
 */
export class N26Adapter implements BankAdapter {
  readonly format = "n26" as const;
  readonly bankName = "N26";
  private readonly defaultCurrency: string;

  constructor(options: AdapterOptions = {}) {
    this.defaultCurrency = options.defaultCurrency ?? "EUR";
  }

  async parse(input: Buffer, source: string): Promise<StatementImport> {
    const { headers, rows } = await readCsvTable(input);
    const context = { format: this.format, source };

    requireColumn(headers, DATE_COLUMNS, context);
    const amountColumn =
      headers.find((name) => /^Amount \([A-Z]{3}\)$/.test(name)) ?? requireColumn(headers, AMOUNT_COLUMNS, context);
    requireColumn(headers, DESCRIPTION_COLUMNS, context);

    const accountCurrency = amountColumn.match(/\(([A-Z]{3})\)/)?.[1] ?? this.defaultCurrency;
    const dateColumns = DATE_COLUMNS.filter((name) => headers.includes(name));
    const descriptionColumns = DESCRIPTION_COLUMNS.filter((name) => headers.includes(name));
    const originalAmountColumn = optionalColumn(headers, ORIGINAL_AMOUNT_COLUMNS);
    const originalCurrencyColumn = optionalColumn(headers, ORIGINAL_CURRENCY_COLUMNS);

    const statement = new StatementBuilder(this.format, source);

    for (const { line, values } of rows) {
      const rawDate = dateColumns.map((name) => values[name]?.trim()).find(Boolean) ?? "";
      const date = normalizeBankDate(rawDate);
      if (!date) {
        statement.fail(line, `Unparseable date "${rawDate}"`);
        continue;
      }

      const account = Money.parse(values[amountColumn] ?? "", accountCurrency);
      if (!account) {
        statement.fail(line, `Unparseable amount "${values[amountColumn] ?? ""}" in "${amountColumn}"`);
        continue;
      }

      let money = account;
      let settled: Money | undefined;
      const originalAmount = originalAmountColumn ? values[originalAmountColumn]?.trim() : "";
      const originalCurrency = originalCurrencyColumn ? values[originalCurrencyColumn]?.trim().toUpperCase() : "";
      if (originalAmount && originalCurrency && originalCurrency !== accountCurrency) {
        const original = Money.parse(originalAmount, originalCurrency);
        if (!original) {
          statement.fail(line, `Unparseable original amount "${originalAmount}"`);
          continue;
        }
        money = account.isNegative ? original.abs().negate() : original.abs();
        settled = account;
      }

      statement.add({
        date,
        money,
        settled,
        description: descriptionColumns.map((name) => values[name]?.trim()).find(Boolean) ?? "",
        source: this.format,
        bank: this.bankName,
        sourceFile: source,
        row: line,
      });
    }

    return statement.build();
  }
}
