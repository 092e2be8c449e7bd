import { z } from "zod";
import { FormatError } from "../errors/index.js";
import { Money } from "../models/money.js";
import type { StatementImport } from "../types/index.js";
import { normalizeBankDate } from "../utils/dates.js";
import { type BankAdapter, StatementBuilder, describeWithArea, markAtm } from "./bankAdapter.js";

const AmountSchema = z.union([z.number(), z.string()]);

export const RememberTransactionSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  transactionDate: z.string(),
  transactionAmount: AmountSchema,
  transactionCurrency: z.string().length(3).default("NOK"),
  billingAmount: AmountSchema.optional(),
  billingCurrency: z.string().length(3).default("NOK"),
  description: z.string().default(""),
  city: z.string().nullish(),
  reasonCode: z.string().nullish(),
});

export const RememberExportSchema = z.object({
  transactions: z.array(z.unknown()),
});

export type RememberTransaction = z.infer<typeof RememberTransactionSchema>;

const FEE_DESCRIPTION = /valutap(?:å|aa)slag/i;
const CASH_DESCRIPTION = /kontantuttak/i;

/**
 * Remember credit card JSON export. Monthly exports overlap, so the same
 * transaction id can appear twice.
 */
export class RememberAdapter implements BankAdapter {
  readonly format = "remember" as const;
  readonly bankName = "Remember";
  private readonly seenIds = new Set<string>();

  async parse(input: Buffer, source: string): Promise<StatementImport> {
    const context = { format: this.format, source };

    let document: unknown;
    try {
      document = JSON.parse(input.toString("utf-8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FormatError(`Not a JSON document: ${reason}`, { ...context, field: "transactions" });
    }

    const envelope = RememberExportSchema.safeParse(document);
    if (!envelope.success) {
      throw new FormatError('Missing "transactions" array', { ...context, field: "transactions" });
    }

    const statement = new StatementBuilder(this.format, source);

    envelope.data.transactions.forEach((entry, index) => {
      const parsed = RememberTransactionSchema.safeParse(entry);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        statement.fail(`#${index}`, `${issue.path.join(".") || "transaction"}: ${issue.message}`);
        return;
      }
      const tx = parsed.data;

      if (this.seenIds.has(tx.id)) {
        statement.ignore();
        return;
      }
      this.seenIds.add(tx.id);

      const reasonCode = tx.reasonCode ?? "";
      if (reasonCode.toLowerCase() === "fee" || FEE_DESCRIPTION.test(tx.description)) {
        statement.ignore();
        return;
      }

      const date = normalizeBankDate(tx.transactionDate.slice(0, 10));
      if (!date) {
        statement.fail(tx.id, `Unparseable date "${tx.transactionDate}"`);
        return;
      }

      const money = Money.parse(tx.transactionAmount, tx.transactionCurrency);
      const billed = tx.billingAmount === undefined ? null : Money.parse(tx.billingAmount, tx.billingCurrency);
      if (!money || (tx.billingAmount !== undefined && !billed)) {
        statement.fail(tx.id, "Unparseable amount");
        return;
      }

      let description = describeWithArea(tx.description.trim(), (tx.city ?? "").trim());
      if (reasonCode === "CASH" || CASH_DESCRIPTION.test(description)) {
        description = markAtm(description);
      }

      statement.add({
        date,
        money,
        settled: billed && !billed.sameCurrency(money) ? billed : undefined,
        description,
        source: this.format,
        bank: this.bankName,
        sourceFile: source,
        row: tx.id,
        id: tx.id,
      });
    });

    return statement.build();
  }
}
