import { describe, expect, it } from "vitest";
import { FormatError } from "../errors/index.js";
import { RememberAdapter } from "./remember.js";

const EXPORT = {
  transactions: [
    {
      id: "r1",
      transactionDate: "2026-01-20T12:00:00",
      transactionAmount: -50,
      transactionCurrency: "BGN",
      billingAmount: -290.35,
      billingCurrency: "NOK",
      description: "Cafe Sofia",
      city: "Sofia",
    },
    {
      id: "r1",
      transactionDate: "2026-01-20T12:00:00",
      transactionAmount: -50,
      transactionCurrency: "BGN",
      description: "Cafe Sofia",
    },
    {
      id: 2,
      transactionDate: "2026-01-20",
      transactionAmount: "-4.50",
      transactionCurrency: "NOK",
      description: "Valutapåslag",
      reasonCode: "fee",
    },
    {
      id: "r3",
      transactionDate: "2026-01-21",
      transactionAmount: -200,
      transactionCurrency: "NOK",
      billingAmount: -200,
      billingCurrency: "NOK",
      description: "Minibank",
      city: "Oslo",
      reasonCode: "CASH",
    },
    { transactionDate: "2026-01-22", transactionAmount: -1 },
  ],
};

function parse(document: unknown) {
  return new RememberAdapter().parse(Buffer.from(JSON.stringify(document)), "remember.json");
}

describe("RememberAdapter", () => {
  it("imports purchases with the billed amount as settled", async () => {
    const statement = await parse(EXPORT);
    const [cafe] = statement.transactions;

    expect(cafe).toMatchObject({ date: "2026-01-20", description: "Cafe Sofia", row: "r1", id: "r1", bank: "Remember" });
    expect(cafe.money.toString()).toBe("BGN -50.00");
    expect(cafe.settled?.toString()).toBe("NOK -290.35");
  });

  it("skips duplicate ids and currency fees", async () => {
    const statement = await parse(EXPORT);
    expect(statement.transactions.map((tx) => tx.id)).toEqual(["r1", "r3"]);
    expect(statement.ignored).toBe(2);
  });

  it("marks cash withdrawals", async () => {
    const statement = await parse(EXPORT);
    expect(statement.transactions[1].description).toBe("ATM: Minibank (Oslo)");
    expect(statement.transactions[1].settled).toBeUndefined();
  });

  it("reports entries that fail validation by position", async () => {
    const statement = await parse(EXPORT);
    expect(statement.rowErrors).toHaveLength(1);
    expect(statement.rowErrors[0].row).toBe("#4");
    expect(statement.rowErrors[0].message).toMatch(/^id: /);
  });

  it("requires a transactions array", async () => {
    await expect(parse({ items: [] })).rejects.toMatchObject({ field: "transactions" });
    await expect(
      new RememberAdapter().parse(Buffer.from("{not json"), "remember.json")
    ).rejects.toBeInstanceOf(FormatError);
  });
});
