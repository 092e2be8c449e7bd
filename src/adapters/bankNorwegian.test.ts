import { describe, expect, it } from "vitest";
import { utils, write } from "xlsx";
import { FormatError } from "../errors/index.js";
import { BankNorwegianAdapter } from "./bankNorwegian.js";

function makeWorkbook(rows: unknown[][]): Buffer {
  const wb = utils.book_new();
  utils.book_append_sheet(wb, utils.aoa_to_sheet(rows), "Transactions");
  return write(wb, { type: "buffer", bookType: "xlsx" });
}

const HEADER = ["TransactionDate", "Text", "Type", "Currency Amount", "Currency", "Amount", "Merchant Area", "Merchant Category"];

describe("BankNorwegianAdapter", () => {
  const workbook = makeWorkbook([
    HEADER,
    // 46042 is 2026-01-20 as an Excel serial day
    [46042, "REMA 1000", "Varekjøp", -129.9, "NOK", -129.9, "OSLO", "Grocery Stores"],
    ["21.01.2026", "CAFE SOFIA", "Varekjøp", -50, "BGN", -290.35, "SOFIA", "Restaurants"],
    ["2026-01-22", "DNB MINIBANK", "Kontantuttak", -500, "NOK", -500, "", "ATM"],
    ["31.01.2026", "Rente", "Rente", "", "", -12.5, "", ""],
    ["not a date", "X", "Varekjøp", -1, "NOK", -1, "", ""],
  ]);

  it("reads serial, Norwegian and ISO dates", async () => {
    const statement = await new BankNorwegianAdapter().parse(workbook, "bn.xlsx");
    expect(statement.transactions.map((tx) => tx.date)).toEqual(["2026-01-20", "2026-01-21", "2026-01-22"]);
  });

  it("keeps the charged currency and the NOK amount as settled", async () => {
    const statement = await new BankNorwegianAdapter().parse(workbook, "bn.xlsx");
    const [rema, cafe] = statement.transactions;

    expect(rema.money.toString()).toBe("NOK -129.90");
    expect(rema.settled).toBeUndefined();
    expect(rema.description).toBe("REMA 1000 (OSLO)");
    expect(rema.merchantCategory).toBe("Grocery Stores");
    expect(rema.row).toBe(2);

    expect(cafe.money.toString()).toBe("BGN -50.00");
    expect(cafe.settled?.toString()).toBe("NOK -290.35");
    expect(cafe.description).toBe("CAFE SOFIA");
  });

  it("marks cash withdrawals, skips interest and collects bad rows", async () => {
    const statement = await new BankNorwegianAdapter().parse(workbook, "bn.xlsx");

    expect(statement.transactions[2].description).toBe("ATM: DNB MINIBANK");
    expect(statement.ignored).toBe(1);
    expect(statement.rowErrors).toEqual([{ row: 6, message: 'Unparseable date "not a date"' }]);
  });

  it("names the missing column", async () => {
    const parse = new BankNorwegianAdapter().parse(makeWorkbook([HEADER.slice(0, 5)]), "bn.xlsx");

    await expect(parse).rejects.toBeInstanceOf(FormatError);
    await expect(parse).rejects.toMatchObject({
      field: "Amount",
      message: 'Missing column "Amount" (format: banknorwegian, file: bn.xlsx)',
    });
  });
});
