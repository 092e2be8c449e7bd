import { describe, expect, it } from "vitest";
import { FormatError } from "../errors/index.js";
import { N26Adapter } from "./n26.js";

const HEADER =
  '"Booking Date","Value Date","Partner Name","Partner Iban",Type,"Payment Reference","Account Name","Amount (EUR)","Original Amount","Original Currency","Exchange Rate"';

const CSV = [
  HEADER,
  '"2026-01-20","2026-01-20","Lidl","","Presentment","","Main Account","-7.10","","",""',
  '"2026-01-21","2026-01-21","Happy Bar","","Presentment","","Main Account","-25.57","-50.00","BGN","1.9558"',
  '"2026-01-22","2026-01-22","Employer","","Credit Transfer","Salary","Main Account","1000.00","","",""',
  '"2026-01-22","2026-13-01","Broken","","Presentment","","Main Account","-1.00","","",""',
].join("\n");

describe("N26Adapter", () => {
  it("imports card payments with their CSV line", async () => {
    const statement = await new N26Adapter().parse(Buffer.from(`\uFEFF${CSV}\n`), "n26-january.csv");

    expect(statement.format).toBe("n26");
    expect(statement.transactions).toHaveLength(3);

    const [lidl, bar, salary] = statement.transactions;
    expect(lidl).toMatchObject({ date: "2026-01-20", description: "Lidl", bank: "N26", row: 2 });
    expect(lidl.money.toString()).toBe("EUR -7.10");
    expect(lidl.settled).toBeUndefined();

    expect(salary.money.toString()).toBe("EUR 1000.00");
    expect(salary.row).toBe(4);
    expect(bar.sourceFile).toBe("n26-january.csv");
  });

  it("uses the original currency and keeps the account amount as settled", async () => {
    const statement = await new N26Adapter().parse(Buffer.from(CSV), "n26.csv");
    const bar = statement.transactions[1];

    expect(bar.money.toString()).toBe("BGN -50.00");
    expect(bar.settled?.toString()).toBe("EUR -25.57");
  });

  it("collects bad rows instead of failing the file", async () => {
    const statement = await new N26Adapter().parse(Buffer.from(CSV), "n26.csv");
    expect(statement.rowErrors).toEqual([{ row: 5, message: 'Unparseable date "2026-13-01"' }]);
  });

  it("reads a plain Amount column in the default currency", async () => {
    const csv = "Date,Payee,Amount\n2026-01-20,Kiosk,-3.50\n";
    const statement = await new N26Adapter({ defaultCurrency: "NOK" }).parse(Buffer.from(csv), "old.csv");
    expect(statement.transactions[0].money.toString()).toBe("NOK -3.50");
    expect(statement.transactions[0].description).toBe("Kiosk");
  });

  it("names the missing column", async () => {
    const parse = new N26Adapter().parse(Buffer.from("Date,Payee\n2026-01-20,Kiosk\n"), "n26.csv");

    await expect(parse).rejects.toBeInstanceOf(FormatError);
    await expect(parse).rejects.toMatchObject({
      field: "Amount (EUR)",
      message: 'Missing column "Amount (EUR)" (or "Amount") (format: n26, file: n26.csv)',
    });
  });
});
