import * as XLSX from "xlsx";
import { FormatError } from "../errors/index.js";
import { Money } from "../models/money.js";
import type { IsoDate, StatementImport } from "../types/index.js";
import { isIsoDate, normalizeBankDate } from "../utils/dates.js";
import { type BankAdapter, StatementBuilder, describeWithArea, markAtm, optionalColumn, requireColumn } from "./bankAdapter.js";

const REQUIRED = ["TransactionDate", "Text", "Type", "Currency Amount", "Currency", "Amount"] as const;
const IGNORED_TYPES = new Set(["rente", "interest"]);
const ACCOUNT_CURRENCY = "NOK";

type Cell = string | number | boolean | Date | null | undefined;

function cellText(value: Cell): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

function cellDate(value: Cell): IsoDate | null {
  if (typeof value === "number") {
    // Excel serial day number
    const parsed = XLSX.SSF.parse_date_code(value);
    if (!parsed) return null;
    const date = `${parsed.y}-${String(parsed.m).padStart(2, "0")}-${String(parsed.d).padStart(2, "0")}`;
    return isIsoDate(date) ? date : null;
  }
  if (value instanceof Date) {
    return normalizeBankDate(value.toISOString());
  }
  return normalizeBankDate(cellText(value));
}

function cellAmount(value: Cell, currency: string): Money | null {
  if (typeof value === "number") return Money.parse(value, currency);
  const text = cellText(value);
  return text ? Money.parse(text, currency) : null;
}

/**
 * Bank Norwegian credit card export (.xlsx, first sheet). Amounts in the
 * "Amount" column are in NOK; "Currency Amount" is what the merchant charged.
 */
export class BankNorwegianAdapter implements BankAdapter {
  readonly format = "banknorwegian" as const;
  readonly bankName = "BankNorwegian";

  async parse(input: Buffer, source: string): Promise<StatementImport> {
    const context = { format: this.format, source };
    const workbook = XLSX.read(input, { type: "buffer" });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      throw new FormatError("Workbook has no sheets", { ...context, field: REQUIRED[0] });
    }

    const table = XLSX.utils.sheet_to_json<Cell[]>(workbook.Sheets[sheetName], {
      header: 1,
      raw: true,
      defval: null,
      blankrows: false,
    });
    const headers = (table[0] ?? []).map(cellText);
    for (const column of REQUIRED) {
      requireColumn(headers, [column], context);
    }
    const areaColumn = optionalColumn(headers, ["Merchant Area"]);
    const categoryColumn = optionalColumn(headers, ["Merchant Category"]);
    const cellAt = (row: Cell[], column: string | undefined): Cell =>
      column === undefined ? null : row[headers.indexOf(column)];

    const statement = new StatementBuilder(this.format, source);

    table.slice(1).forEach((row, index) => {
      const sheetRow = index + 2;
      if (row.every((value) => cellText(value) === "")) return;

      const type = cellText(cellAt(row, "Type"));
      if (IGNORED_TYPES.has(type.toLowerCase())) {
        statement.ignore();
        return;
      }

      const date = cellDate(cellAt(row, "TransactionDate"));
      if (!date) {
        statement.fail(sheetRow, `Unparseable date "${cellText(cellAt(row, "TransactionDate"))}"`);
        return;
      }

      const currency = cellText(cellAt(row, "Currency")).toUpperCase() || ACCOUNT_CURRENCY;
      const booked = cellAmount(cellAt(row, "Amount"), ACCOUNT_CURRENCY);
      const charged = cellAmount(cellAt(row, "Currency Amount"), currency) ?? (currency === ACCOUNT_CURRENCY ? booked : null);
      if (!booked || !charged) {
        statement.fail(sheetRow, "Unparseable amount");
        return;
      }

      const category = cellText(cellAt(row, categoryColumn));
      let description = describeWithArea(cellText(cellAt(row, "Text")), cellText(cellAt(row, areaColumn)));
      if (type.toLowerCase() === "kontantuttak" || category.includes("ATM")) {
        description = markAtm(description);
      }

      statement.add({
        date,
        money: charged,
        settled: charged.sameCurrency(booked) ? undefined : booked,
        description,
        source: this.format,
        bank: this.bankName,
        sourceFile: source,
        row: sheetRow,
        merchantCategory: category || undefined,
      });
    });

    return statement.build();
  }
}
