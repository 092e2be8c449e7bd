import { Readable } from "stream";
import csvParser from "csv-parser";

export interface CsvTable {
  headers: string[];
  /** Data rows with their 1-based file line (header is line 1). */
  rows: Array<{ line: number; values: Record<string, string> }>;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

function withoutBom(buffer: Buffer): Buffer {
  return buffer.subarray(0, 3).equals(UTF8_BOM) ? buffer.subarray(3) : buffer;
}

export async function readCsvTable(buffer: Buffer): Promise<CsvTable> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvTable["rows"] = [];
    const stream = Readable.from([withoutBom(buffer)]);

    stream
      .pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }))
      .on("headers", (names: string[]) => {
        headers = names;
      })
      .on("data", (row: Record<string, string>) => {
        rows.push({ line: rows.length + 2, values: row });
      })
      .on("end", () => {
        resolve({ headers, rows });
      })
      .on("error", (error: Error) => {
        reject(new Error(`Failed to parse CSV: ${error.message}`));
      });
  });
}
