import { BANK_FORMATS, type BankFormat } from "../types/index.js";
import type { AdapterOptions, BankAdapter } from "./bankAdapter.js";
import { BankNorwegianAdapter } from "./bankNorwegian.js";
import { N26Adapter } from "./n26.js";
import { RememberAdapter } from "./remember.js";
import { WiseAdapter } from "./wise.js";

export type { AdapterOptions, BankAdapter } from "./bankAdapter.js";

export function isBankFormat(value: string): value is BankFormat {
  return BANK_FORMATS.some((format) => format === value);
}

export function getBankAdapter(format: BankFormat, options: AdapterOptions = {}): BankAdapter {
  switch (format) {
    case "n26":
      return new N26Adapter(options);
    case "wise":
      return new WiseAdapter();
    case "banknorwegian":
      return new BankNorwegianAdapter();
    case "remember":
      return new RememberAdapter();
  }
}
