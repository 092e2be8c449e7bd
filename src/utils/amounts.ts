/**
 * Parse a decimal amount into minor units (hundredths).
 *
 * Accepts `.` or `,` as decimal separator. When both appear, the last one is
 * the decimal separator and the other groups thousands; a separator that
 * repeats is a thousands separator. Whitespace and apostrophes are ignored.
 * Returns null when the text is not a number or has non-zero digits past
 * the second decimal.
 */
export function parseMinorUnits(raw: string | number): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? parseMinorUnits(raw.toFixed(6)) : null;
  }

  let s = raw.trim().replace(/[\s']/g, "");
  if (!s) return null;

  let sign = 1;
  if (s.startsWith("-") || s.startsWith("+")) {
    if (s.startsWith("-")) sign = -1;
    s = s.slice(1);
  }

  const lastDot = s.lastIndexOf(".");
  const lastComma = s.lastIndexOf(",");
  let decimalSep: "." | "," | null = null;
  if (lastDot >= 0 && lastComma >= 0) {
    decimalSep = lastDot > lastComma ? "." : ",";
  } else if (lastDot >= 0) {
    decimalSep = s.indexOf(".") === lastDot ? "." : null;
  } else if (lastComma >= 0) {
    decimalSep = s.indexOf(",") === lastComma ? "," : null;
  }

  let intPart = s;
  let fracPart = "";
  if (decimalSep) {
    const at = s.lastIndexOf(decimalSep);
    intPart = s.slice(0, at);
    fracPart = s.slice(at + 1);
  }
  intPart = intPart.replace(/[.,]/g, "");

  if (!/^\d*$/.test(intPart) || !/^\d*$/.test(fracPart) || (!intPart && !fracPart)) {
    return null;
  }

  // Trailing zeros are fine ("1.2300"); anything finer than cents is not an amount
  if (/[1-9]/.test(fracPart.slice(2))) return null;

  const cents = fracPart.padEnd(2, "0").slice(0, 2);
  return sign * (Number(intPart || "0") * 100 + Number(cents));
}

export function formatMinorUnits(minor: number): string {
  const sign = minor < 0 ? "-" : "";
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, "0");
  return `${sign}${whole}.${cents}`;
}
