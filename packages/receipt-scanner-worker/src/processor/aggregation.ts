import type { Currency, ExportRow, ReceiptRecord } from "@receipt-scanner/contracts";
import { formatTwoDecimals, parseAmount, toExportRow } from "./normalization.js";

export type CurrencySummary = {
  currency: Currency;
  totalCents: bigint;
};

export const BLANK_EXPORT_ROW: ExportRow = {
  filename: "",
  vendor: "",
  location: "",
  date: "",
  total: "",
  currency: "",
};

/** Per-currency sums in the order each currency first appears. */
export function summarizeByCurrency(records: readonly ReceiptRecord[]): CurrencySummary[] {
  const sums = new Map<Currency, bigint>();

  for (const record of records) {
    if (record.currency === null) {
      continue;
    }
    const previous = sums.get(record.currency) ?? 0n;
    sums.set(record.currency, previous + amountCents(record.total));
  }

  return [...sums.entries()].map(([currency, totalCents]) => ({ currency, totalCents }));
}

export function summaryRowFor(summary: CurrencySummary): ExportRow {
  return {
    filename: "",
    vendor: `TOTALE ${summary.currency}`,
    location: "",
    date: "",
    total: formatCents(summary.totalCents),
    currency: summary.currency,
  };
}

/**
 * Data rows in processing order, one blank separator row, then one summary row per currency.
 * No records means no rows at all.
 */
export function buildExportRows(records: readonly ReceiptRecord[]): ExportRow[] {
  if (records.length === 0) {
    return [];
  }

  return [
    ...records.map(toExportRow),
    { ...BLANK_EXPORT_ROW },
    ...summarizeByCurrency(records).map(summaryRowFor),
  ];
}

/** Cents of an exported total, rounded the way the total itself was rendered. */
export function amountCents(value: string | null): bigint {
  return BigInt(formatTwoDecimals(parseAmount(value)).replace(".", ""));
}

export function formatCents(cents: bigint): string {
  const sign = cents < 0n ? "-" : "";
  const magnitude = cents < 0n ? -cents : cents;
  return `${sign}${magnitude / 100n}.${String(magnitude % 100n).padStart(2, "0")}`;
}
