import type { ExportRow, ReceiptRecord } from "@receipt-scanner/contracts";
import type { ExtractedReceiptFields, ReceiptDate } from "./types.js";

export const NULL_SENTINEL = "null";

export function toReceiptRecord(filename: string, fields: ExtractedReceiptFields): ReceiptRecord {
  return {
    filename,
    vendor: nonEmpty(fields.vendor),
    location: nonEmpty(fields.location),
    date: renderDate(fields.date),
    total: formatAmount(fields.total),
    currency: fields.currency,
  };
}

export function renderDate(date: ReceiptDate | null): string | null {
  if (!date || date.value.length === 0) {
    return null;
  }
  return date.inferred ? `(${date.value})` : date.value;
}

export function formatAmount(value: number | null): string | null {
  if (value === null || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return formatTwoDecimals(value);
}

/** Fixed-point rendering for any finite value; never exponent notation. */
export function formatTwoDecimals(value: number): string {
  // toFixed switches to exponent notation from 1e21; doubles that large are whole numbers.
  if (Math.abs(value) < 1e21) {
    return value.toFixed(2);
  }
  return `${BigInt(value)}.00`;
}

/** Parses an exported total; anything that is not a plain decimal counts as zero. */
export function parseAmount(value: string | null): number {
  if (value === null || !/^\s*[-+]?(\d+(\.\d*)?|\.\d+)\s*$/.test(value)) {
    return 0;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function toExportRow(record: ReceiptRecord): ExportRow {
  return {
    filename: record.filename,
    vendor: record.vendor ?? NULL_SENTINEL,
    location: record.location ?? NULL_SENTINEL,
    date: record.date ?? NULL_SENTINEL,
    total: record.total ?? NULL_SENTINEL,
    currency: record.currency ?? NULL_SENTINEL,
  };
}

function nonEmpty(value: string | null): string | null {
  return value !== null && value.length > 0 ? value : null;
}
