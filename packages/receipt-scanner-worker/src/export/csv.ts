import type { ExportRow } from "@receipt-scanner/contracts";

export const EXPORT_COLUMNS = [
  "filename",
  "vendor",
  "location",
  "date",
  "total",
  "currency",
] as const satisfies ReadonlyArray<keyof ExportRow>;

export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
