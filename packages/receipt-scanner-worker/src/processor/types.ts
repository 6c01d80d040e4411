import type { Currency, Locale } from "@receipt-scanner/contracts";

export type ReceiptDate = {
  value: string;
  /** Set when no date was found on the receipt and the scan date stands in for it. */
  inferred: boolean;
};

export type ReceiptExtractionInput = {
  lines: readonly string[];
};

export type ExtractedReceiptFields = {
  locale: Locale | null;
  vendor: string | null;
  location: string | null;
  date: ReceiptDate | null;
  total: number | null;
  currency: Currency | null;
};

export type ReceiptFieldExtractor = {
  extract: (input: ReceiptExtractionInput) => ExtractedReceiptFields;
};
