import { extractReceiptDate } from "./date-extractor.js";
import { detectReceiptLocale } from "./language-classifier.js";
import { profileFor } from "./locale-profiles.js";
import { extractLocation } from "./location-extractor.js";
import {
  DEFAULT_TOTAL_OPTIONS,
  extractTotalAndCurrency,
  type TotalExtractionOptions,
} from "./total-extractor.js";
import type {
  ExtractedReceiptFields,
  ReceiptExtractionInput,
  ReceiptFieldExtractor,
} from "./types.js";
import { extractVendor } from "./vendor-extractor.js";

export type HeuristicFieldExtractorOptions = Partial<TotalExtractionOptions> & {
  now?: () => Date;
};

export const EMPTY_RECEIPT_FIELDS: ExtractedReceiptFields = {
  locale: null,
  vendor: null,
  location: null,
  date: null,
  total: null,
  currency: null,
};

export class HeuristicFieldExtractor implements ReceiptFieldExtractor {
  private readonly totalOptions: TotalExtractionOptions;
  private readonly now: () => Date;

  constructor(options: HeuristicFieldExtractorOptions = {}) {
    this.totalOptions = {
      explicitTotalWindow: Math.max(
        1,
        options.explicitTotalWindow ?? DEFAULT_TOTAL_OPTIONS.explicitTotalWindow,
      ),
      blindTailLines: Math.max(0, options.blindTailLines ?? DEFAULT_TOTAL_OPTIONS.blindTailLines),
    };
    this.now = options.now ?? (() => new Date());
  }

  extract(input: ReceiptExtractionInput): ExtractedReceiptFields {
    const { lines } = input;
    if (lines.length === 0) {
      return { ...EMPTY_RECEIPT_FIELDS };
    }

    const locale = detectReceiptLocale(lines);
    const profile = profileFor(locale);

    const vendor = extractVendor(lines, profile);
    const date = extractReceiptDate(lines, profile, this.now);
    const { total, currency } = extractTotalAndCurrency(lines, profile, this.totalOptions);
    const location = extractLocation(lines, profile);

    return { locale, vendor, location, date, total, currency };
  }
}

export function extractReceiptFields(
  lines: readonly string[],
  options: HeuristicFieldExtractorOptions = {},
): ExtractedReceiptFields {
  return new HeuristicFieldExtractor(options).extract({ lines });
}
