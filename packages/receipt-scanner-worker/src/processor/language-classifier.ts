import type { Locale } from "@receipt-scanner/contracts";
import { LOCALE_KEYWORDS } from "./locale-profiles.js";

/**
 * Picks the receipt locale by counting keyword hits per line; a line can count for several
 * keywords. English must strictly outscore Italian, so ties and empty input stay Italian.
 */
export function detectReceiptLocale(lines: readonly string[]): Locale {
  let italianScore = 0;
  let englishScore = 0;

  for (const line of lines) {
    const upper = line.trim().toUpperCase();
    italianScore += countKeywordHits(upper, LOCALE_KEYWORDS.IT);
    englishScore += countKeywordHits(upper, LOCALE_KEYWORDS.EN);
  }

  return englishScore > italianScore ? "EN" : "IT";
}

function countKeywordHits(upper: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) => upper.includes(keyword)).length;
}
