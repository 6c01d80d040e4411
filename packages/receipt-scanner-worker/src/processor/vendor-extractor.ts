import { containsAny, type LocaleProfile } from "./locale-profiles.js";

const SUFFIX_SCAN_LINES = 8;
const MIN_VENDOR_LENGTH = 3;

export function extractVendor(lines: readonly string[], profile: LocaleProfile): string | null {
  for (const line of lines.slice(0, SUFFIX_SCAN_LINES)) {
    const cleaned = line.trim();
    if (cleaned.length < MIN_VENDOR_LENGTH) {
      continue;
    }
    if (containsAny(cleaned.toUpperCase(), profile.vendorSuffixes)) {
      return cleaned;
    }
  }

  for (const line of lines) {
    const cleaned = line.trim();
    if (cleaned.length < MIN_VENDOR_LENGTH || !/\p{L}/u.test(cleaned)) {
      continue;
    }
    if (containsAny(cleaned.toUpperCase(), profile.vendorSkipKeywords)) {
      continue;
    }
    return cleaned;
  }

  return null;
}
