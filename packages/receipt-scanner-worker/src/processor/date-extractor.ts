import { formatLocalDate, normalizeReceiptDate } from "./date-normalizer.js";
import type { LocaleProfile } from "./locale-profiles.js";
import type { ReceiptDate } from "./types.js";

export function findRawDateToken(lines: readonly string[], profile: LocaleProfile): string | null {
  for (const line of lines) {
    for (const { pattern, token } of profile.datePatterns) {
      const match = pattern.exec(line);
      if (!match) {
        continue;
      }
      if (token === "match") {
        return match[0];
      }
      return (match[1] ?? "").replace(/ /g, "");
    }
  }
  return null;
}

export function isDateShapedLine(line: string, profile: LocaleProfile): boolean {
  return profile.datePatterns.some(({ pattern }) => pattern.test(line));
}

/** Falls back to today's date, flagged as inferred, when no line looks like a date. */
export function extractReceiptDate(
  lines: readonly string[],
  profile: LocaleProfile,
  now: () => Date,
): ReceiptDate {
  const raw = findRawDateToken(lines, profile);
  if (raw) {
    return { value: normalizeReceiptDate(raw, profile.locale), inferred: false };
  }
  return { value: formatLocalDate(now()), inferred: true };
}
