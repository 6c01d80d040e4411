import type { Currency } from "@receipt-scanner/contracts";
import { containsAny, type LocaleProfile } from "./locale-profiles.js";

export type TotalExtractionOptions = {
  /** Lines read for amounts starting at a total keyword, the keyword line included. */
  explicitTotalWindow: number;
  /** Lines at the bottom of the receipt scanned without a keyword anchor. */
  blindTailLines: number;
};

export type TotalAndCurrency = {
  total: number | null;
  currency: Currency;
};

export const DEFAULT_TOTAL_OPTIONS: TotalExtractionOptions = {
  explicitTotalWindow: 5,
  blindTailLines: 15,
};

const CASH_TOLERANCE = 0.01;

export function detectCurrency(lines: readonly string[], profile: LocaleProfile): Currency {
  for (const line of lines) {
    const upper = line.toUpperCase();
    if (line.includes("€") || upper.includes("EUR")) {
      return "EUR";
    }
    if (line.includes("$") || upper.includes("USD")) {
      return "USD";
    }
  }
  return profile.defaultCurrency;
}

/** Amount candidates on one line; percentages and year-like integers are never amounts. */
export function extractAmounts(line: string, profile: LocaleProfile): number[] {
  if (line.includes("%")) {
    return [];
  }

  const amounts: number[] = [];
  for (const match of line.matchAll(profile.amountPattern)) {
    const value = Number.parseFloat((match[1] ?? "").replace(",", "."));
    if (!Number.isFinite(value)) {
      continue;
    }
    if (Number.isInteger(value) && value > 1900 && value < 2100) {
      continue;
    }
    amounts.push(value);
  }
  return amounts;
}

export function extractTotalAndCurrency(
  lines: readonly string[],
  profile: LocaleProfile,
  options: TotalExtractionOptions = DEFAULT_TOTAL_OPTIONS,
): TotalAndCurrency {
  const explicitTotals: number[] = [];
  const blindTotals: number[] = [];
  const cashCandidates: number[] = [];

  lines.forEach((line, index) => {
    const upper = line.trim().toUpperCase();

    if (containsAny(upper, profile.cashKeywords)) {
      cashCandidates.push(...extractAmounts(line, profile));
      const next = lines[index + 1];
      if (next !== undefined) {
        cashCandidates.push(...extractAmounts(next, profile));
      }
      return;
    }

    if (containsAny(upper, profile.ignoreKeywords)) {
      return;
    }

    if (containsAny(upper, profile.totalKeywords)) {
      for (const windowLine of lines.slice(index, index + options.explicitTotalWindow)) {
        explicitTotals.push(...extractAmounts(windowLine, profile));
      }
    }
  });

  const tail = options.blindTailLines > 0 ? lines.slice(-options.blindTailLines) : [];
  for (const line of tail) {
    const amounts = extractAmounts(line, profile);
    if (amounts.length === 0) {
      continue;
    }

    const upper = line.trim().toUpperCase();
    if (containsAny(upper, profile.cashKeywords)) {
      cashCandidates.push(...amounts);
    } else if (!containsAny(upper, profile.ignoreKeywords)) {
      blindTotals.push(...amounts);
    }
  }

  const resolved = resolveTotal(explicitTotals, blindTotals, cashCandidates);
  return {
    total: resolved !== null && resolved > 0 ? resolved : null,
    currency: detectCurrency(lines, profile),
  };
}

/**
 * Explicit totals win outright. Otherwise the largest blind amount within a cent of the
 * highest cash tendered, then the largest blind amount, then the cash itself.
 */
export function resolveTotal(
  explicitTotals: readonly number[],
  blindTotals: readonly number[],
  cashCandidates: readonly number[],
): number | null {
  const maxCash = maxOf(cashCandidates);

  if (explicitTotals.length > 0) {
    return maxOf(explicitTotals);
  }

  if (blindTotals.length > 0) {
    if (maxCash === null) {
      return maxOf(blindTotals);
    }
    const capped = blindTotals.filter((value) => value <= maxCash + CASH_TOLERANCE);
    return maxOf(capped) ?? maxOf(blindTotals) ?? maxCash;
  }

  return maxCash;
}

function maxOf(values: readonly number[]): number | null {
  return values.length > 0 ? Math.max(...values) : null;
}
