import { describe, expect, it } from "vitest";
import { profileFor } from "./locale-profiles.js";
import {
  detectCurrency,
  extractAmounts,
  extractTotalAndCurrency,
  resolveTotal,
} from "./total-extractor.js";

const italian = profileFor("IT");
const english = profileFor("EN");

describe("extractAmounts", () => {
  it("reads comma and dot decimals", () => {
    expect(extractAmounts("TOTALE 12,50 EUR", italian)).toEqual([12.5]);
    expect(extractAmounts("BURGER $ 9.50", english)).toEqual([9.5]);
  });

  it("ignores percentages and year-like values", () => {
    expect(extractAmounts("IVA 22% 2,20", italian)).toEqual([]);
    expect(extractAmounts("ANNO 2023,00", italian)).toEqual([]);
  });
});

describe("detectCurrency", () => {
  it("uses the first line carrying a currency marker", () => {
    expect(detectCurrency(["SHOP", "TOTAL 5.00 USD", "€ 3"], english)).toBe("USD");
  });

  it("prefers the euro when one line carries both markers", () => {
    expect(detectCurrency(["PAID € 5 / $ 5.50"], english)).toBe("EUR");
  });

  it("falls back to the locale default", () => {
    expect(detectCurrency(["SHOP"], english)).toBe("USD");
    expect(detectCurrency(["NEGOZIO"], italian)).toBe("EUR");
  });
});

describe("resolveTotal", () => {
  it("returns the largest explicit total", () => {
    expect(resolveTotal([3, 4.5], [9], [1])).toBe(4.5);
  });

  it("caps blind amounts at the cash tendered", () => {
    expect(resolveTotal([], [12.5, 45], [20])).toBe(12.5);
    expect(resolveTotal([], [45], [20])).toBe(45);
  });

  it("falls back to the cash amount, then to null", () => {
    expect(resolveTotal([], [], [20])).toBe(20);
    expect(resolveTotal([], [], [])).toBeNull();
  });
});

describe("extractTotalAndCurrency", () => {
  it("reads the amount below a total keyword", () => {
    expect(
      extractTotalAndCurrency(
        ["ACME S.P.A", "VIA ROMA 10", "20100 MILANO (MI)", "23/05/23", "TOTALE", "12,50"],
        italian,
      ),
    ).toEqual({ total: 12.5, currency: "EUR" });
  });

  it("prefers the explicit total over larger amounts elsewhere", () => {
    expect(extractTotalAndCurrency(["SHOP", "ITEM 50.00", "TOTAL 12.00"], english)).toEqual({
      total: 12,
      currency: "USD",
    });
  });

  it("keeps blind totals below the cash tendered", () => {
    expect(extractTotalAndCurrency(["SHOP", "12.50", "45.00", "CASH 20.00"], english)).toEqual({
      total: 12.5,
      currency: "USD",
    });
  });

  it("skips subtotal and change lines", () => {
    expect(extractTotalAndCurrency(["SUBTOTALE 10,00", "RESTO 2,00"], italian)).toEqual({
      total: null,
      currency: "EUR",
    });
  });

  it("honours the window and tail settings", () => {
    const lines = ["TOTAL", "9.99"];
    expect(extractTotalAndCurrency(lines, english).total).toBe(9.99);
    expect(
      extractTotalAndCurrency(lines, english, { explicitTotalWindow: 1, blindTailLines: 0 }).total,
    ).toBeNull();
    expect(
      extractTotalAndCurrency(lines, english, { explicitTotalWindow: 1, blindTailLines: 15 }).total,
    ).toBe(9.99);
  });
});
