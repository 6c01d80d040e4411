import { describe, expect, it } from "vitest";
import {
  formatAmount,
  formatTwoDecimals,
  parseAmount,
  renderDate,
  toExportRow,
  toReceiptRecord,
} from "./normalization.js";

describe("toReceiptRecord", () => {
  it("formats totals and marks inferred dates", () => {
    expect(
      toReceiptRecord("a.jpg", {
        locale: "IT",
        vendor: "BAR CENTRALE",
        location: "",
        date: { value: "15/01/2024", inferred: true },
        total: 2,
        currency: "EUR",
      }),
    ).toEqual({
      filename: "a.jpg",
      vendor: "BAR CENTRALE",
      location: null,
      date: "(15/01/2024)",
      total: "2.00",
      currency: "EUR",
    });
  });
});

describe("renderDate", () => {
  it("leaves found dates bare", () => {
    expect(renderDate({ value: "23/05/2023", inferred: false })).toBe("23/05/2023");
    expect(renderDate(null)).toBeNull();
  });
});

describe("formatAmount", () => {
  it("keeps two decimals for positive amounts only", () => {
    expect(formatAmount(12.5)).toBe("12.50");
    expect(formatAmount(0)).toBeNull();
    expect(formatAmount(-3)).toBeNull();
    expect(formatAmount(null)).toBeNull();
  });

  it("renders amounts from 1e21 up without an exponent", () => {
    expect(formatAmount(1e21)).toBe("1000000000000000000000.00");
    expect(formatAmount(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe("formatTwoDecimals", () => {
  it("uses fixed-point notation on both sides of 1e21", () => {
    expect(formatTwoDecimals(999999.999)).toBe("1000000.00");
    expect(formatTwoDecimals(2e21)).toBe("2000000000000000000000.00");
    expect(formatTwoDecimals(-1e21)).toBe("-1000000000000000000000.00");
  });
});

describe("parseAmount", () => {
  it("treats anything but a plain decimal as zero", () => {
    expect(parseAmount("12.50")).toBe(12.5);
    expect(parseAmount("(12.50)")).toBe(0);
    expect(parseAmount("abc")).toBe(0);
    expect(parseAmount(null)).toBe(0);
  });
});

describe("toExportRow", () => {
  it("writes missing fields as the null sentinel", () => {
    expect(
      toExportRow({
        filename: "b.png",
        vendor: "SHOP",
        location: null,
        date: null,
        total: null,
        currency: null,
      }),
    ).toEqual({
      filename: "b.png",
      vendor: "SHOP",
      location: "null",
      date: "null",
      total: "null",
      currency: "null",
    });
  });
});
