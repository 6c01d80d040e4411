import type { Locale } from "@receipt-scanner/contracts";
import { profileFor } from "./locale-profiles.js";

type DateField = "day" | "month" | "monthAbbr" | "monthName" | "year4" | "year2";

type CompiledGrammar = {
  pattern: RegExp;
  fields: DateField[];
};

type DateParts = {
  day: number;
  month: number;
  year: number;
};

const MONTH_ABBREVIATIONS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

// Longest alternatives first so no month name is cut short by a shorter one.
const TOKEN_SOURCES: Record<string, { source: string; field: DateField }> = {
  D: { source: "(3[01]|[12]\\d|0[1-9]|[1-9]| [1-9])", field: "day" },
  M: { source: "(1[0-2]|0[1-9]|[1-9])", field: "month" },
  MMM: { source: `(${MONTH_ABBREVIATIONS.join("|")})`, field: "monthAbbr" },
  MMMM: {
    source: `(${[...MONTH_NAMES].sort((a, b) => b.length - a.length).join("|")})`,
    field: "monthName",
  },
  YYYY: { source: "(\\d{4})", field: "year4" },
  YY: { source: "(\\d{2})", field: "year2" },
};

const GRAMMAR_TOKEN = /MMMM|MMM|YYYY|YY|M|D|\s+/g;

const compiledGrammars = new Map<string, CompiledGrammar>();

const LOOSE_MONTH_DATE = /([a-zA-Z]{3})\s*(\d{1,2})\s*(\d{2,4})/;

/**
 * Normalizes an OCR date token to `dd/mm/yyyy`.
 *
 * Returns the input unchanged when it is empty, the literal `"null"`, or matches no grammar.
 */
export function normalizeReceiptDate(raw: string, locale: Locale): string {
  if (!raw || raw === "null") {
    return raw;
  }

  const repaired = repairDateToken(raw);

  for (const name of profileFor(locale).dateGrammarOrder) {
    const parts = matchGrammar(grammarFor(name), repaired);
    if (parts) {
      return formatCanonicalDate(parts);
    }
  }

  const loose = parseLooseMonthDate(repaired);
  return loose ? formatCanonicalDate(loose) : raw;
}

export function repairDateToken(raw: string): string {
  return raw
    .replace(/'(\d{2})\b/g, "20$1")
    .replace(/'/g, "20")
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function formatCanonicalDate(parts: DateParts): string {
  const day = String(parts.day).padStart(2, "0");
  const month = String(parts.month).padStart(2, "0");
  const year = String(parts.year).padStart(4, "0");
  return `${day}/${month}/${year}`;
}

export function formatLocalDate(date: Date): string {
  return formatCanonicalDate({
    day: date.getDate(),
    month: date.getMonth() + 1,
    year: date.getFullYear(),
  });
}

function grammarFor(name: string): CompiledGrammar {
  const cached = compiledGrammars.get(name);
  if (cached) {
    return cached;
  }
  const compiled = compileGrammar(name);
  compiledGrammars.set(name, compiled);
  return compiled;
}

function compileGrammar(name: string): CompiledGrammar {
  const fields: DateField[] = [];
  let source = "^";

  for (const token of name.match(GRAMMAR_TOKEN) ?? []) {
    if (/^\s+$/.test(token)) {
      source += "\\s+";
      continue;
    }
    const entry = TOKEN_SOURCES[token];
    if (!entry) {
      throw new Error(`unknown date grammar token: ${token}`);
    }
    source += entry.source;
    fields.push(entry.field);
  }

  return { pattern: new RegExp(source, "i"), fields };
}

// The first regex match must also consume the whole input; a longer alternative is never retried.
function matchGrammar(grammar: CompiledGrammar, input: string): DateParts | null {
  const match = grammar.pattern.exec(input);
  if (!match || match[0].length !== input.length) {
    return null;
  }

  let day = 0;
  let month = 0;
  let year = 0;

  grammar.fields.forEach((field, index) => {
    const value = match[index + 1] ?? "";
    switch (field) {
      case "day":
        day = Number.parseInt(value.trim(), 10);
        break;
      case "month":
        month = Number.parseInt(value, 10);
        break;
      case "monthAbbr":
        month = MONTH_ABBREVIATIONS.indexOf(value.toLowerCase()) + 1;
        break;
      case "monthName":
        month = MONTH_NAMES.indexOf(value.toLowerCase()) + 1;
        break;
      case "year4":
        year = Number.parseInt(value, 10);
        break;
      case "year2":
        year = expandTwoDigitYear(Number.parseInt(value, 10));
        break;
    }
  });

  return isCalendarDate({ day, month, year }) ? { day, month, year } : null;
}

function parseLooseMonthDate(input: string): DateParts | null {
  const match = LOOSE_MONTH_DATE.exec(input);
  if (!match) {
    return null;
  }

  const [, monthToken = "", dayToken = "", yearToken = ""] = match;
  const month = MONTH_ABBREVIATIONS.indexOf(monthToken.toLowerCase()) + 1;
  const fullYear = yearToken.length === 2 ? `20${yearToken}` : yearToken;
  if (month === 0 || fullYear.length !== 4) {
    return null;
  }

  const parts = {
    day: Number.parseInt(dayToken, 10),
    month,
    year: Number.parseInt(fullYear, 10),
  };
  return isCalendarDate(parts) ? parts : null;
}

function expandTwoDigitYear(value: number): number {
  return value <= 68 ? 2000 + value : 1900 + value;
}

function isCalendarDate(parts: DateParts): boolean {
  if (parts.year < 1 || parts.month < 1 || parts.month > 12 || parts.day < 1) {
    return false;
  }
  return parts.day <= daysInMonth(parts.month, parts.year);
}

function daysInMonth(month: number, year: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}
