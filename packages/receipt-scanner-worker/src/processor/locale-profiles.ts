import type { Currency, Locale } from "@receipt-scanner/contracts";

/**
 * Everything locale-dependent the field extractors consult. One profile is selected per
 * line sequence after classification and handed to every extractor unchanged.
 */
export type LocaleProfile = {
  readonly locale: Locale;
  readonly defaultCurrency: Currency;
  readonly vendorSuffixes: readonly string[];
  readonly vendorSkipKeywords: readonly string[];
  /** Tried in order; the month-name pattern (if any) yields its whole match. */
  readonly datePatterns: readonly DatePattern[];
  /** Date grammars (`D M YYYY`, `MMM D YY`, ...) in parse priority. */
  readonly dateGrammarOrder: readonly string[];
  readonly amountPattern: RegExp;
  readonly totalKeywords: readonly string[];
  readonly cashKeywords: readonly string[];
  readonly ignoreKeywords: readonly string[];
  readonly addressKeywords: readonly string[];
  readonly postalCodePattern: RegExp;
  readonly localityPattern: RegExp;
};

export type DatePattern = {
  readonly pattern: RegExp;
  readonly token: "group" | "match";
};

export const LOCALE_KEYWORDS: Readonly<Record<Locale, readonly string[]>> = {
  IT: [
    "TOTALE",
    "SCONTRINO",
    "P.IVA",
    "EURO",
    "IMPORTO",
    "CASSA",
    "SERVIZIO",
    "COPERTO",
    "VIA ",
    "PIAZZA ",
  ],
  EN: [
    "TOTAL",
    "RECEIPT",
    "TAX",
    "TIPS",
    "GRATUITY",
    "CHANGE",
    "CASH",
    "SUBTOTAL",
    "AVE",
    "BLVD",
    "STREET",
  ],
};

export const ADDRESS_DISQUALIFIERS: readonly string[] = [
  "TEL",
  "FAX",
  "TAX",
  "VAT",
  "ORDER",
  "TABLE",
  "GUEST",
  "ID",
  "OP:",
  "CASSA:",
  "IBAN",
  "N.CARTA",
  "CARD",
  "ACCT",
];

const SHARED_GRAMMAR_ORDER = [
  "D M YYYY",
  "D M YY",
  "M D YYYY",
  "M D YY",
  "MMM D YYYY",
  "MMM D YY",
  "MMMM D YYYY",
  "MMMM D YY",
  "MMMD YYYY",
  "MMMDYYYY",
] as const;

const ITALIAN_PROFILE: LocaleProfile = {
  locale: "IT",
  defaultCurrency: "EUR",
  vendorSuffixes: ["S.P.A", "S.R.L", "SRL", "SPA", "S.N.C", "SNC"],
  vendorSkipKeywords: [
    "DOCUMENTO",
    "COMMERCIALE",
    "SCONTRINO",
    "CLIENTE",
    "COPIA",
    "RT",
    "CASSA",
    "PAGAMENTO",
  ],
  datePatterns: [{ pattern: /\b(\d{2}\s*[/-]\s*\d{2}\s*[/-]\s*\d{2,4})\b/, token: "group" }],
  dateGrammarOrder: SHARED_GRAMMAR_ORDER,
  amountPattern: /(\d+[.,]\d{2})(?!["\d.,/])/g,
  totalKeywords: ["TOTALE", "IMPORTO", "PAGAMENTO", "CREDIT", "AMMOUNT"],
  cashKeywords: ["CONTANTI", "CONTANTE", "CASH", "VERSAMENTO"],
  ignoreKeywords: ["SUBTOTALE", "IMPONIBILE", "RESTO"],
  addressKeywords: [
    "VIA ",
    "VIALE ",
    "PIAZZA ",
    "CORSO ",
    "C.SO ",
    "VICOLO ",
    "LARGO ",
    "STRADA ",
    "P.ZZA ",
    "V. ",
  ],
  postalCodePattern: /\b\d{5}\b/,
  localityPattern: /\s\(?([A-Z]{2})\)?$/,
};

const ENGLISH_PROFILE: LocaleProfile = {
  locale: "EN",
  defaultCurrency: "USD",
  vendorSuffixes: ["INC", "LTD", "LLC", "CORP", "INC.", "LLC."],
  vendorSkipKeywords: [
    "RECEIPT",
    "GUEST",
    "CHECK",
    "TABLE",
    "SERVER",
    "ORDER",
    "WELCOME",
    "COPY",
    "MERCHANT",
  ],
  datePatterns: [
    { pattern: /\b(\d{1,2}\s*[/-]\s*\d{1,2}\s*[/-]\s*\d{4})/, token: "group" },
    { pattern: /\b(\d{1,2}\s*[/-]\s*\d{1,2}\s*[/-]\s*\d{2})\b/, token: "group" },
    {
      pattern: /(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s*(\d{1,2})[\s.,']*(\d{2,4})/i,
      token: "match",
    },
  ],
  dateGrammarOrder: SHARED_GRAMMAR_ORDER,
  amountPattern: /\$?\s*(\d+\.\d{2})(?!["\d.,/])/g,
  totalKeywords: ["TOTAL", "BALANCE", "AMOUNT", "DUE", "VISA", "CHARGE", "BILL", "TOTA"],
  cashKeywords: ["CASH", "TENDER", "PAID"],
  ignoreKeywords: ["SUBTOTAL", "SUB TOTAL", "TAX", "CHANGE", "TIP", "GRATUITY"],
  addressKeywords: [
    " AVE",
    " ST",
    " BLVD",
    " BL VD",
    " RD",
    " DRIVE",
    " LANE",
    " HIGHWAY",
    " PKWY",
    " WAY",
  ],
  postalCodePattern: /\b(?:[A-Z]{2}\s*)?\d{5}\b/,
  localityPattern: /\b[A-Z]{2}\s+\d{5}/,
};

const PROFILES: Readonly<Record<Locale, LocaleProfile>> = {
  IT: ITALIAN_PROFILE,
  EN: ENGLISH_PROFILE,
};

export function profileFor(locale: Locale): LocaleProfile {
  return PROFILES[locale];
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}
