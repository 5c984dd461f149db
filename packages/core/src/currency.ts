/**
 * Fiat currencies recognised when classifying received coins.
 */
const FIAT_CURRENCIES = new Set([
  'USD', // United States Dollar
  'EUR', // Euro
  'GBP', // British Pound
  'JPY', // Japanese Yen
  'CHF', // Swiss Franc
  'CAD', // Canadian Dollar
  'AUD', // Australian Dollar
  'NZD', // New Zealand Dollar
  'SEK', // Swedish Krona
  'NOK', // Norwegian Krone
  'DKK', // Danish Krone
  'PLN', // Polish Zloty
  'CZK', // Czech Koruna
  'HUF', // Hungarian Forint
  'RON', // Romanian Leu
  'BGN', // Bulgarian Lev
  'TRY', // Turkish Lira
  'SGD', // Singapore Dollar
  'HKD', // Hong Kong Dollar
  'KRW', // South Korean Won
]);

/**
 * Normalize a currency or coin symbol: trimmed, upper-case.
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/** True if the symbol is a known fiat currency */
export const isFiat = (symbol: string): boolean => FIAT_CURRENCIES.has(normalizeSymbol(symbol));
