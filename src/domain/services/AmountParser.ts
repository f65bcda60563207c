export interface ParsedAmount {
  minor: number;
  currency?: string;
}

const currencySymbols: Record<string, string> = {
  $: 'USD',
  '£': 'GBP',
  '€': 'EUR',
  '¥': 'JPY',
  '₹': 'INR',
};

const currencyCodes = /\b(USD|EUR|GBP|CAD|AUD|NZD|CHF|JPY|INR|SGD|HKD|ZAR|MXN)\b/i;
const symbolPattern = /[$£€¥₹]/;
const creditMarker = /\bCR\b/i;
const debitMarker = /\bDR\b/i;

/**
 * Parses a statement amount into integer minor units without going through floating point.
 * Returns null for anything that is not a single monetary value.
 */
export const parseAmount = (input: string, minorDigits = 2): ParsedAmount | null => {
  let text = input.trim();
  if (!text) {
    return null;
  }

  let currency: string | undefined;
  const codeMatch = text.match(currencyCodes);
  if (codeMatch) {
    currency = codeMatch[1].toUpperCase();
    text = text.replace(currencyCodes, '');
  }

  const symbolMatch = text.match(symbolPattern);
  if (symbolMatch) {
    currency = currency ?? currencySymbols[symbolMatch[0]];
  }

  const isCredit = creditMarker.test(text);
  const isDebit = debitMarker.test(text);
  text = text.replace(creditMarker, '').replace(debitMarker, '');
  text = text.replace(/[$£€¥₹\s ]/g, '');

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1);
  } else if (text.startsWith('+')) {
    text = text.slice(1);
  }
  if (text.endsWith('-')) {
    negative = !negative;
    text = text.slice(0, -1);
  }

  const split = splitDecimal(text);
  if (!split) {
    return null;
  }

  const fraction = split.fraction.padEnd(minorDigits, '0');
  if (fraction.length > minorDigits) {
    return null;
  }

  const minor = Number(split.integer || '0') * 10 ** minorDigits + Number(fraction || '0');
  if (!Number.isSafeInteger(minor)) {
    return null;
  }

  if (isDebit) {
    negative = true;
  } else if (isCredit) {
    negative = false;
  }

  return { minor: negative && minor !== 0 ? -minor : minor, currency };
};

const splitDecimal = (text: string): { integer: string; fraction: string } | null => {
  if (!/^[\d.,']+$/.test(text) || !/\d/.test(text)) {
    return null;
  }

  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');
  let decimalSeparator: '.' | ',' | null = null;

  if (lastDot >= 0 && lastComma >= 0) {
    decimalSeparator = lastDot > lastComma ? '.' : ',';
  } else if (lastDot >= 0) {
    decimalSeparator = isGroupedThousands(text, '.') ? null : '.';
  } else if (lastComma >= 0) {
    decimalSeparator = /,\d{1,2}$/.test(text) && !isGroupedThousands(text, ',') ? ',' : null;
  }

  let integer = text;
  let fraction = '';
  if (decimalSeparator) {
    const index = text.lastIndexOf(decimalSeparator);
    integer = text.slice(0, index);
    fraction = text.slice(index + 1);
  }

  integer = integer.replace(/[.,']/g, '');
  if (!/^\d*$/.test(integer) || !/^\d*$/.test(fraction)) {
    return null;
  }

  return { integer, fraction };
};

// "1.234.567" and "1,234" read as grouped thousands rather than decimals.
const isGroupedThousands = (text: string, separator: '.' | ','): boolean => {
  const escaped = separator === '.' ? '\\.' : ',';
  const grouped = new RegExp(`^\\d{1,3}(${escaped}\\d{3})+$`);
  if (separator === '.') {
    return grouped.test(text) && text.split('.').length > 2;
  }
  return grouped.test(text);
};

export const formatMinor = (minor: number, minorDigits = 2): string => {
  const sign = minor < 0 ? '-' : '';
  const absolute = Math.abs(minor);
  const divisor = 10 ** minorDigits;
  const integer = Math.floor(absolute / divisor);
  const fraction = String(absolute % divisor).padStart(minorDigits, '0');
  return `${sign}${integer}.${fraction}`;
};
