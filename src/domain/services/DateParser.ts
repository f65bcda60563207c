import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

dayjs.extend(customParseFormat);

/**
 * Accepted statement date layouts, most preferred first. Month-first wins over day-first for
 * ambiguous values such as 03/04/2024.
 */
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'MM/DD/YY',
  'M/D/YY',
  'MM-DD-YYYY',
  'DD/MM/YYYY',
  'D/M/YYYY',
  'DD-MM-YYYY',
  'DD.MM.YYYY',
  'D MMM YYYY',
  'DD MMM YYYY',
  'D MMMM YYYY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'D-MMM-YYYY',
  'DD-MMM-YY',
];

const YEARLESS_FORMATS: readonly string[] = ['MM/DD', 'M/D', 'D MMM', 'DD MMM', 'MMM D'];

// Strict parsing compares against dayjs's own rendering, so "JAN"/"jan" become "Jan".
const titleCaseWords = (value: string): string =>
  value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export interface DateParseOptions {
  formats?: readonly string[];
  referenceYear?: number;
}

export const parseStatementDate = (input: string, options: DateParseOptions = {}): string | null => {
  const value = titleCaseWords(input.trim().replace(/\s+/g, ' '));
  if (!value) {
    return null;
  }

  for (const format of options.formats ?? DEFAULT_DATE_FORMATS) {
    const parsed = dayjs(value, format, true);
    if (parsed.isValid()) {
      return parsed.format('YYYY-MM-DD');
    }
  }

  if (options.referenceYear !== undefined) {
    for (const format of YEARLESS_FORMATS) {
      const parsed = dayjs(`${value} ${options.referenceYear}`, `${format} YYYY`, true);
      if (parsed.isValid()) {
        return parsed.format('YYYY-MM-DD');
      }
    }
  }

  return null;
};
