import type { ClassificationResult, DateKey } from '../types';

/**
 * Lenient date pattern: any alphabetic abbreviation, then year, month and day,
 * separated and terminated by `_` or `-`. Month and day may be one or two digits.
 */
const LENIENT_DATE_PATTERN = /([A-Za-z]+)[_-](\d{4})[_-](\d{1,2})[_-](\d{1,2})[_-]/;

/**
 * Strict pattern of the standard naming convention: XXX_YYYY_MM_DD_
 */
const STRICT_DATE_PATTERN = /[A-Z]{3}_\d{4}_\d{2}_\d{2}_/;

const STANDARD_ABBREVIATION = /^[A-Z]{3}$/;

/**
 * Extracts the date from a filename and decides whether the name follows the
 * standard convention.
 * Examples:
 * - "ABC_2021_03_05_0001.tif" → 2021-03-05, standard
 * - "abc-2021-3-5-0001.tif" → 2021-03-05, non-standard
 * - "readme.txt" → no match
 */
export function classify(filename: string): ClassificationResult {
  const match = LENIENT_DATE_PATTERN.exec(filename);
  if (!match) {
    return { matched: false };
  }

  const [, abbreviation, year, month, day] = match;

  return {
    matched: true,
    dateKey: toDateKey(year, month, day),
    isStandard: isStandardFormat(abbreviation, filename),
    abbreviation,
  };
}

/**
 * Checks the standard convention XXX_YYYY_MM_DD_NNNN.tif against the whole filename.
 * The strict pattern is searched independently of the lenient match.
 */
export function isStandardFormat(abbreviation: string, filename: string): boolean {
  if (!STANDARD_ABBREVIATION.test(abbreviation)) {
    return false;
  }

  if (filename.includes('-')) {
    return false;
  }

  return STRICT_DATE_PATTERN.test(filename);
}

/**
 * Zero-pads month and day. No calendar validation: "13" stays "13".
 */
export function toDateKey(year: string, month: string, day: string): DateKey {
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}
