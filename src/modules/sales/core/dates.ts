import { format, isValid, parse } from 'date-fns';

const TIME_SUFFIXES = ['', ' HH:mm', ' HH:mm:ss'] as const;

// Two-digit years come first: `yyyy` would otherwise accept `24` as year 24.
const DAY_FIRST_FORMATS = ['/', '-', '.'].flatMap((sep) =>
  ['yy', 'yyyy'].flatMap((year) =>
    TIME_SUFFIXES.map((time) => `d${sep}M${sep}${year}${time}`)
  )
);

const ISO_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy/MM/dd',
];

const SALE_DATE_FORMATS: readonly string[] = [...DAY_FIRST_FORMATS, ...ISO_FORMATS];

// Fixed reference so two-digit years resolve the same way on every run (1950-2049).
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a sale date with the day before the month. Returns null when no
 * accepted shape matches or the calendar date does not exist.
 */
export const parseSaleDate = (value: string | null | undefined): Date | null => {
  if (value === null || value === undefined) return null;

  const text = value.trim();
  if (text === '') return null;

  for (const pattern of SALE_DATE_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
};

/** `yyyy-MM-dd` in local time */
export const formatDay = (date: Date): string => format(date, 'yyyy-MM-dd');

/** `yyyy-MM` in local time */
export const formatMonth = (date: Date): string => format(date, 'yyyy-MM');

/** `yyyy-MM-dd HH:mm:ss` in local time; re-parses with `parseSaleDate` */
export const formatTimestamp = (date: Date): string => format(date, 'yyyy-MM-dd HH:mm:ss');
