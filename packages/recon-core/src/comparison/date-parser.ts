/**
 * Date parsing for free-form term sheet and booking dates
 */

const MS_PER_DAY = 86_400_000;

type DatePattern = {
  name: string;
  regex: RegExp;
  order: 'ymd' | 'dmy' | 'mdy';
};

/** Tried in order; the first pattern that yields a real calendar date wins */
export const DATE_PATTERNS: readonly DatePattern[] = [
  { name: 'YYYY-MM-DD', regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'ymd' },
  { name: 'DD-MM-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'dmy' },
  { name: 'MM-DD-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'mdy' },
  { name: 'YYYY/MM/DD', regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'ymd' },
  { name: 'DD/MM/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'dmy' },
  { name: 'MM/DD/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'mdy' },
];

function toUtcDate(year: number, month: number, day: number): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

/**
 * Remove everything except digits and the separators `-`, `/` and `.`
 */
export function cleanDateText(text: string): string {
  return text.trim().replace(/[^0-9\-/.]/g, '');
}

/**
 * Parse a date string against DATE_PATTERNS. Returns a UTC midnight Date, or
 * `undefined` when no pattern produces a valid calendar date.
 */
export function parseDate(text: string): Date | undefined {
  const cleaned = cleanDateText(text);

  for (const pattern of DATE_PATTERNS) {
    const m = pattern.regex.exec(cleaned);
    if (!m) continue;

    const a = Number(m[1]);
    const b = Number(m[2]);
    const c = Number(m[3]);

    let date: Date | undefined;
    switch (pattern.order) {
      case 'ymd':
        date = toUtcDate(a, b, c);
        break;
      case 'dmy':
        date = toUtcDate(c, b, a);
        break;
      case 'mdy':
        date = toUtcDate(c, a, b);
        break;
    }

    if (date) return date;
  }

  return undefined;
}

/** Whole days between two UTC dates, always >= 0 */
export function daysBetween(a: Date, b: Date): number {
  return Math.abs(Math.round((a.getTime() - b.getTime()) / MS_PER_DAY));
}
