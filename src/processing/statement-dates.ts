/**
 * Date and period-length parsing for statement headers.
 * Dates are returned as UTC midnight so serialization is timezone-free.
 */

const MONTHS = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
];

/** Full month names and their abbreviations, never a longer word that starts like one */
const MONTH_NAME =
  '(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?' +
  '|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';

/** "Dec. 29, 2018", "Sept. 30, 2017", "September 29, 2018" */
const DATE_PATTERN = new RegExp(`\\b${MONTH_NAME}\\.?\\s+(\\d{1,2}),\\s*(\\d{4})\\b`, 'i');

export const DATE_PATTERN_GLOBAL = new RegExp(DATE_PATTERN.source, 'gi');

export function parseStatementDate(text: string): Date | null {
  const match = text.match(DATE_PATTERN);
  if (!match) return null;

  const monthIndex = MONTHS.indexOf(match[1].slice(0, 3).toLowerCase());
  if (monthIndex === -1) return null;

  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, monthIndex, day));
  // Reject rollovers such as Feb. 30
  if (date.getUTCDate() !== day) return null;
  return date;
}

/** All dates in a text, in order of appearance */
export function findStatementDates(text: string): Date[] {
  const dates: Date[] = [];
  for (const match of text.matchAll(DATE_PATTERN_GLOBAL)) {
    const date = parseStatementDate(match[0]);
    if (date) dates.push(date);
  }
  return dates;
}

/** "12 Months Ended" → 12; null when the text has no digits */
export function parsePeriodMonths(text: string): number | null {
  const digits = text.replace(/[^0-9]/g, '');
  return digits === '' ? null : parseInt(digits, 10);
}

const NUMBER_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6,
  seven: 7, eight: 8, nine: 9, ten: 10, eleven: 11, twelve: 12,
};

/**
 * Reads an explicit "<N> Months Ended" declaration, with N in words
 * ("Three Months Ended") or digits ("3 Months Ended").
 */
export function findDeclaredMonths(text: string): number | null {
  const match = text.match(/\b([A-Za-z]+|\d{1,2})\s+months\s+ended\b/i);
  if (!match) return null;
  const token = match[1].toLowerCase();
  if (/^\d+$/.test(token)) return parseInt(token, 10);
  return NUMBER_WORDS[token] ?? null;
}
