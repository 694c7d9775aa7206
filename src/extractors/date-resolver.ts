import { logger } from '../utils/logger';

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december'
];

const MONTH_ABBREVIATIONS = MONTH_NAMES.map(name => name.slice(0, 3));

// Matches dates like "November 14, 2025" inside running text
export const LONG_DATE_PATTERN =
  /(January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2},\s+\d{4}/;

export interface ResolvedDate {
  date: Date;
  resolved: boolean;
  format?: DateFormat['name'];
}

interface DateFormat {
  name: 'long-month' | 'short-month' | 'iso';
  parse(input: string): Date | null;
}

/** Builds a UTC midnight date, or null when the parts do not form a real calendar day. */
function utcDate(year: number, monthIndex: number, day: number): Date | null {
  if (monthIndex < 0 || monthIndex > 11) return null;
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function monthDayYear(name: DateFormat['name'], months: string[]): DateFormat {
  const pattern = /^([a-z]+)\s+(\d{1,2}),\s+(\d{4})$/i;
  return {
    name,
    parse(input) {
      const match = input.match(pattern);
      if (!match) return null;
      const monthIndex = months.indexOf(match[1].toLowerCase());
      return utcDate(Number(match[3]), monthIndex, Number(match[2]));
    }
  };
}

const isoDate: DateFormat = {
  name: 'iso',
  parse(input) {
    const match = input.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
    if (!match) return null;
    return utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  }
};

// Tried in order; the first format that parses wins
const DATE_FORMATS: readonly DateFormat[] = [
  monthDayYear('long-month', MONTH_NAMES),
  monthDayYear('short-month', MONTH_ABBREVIATIONS),
  isoDate
];

/**
 * Resolve a free-text date snippet to a UTC timestamp.
 * Never throws: anything unparseable resolves to the current time with `resolved: false`.
 */
export function resolveDate(
  snippet: string | null | undefined,
  now: () => Date = () => new Date()
): ResolvedDate {
  if (!snippet || !snippet.trim()) {
    return { date: now(), resolved: false };
  }

  try {
    const input = snippet.trim();
    for (const format of DATE_FORMATS) {
      const date = format.parse(input);
      if (date) {
        return { date, resolved: true, format: format.name };
      }
    }

    logger.warn(`Could not parse date: ${snippet}`);
    return { date: now(), resolved: false };
  } catch (error) {
    logger.error(`Date parsing error for "${snippet}"`, error);
    return { date: now(), resolved: false };
  }
}
