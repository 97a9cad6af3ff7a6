export interface CompactDate {
  year: number;
  month: number;
  day: number;
}

const COMPACT_DATE = /^\d{8}$/;

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return MONTH_DAYS[month - 1];
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

/**
 * Parses a proleptic Gregorian `YYYYMMDD` string. Returns `undefined` for
 * anything that is not exactly eight digits or does not name a real day.
 */
export function parseCompactDate(value: string): CompactDate | undefined {
  if (!COMPACT_DATE.test(value)) {
    return undefined;
  }

  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(4, 6));
  const day = Number(value.slice(6, 8));

  if (month < 1 || month > 12) {
    return undefined;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  return { year, month, day };
}

/** 1-based ordinal of the date within its year. */
export function dayOfYear(date: CompactDate): number {
  let ordinal = date.day;
  for (let month = 1; month < date.month; month++) {
    ordinal += daysInMonth(date.year, month);
  }
  return ordinal;
}

export function fromDayOfYear(year: number, ordinal: number): CompactDate {
  if (ordinal < 1 || ordinal > daysInYear(year)) {
    throw new RangeError(`Day ${ordinal} is outside of year ${year}`);
  }

  let remaining = ordinal;
  let month = 1;
  while (remaining > daysInMonth(year, month)) {
    remaining -= daysInMonth(year, month);
    month++;
  }
  return { year, month, day: remaining };
}
