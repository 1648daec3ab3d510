const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

// e.g. "2020-Jan-01 12:00", as the close approach data files write it
const CALENDAR_DATE = /^(\d{4})-([A-Za-z]{3})-(\d{1,2}) (\d{1,2}):(\d{2})$/;

/** Error for a calendar date string that does not parse */
export class DateFormatError extends Error {
  readonly value: string;

  constructor(value: string, reason: string) {
    super(`Invalid calendar date "${value}": ${reason}`);
    this.name = "DateFormatError";
    this.value = value;
  }
}

/**
 * Parse a calendar date string ("YYYY-Mon-DD HH:MM") as a UTC date
 */
export function cdToDate(value: string): Date {
  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) {
    throw new DateFormatError(value, "expected YYYY-Mon-DD HH:MM");
  }

  const [, yearText = "", monthText = "", dayText = "", hourText = "", minuteText = ""] = match;
  const month = MONTHS.indexOf(monthText.toLowerCase());
  if (month < 0) {
    throw new DateFormatError(value, `unknown month "${monthText}"`);
  }

  const year = Number(yearText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  if (hour > 23 || minute > 59) {
    throw new DateFormatError(value, "time out of range");
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, 0, 0);

  // Date rolls overflowing days into the next month; reject those
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new DateFormatError(value, "day out of range");
  }

  return date;
}

/**
 * Format a date as "YYYY-MM-DD HH:MM" in UTC.
 * Seconds are dropped; the source data has none.
 */
export function dateToString(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  return (
    `${year}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}
