/**
 * Calendar dates as used in datastore names: UTC, `YYYYMMDD`.
 */

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

export function formatCompactDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}`;
}

/** `YYYY/MM` */
export function yearMonthFolder(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}/${pad(date.getUTCMonth() + 1, 2)}`;
}

/** `YYYY/MM/DD` */
export function yearMonthDayFolder(date: Date): string {
  return `${yearMonthFolder(date)}/${pad(date.getUTCDate(), 2)}`;
}

/**
 * Parse `YYYYMMDD`. Returns undefined for anything that is not a real calendar
 * day (e.g. `20250231`), so recognizers can reject the name instead of rolling over.
 */
export function parseCompactDate(text: string): Date | undefined {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  if (!match) return undefined;

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = utcDate(year, month, day);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/** Day-of-year form used by attitude kernels: year + 1-based ordinal day. */
export function dateFromDayOfYear(year: number, dayOfYear: number): Date | undefined {
  if (dayOfYear < 1 || dayOfYear > 366) return undefined;
  const date = new Date(Date.UTC(year, 0, dayOfYear));
  return date.getUTCFullYear() === year ? date : undefined;
}

export function sameDate(a: Date | undefined, b: Date | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.getTime() === b.getTime();
}
