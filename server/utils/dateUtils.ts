// Billing dates are stored and computed in UTC.

export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function laterOf(a: Date | null, b: Date): Date {
  if (!a) return b;
  return a.getTime() > b.getTime() ? a : b;
}

function daysInUtcMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Calendar-month addition that clamps to the last day of the target month,
 * so Jan 31 + 1 month is Feb 28 (or Feb 29 in a leap year). The time of day
 * is preserved.
 */
export function addMonthsClamped(date: Date, months: number): Date {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(totalMonths / 12);
  const monthIndex = totalMonths - year * 12;
  const day = Math.min(date.getUTCDate(), daysInUtcMonth(year, monthIndex));

  return new Date(Date.UTC(
    year,
    monthIndex,
    day,
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    date.getUTCMilliseconds(),
  ));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

export function toIsoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
