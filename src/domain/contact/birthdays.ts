// Domain: Upcoming birthday window
// Month/day comparison on a circular calendar; the window may cross the year boundary

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Day number (UTC midnight based) of a month/day in a given year.
 * Feb 29 falls back to Feb 28 in non-leap years.
 */
function dayNumber(year: number, monthIndex: number, day: number): number {
  const observedDay = monthIndex === 1 && day === 29 && !isLeapYear(year) ? 28 : day;
  return Date.UTC(year, monthIndex, observedDay) / MS_PER_DAY;
}

/**
 * Parse a YYYY-MM-DD string into month index and day
 */
export function parseCalendarDate(value: string): { year: number; monthIndex: number; day: number } | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, monthIndex, day));

  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== monthIndex || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, monthIndex, day };
}

/**
 * Days from `today` until the next occurrence of the birthday's month/day
 * (0 when it is today). Returns null for an unparseable birthday.
 */
export function daysUntilBirthday(birthday: string, today: Date): number | null {
  const parsed = parseCalendarDate(birthday);
  if (!parsed) return null;

  const year = today.getFullYear();
  const start = dayNumber(year, today.getMonth(), today.getDate());

  let next = dayNumber(year, parsed.monthIndex, parsed.day);
  if (next < start) {
    next = dayNumber(year + 1, parsed.monthIndex, parsed.day);
  }
  return next - start;
}

/**
 * Select items whose birthday falls in the closed window [today, today + days],
 * ordered by how soon the birthday comes.
 */
export function selectUpcomingBirthdays<T extends { id: number; birthday: string }>(
  items: readonly T[],
  days: number,
  today: Date
): T[] {
  const ranked: Array<{ item: T; offset: number }> = [];

  for (const item of items) {
    const offset = daysUntilBirthday(item.birthday, today);
    if (offset !== null && offset <= days) {
      ranked.push({ item, offset });
    }
  }

  ranked.sort((a, b) => a.offset - b.offset || a.item.id - b.item.id);
  return ranked.map(({ item }) => item);
}
