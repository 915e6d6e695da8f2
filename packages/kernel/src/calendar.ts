export const MILLISECONDS_IN_DAY = 24 * 60 * 60 * 1000;
export const MILLISECONDS_IN_HOUR = 60 * 60 * 1000;

// All day arithmetic runs on local wall-clock midnights, so a day is not
// always MILLISECONDS_IN_DAY long.

export function startOfDay(input: Date | number): Date {
  const date = new Date(input);
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function shiftDay(day: Date, deltaDays: number): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate() + deltaDays);
}

export function startOfWeek(input: Date | number): Date {
  const day = startOfDay(input);
  const weekday = day.getDay() || 7;
  return shiftDay(day, 1 - weekday);
}

export function isWeekend(day: Date): boolean {
  const weekday = day.getDay();
  return weekday === 0 || weekday === 6;
}

export function formatYYYYMMDD(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

export function parseYYYYMMDD(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error("Day must be YYYY-MM-DD");
  }
  const [, yearPart, monthPart, dayPart] = match;
  const date = new Date(Number(yearPart), Number(monthPart) - 1, Number(dayPart));
  if (formatYYYYMMDD(date) !== value.trim()) {
    throw new Error(`Not a calendar day: ${value}`);
  }
  return date;
}

export function getISOWeek(date: Date): { year: number; week: number } {
  const target = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  const day = target.getUTCDay() || 7;
  target.setUTCDate(target.getUTCDate() + 4 - day);
  const year = target.getUTCFullYear();
  const yearStart = new Date(Date.UTC(year, 0, 1));
  const week = Math.ceil(((target.getTime() - yearStart.getTime()) / MILLISECONDS_IN_DAY + 1) / 7);
  return { year, week };
}

export function getISOWeekIdFromDate(date: Date): string {
  const { year, week } = getISOWeek(date);
  return `${year}-${String(week).padStart(2, "0")}`;
}
