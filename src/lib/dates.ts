// Calendar dates are "YYYY-MM-DD" strings in UTC, so they compare lexically.
export type CalendarDate = string;

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;
export type Weekday = (typeof WEEKDAYS)[number];

const MS_PER_MINUTE = 60_000;

export const toCalendarDate = (date: Date): CalendarDate => {
  return date.toISOString().slice(0, 10);
};

const fromCalendarDate = (day: CalendarDate) => {
  return new Date(`${day}T00:00:00.000Z`);
};

export const addDays = (day: CalendarDate, days: number): CalendarDate => {
  const date = fromCalendarDate(day);
  date.setUTCDate(date.getUTCDate() + days);
  return toCalendarDate(date);
};

export const addMinutes = (date: Date, minutes: number) => {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
};

// Monday is 0, Sunday is 6.
export const weekdayIndex = (day: CalendarDate) => {
  return (fromCalendarDate(day).getUTCDay() + 6) % 7;
};

export const startOfIsoWeek = (day: CalendarDate): CalendarDate => {
  return addDays(day, -weekdayIndex(day));
};

export const isCalendarDate = (value: string) => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const date = fromCalendarDate(value);
  return !Number.isNaN(date.getTime()) && toCalendarDate(date) === value;
};
