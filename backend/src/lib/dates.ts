import { DateTime } from 'luxon';
import type { CalendarDate } from '../models/structures';

const CALENDAR_FORMAT = 'yyyy-MM-dd';

function fromCalendarDate(date: CalendarDate): DateTime {
  return DateTime.fromISO(date, { zone: 'utc' });
}

// UTC calendar date of an instant
export function toCalendarDate(instant: Date): CalendarDate {
  return DateTime.fromJSDate(instant, { zone: 'utc' }).toFormat(CALENDAR_FORMAT);
}

// Whole days from start to end (negative when end is earlier)
export function daysBetween(start: CalendarDate, end: CalendarDate): number {
  return Math.round(fromCalendarDate(end).diff(fromCalendarDate(start), 'days').days);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromCalendarDate(date).plus({ days }).toFormat(CALENDAR_FORMAT);
}
