import type { SwimmerRow } from '../types.js';

export type AgeGroup = '10U' | '11-12' | '13-14' | '15-16' | '17-18' | 'Open';

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

export function parseCalendarDate(value: string): CalendarDate {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new Error(`Invalid date: '${value}'`);
  }
  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
}

export function todayIsoDate(now = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function ageOnDate(dateOfBirth: string, onDate: string): number {
  const dob = parseCalendarDate(dateOfBirth);
  const target = parseCalendarDate(onDate);
  const birthdayPassed = target.month > dob.month || (target.month === dob.month && target.day >= dob.day);
  return target.year - dob.year - (birthdayPassed ? 0 : 1);
}

export function ageGroupForAge(age: number): AgeGroup {
  if (age <= 10) return '10U';
  if (age <= 12) return '11-12';
  if (age <= 14) return '13-14';
  if (age <= 16) return '15-16';
  if (age <= 18) return '17-18';
  return 'Open';
}

export function ageGroupOnDate(dateOfBirth: string, onDate: string): AgeGroup {
  return ageGroupForAge(ageOnDate(dateOfBirth, onDate));
}

/**
 * Birth-date bounds for an age filter evaluated on `onDate`: someone aged at
 * least `minAge` was born on or before the returned `bornOnOrBefore`.
 */
export function birthDateBounds(onDate: string, minAge?: number, maxAge?: number) {
  const target = parseCalendarDate(onDate);
  const shift = (years: number) => {
    const year = target.year - years;
    // Feb 29 falls back to Feb 28 in non-leap years.
    const lastDay = new Date(Date.UTC(year, target.month, 0)).getUTCDate();
    const shifted = new Date(Date.UTC(year, target.month - 1, Math.min(target.day, lastDay)));
    return shifted.toISOString().slice(0, 10);
  };
  const dayAfter = (iso: string) => {
    const date = new Date(`${iso}T00:00:00Z`);
    date.setUTCDate(date.getUTCDate() + 1);
    return date.toISOString().slice(0, 10);
  };

  return {
    bornOnOrBefore: minAge === undefined ? undefined : shift(minAge),
    bornOnOrAfter: maxAge === undefined ? undefined : dayAfter(shift(maxAge + 1)),
  };
}

export function fullName(swimmer: Pick<SwimmerRow, 'first_name' | 'last_name'>) {
  return `${swimmer.first_name} ${swimmer.last_name}`;
}

export function toSwimmerResponse(swimmer: SwimmerRow, today = todayIsoDate()) {
  return {
    ...swimmer,
    full_name: fullName(swimmer),
    age: ageOnDate(swimmer.date_of_birth, today),
    age_group: ageGroupOnDate(swimmer.date_of_birth, today),
  };
}
