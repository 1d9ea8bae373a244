import {
  ageGroupForAge,
  ageGroupOnDate,
  ageOnDate,
  birthDateBounds,
  fullName,
  todayIsoDate,
  toSwimmerResponse,
} from '../../src/domain/swimmers.js';
import type { SwimmerRow } from '../../src/types.js';

describe('ageOnDate', () => {
  it('counts the birthday once it has happened', () => {
    expect(ageOnDate('2012-06-15', '2025-06-14')).toBe(12);
    expect(ageOnDate('2012-06-15', '2025-06-15')).toBe(13);
    expect(ageOnDate('2012-06-15', '2025-12-01')).toBe(13);
  });

  it('handles leap-day birthdays', () => {
    expect(ageOnDate('2012-02-29', '2025-02-28')).toBe(12);
    expect(ageOnDate('2012-02-29', '2025-03-01')).toBe(13);
  });
});

describe('age groups', () => {
  it.each([
    [8, '10U'],
    [10, '10U'],
    [11, '11-12'],
    [12, '11-12'],
    [14, '13-14'],
    [15, '15-16'],
    [18, '17-18'],
    [19, 'Open'],
    [35, 'Open'],
  ])('age %i is %s', (age, group) => {
    expect(ageGroupForAge(age)).toBe(group);
  });

  it('evaluates the group on a given date', () => {
    expect(ageGroupOnDate('2014-08-01', '2025-07-31')).toBe('10U');
    expect(ageGroupOnDate('2014-08-01', '2025-08-01')).toBe('11-12');
  });
});

describe('birthDateBounds', () => {
  it('turns an age range into birth-date bounds', () => {
    expect(birthDateBounds('2025-06-15', 11, 12)).toEqual({
      bornOnOrBefore: '2014-06-15',
      bornOnOrAfter: '2012-06-16',
    });
  });

  it('leaves out missing bounds', () => {
    expect(birthDateBounds('2025-06-15')).toEqual({ bornOnOrBefore: undefined, bornOnOrAfter: undefined });
  });

  it('clamps leap days', () => {
    expect(birthDateBounds('2024-02-29', 1, 0)).toEqual({
      bornOnOrBefore: '2023-02-28',
      bornOnOrAfter: '2023-03-01',
    });
  });
});

describe('swimmer responses', () => {
  const swimmer: SwimmerRow = {
    id: 'sw1',
    first_name: 'Ava',
    last_name: 'Reyes',
    date_of_birth: '2012-03-10',
    gender: 'F',
    user_id: null,
    usa_swimming_id: 'TESTID0001',
    swimcloud_url: null,
  };

  it('adds name, age and age group', () => {
    expect(fullName(swimmer)).toBe('Ava Reyes');
    expect(toSwimmerResponse(swimmer, '2025-03-09')).toEqual({
      ...swimmer,
      full_name: 'Ava Reyes',
      age: 12,
      age_group: '11-12',
    });
  });

  it('formats today as an ISO date', () => {
    expect(todayIsoDate(new Date(Date.UTC(2025, 4, 7, 23, 0)))).toBe('2025-05-07');
  });
});
