import {
  ageGroupIncludes,
  applicableStandards,
  buildSwimmerReport,
  evaluateTime,
  isStandardApplicable,
  isWithinQualifyingWindow,
} from '../../src/domain/qualification.js';
import type { EventRow, SwimTimeRow, TimeStandardRow } from '../../src/types.js';

function standard(overrides: Partial<TimeStandardRow>): TimeStandardRow {
  return {
    id: 'ts1',
    event_id: 'free100y',
    gender: 'F',
    age_group: null,
    standard_name: 'Winter Juniors',
    cut_level: 'JR',
    sanctioning_body: 'USA Swimming',
    time_centiseconds: 5000,
    qualifying_start: null,
    qualifying_end: null,
    effective_year: 2025,
    ...overrides,
  };
}

function swim(overrides: Partial<SwimTimeRow>): SwimTimeRow {
  return {
    id: 'st1',
    swimmer_id: 'sw1',
    event_id: 'free100y',
    meet_id: 'me1',
    team_id: 'tm1',
    time_centiseconds: 5000,
    swim_date: '2025-03-01',
    round: null,
    lane: null,
    place: null,
    official: true,
    dq: false,
    dq_reason: null,
    suit_id: null,
    ...overrides,
  };
}

describe('ageGroupIncludes', () => {
  it('treats null and Open as any age', () => {
    expect(ageGroupIncludes(null, 9)).toBe(true);
    expect(ageGroupIncludes('Open', 40)).toBe(true);
    expect(ageGroupIncludes('open', 12)).toBe(true);
  });

  it.each([
    ['10U', 10, true],
    ['10U', 11, false],
    ['10-under', 9, true],
    ['10 & under', 10, true],
    ['11-12', 11, true],
    ['11-12', 12, true],
    ['11-12', 13, false],
    ['15-18', 17, true],
    ['15-over', 15, true],
    ['15-over', 14, false],
    ['15+', 22, true],
    ['15 & over', 14, false],
  ])('%s includes age %i: %s', (label, age, expected) => {
    expect(ageGroupIncludes(label, age)).toBe(expected);
  });

  it('falls back to the computed age-group label', () => {
    expect(ageGroupIncludes('Seniors', 15)).toBe(false);
  });
});

describe('isWithinQualifyingWindow', () => {
  const window = { qualifying_start: '2024-09-01', qualifying_end: '2025-08-31' };

  it('includes both ends', () => {
    expect(isWithinQualifyingWindow(window, '2024-09-01')).toBe(true);
    expect(isWithinQualifyingWindow(window, '2025-08-31')).toBe(true);
  });

  it('excludes dates outside the window', () => {
    expect(isWithinQualifyingWindow(window, '2024-08-31')).toBe(false);
    expect(isWithinQualifyingWindow(window, '2025-09-01')).toBe(false);
  });

  it('treats a missing bound as open', () => {
    expect(isWithinQualifyingWindow({ qualifying_start: null, qualifying_end: '2025-01-01' }, '1999-01-01')).toBe(true);
    expect(isWithinQualifyingWindow({ qualifying_start: '2025-01-01', qualifying_end: null }, '2030-01-01')).toBe(true);
  });
});

describe('isStandardApplicable', () => {
  const criteria = { eventId: 'free100y', gender: 'F' as const, age: 12, swimDate: '2025-03-01' };

  it('matches event, gender, age group and window', () => {
    expect(isStandardApplicable(standard({ age_group: '11-12' }), criteria)).toBe(true);
    expect(isStandardApplicable(standard({ event_id: 'back100y' }), criteria)).toBe(false);
    expect(isStandardApplicable(standard({ gender: 'M' }), criteria)).toBe(false);
    expect(isStandardApplicable(standard({ age_group: '13-14' }), criteria)).toBe(false);
    expect(isStandardApplicable(standard({ qualifying_end: '2025-02-28' }), criteria)).toBe(false);
  });

  it('compares body and standard name case-insensitively', () => {
    expect(isStandardApplicable(standard({}), { ...criteria, sanctioningBody: 'usa swimming' })).toBe(true);
    expect(isStandardApplicable(standard({}), { ...criteria, sanctioningBody: 'NCAA' })).toBe(false);
    expect(isStandardApplicable(standard({}), { ...criteria, standardName: 'winter juniors' })).toBe(true);
  });

  it('filters a list', () => {
    const list = [standard({ id: 'a' }), standard({ id: 'b', gender: 'M' })];
    expect(applicableStandards(list, criteria).map((entry) => entry.id)).toEqual(['a']);
  });
});

describe('evaluateTime', () => {
  const standards = [
    standard({ id: 'bb', cut_level: 'BB', time_centiseconds: 6500 }),
    standard({ id: 'aaaa', cut_level: 'AAAA', time_centiseconds: 5600 }),
    standard({ id: 'a', cut_level: 'A', time_centiseconds: 6000 }),
    standard({ id: 'aa', cut_level: 'AA', time_centiseconds: 5800 }),
  ];

  it('sorts hardest cut first and scores each standard', () => {
    const result = evaluateTime(5900, standards);
    expect(result.standards.map((entry) => [entry.standard.id, entry.achieved, entry.margin_centiseconds])).toEqual([
      ['aaaa', false, 300],
      ['aa', false, 100],
      ['a', true, -100],
      ['bb', true, -600],
    ]);
    expect(result.time_formatted).toBe('59.00');
    expect(result.valid).toBe(true);
  });

  it('picks the best achieved and the next standard', () => {
    const result = evaluateTime(5900, standards);
    expect(result.best_achieved?.standard.id).toBe('a');
    expect(result.next_standard?.standard.id).toBe('aa');
    expect(result.next_standard?.margin_seconds).toBeCloseTo(1, 5);
  });

  it('achieves a cut at exactly the standard time', () => {
    const result = evaluateTime(5800, standards);
    expect(result.best_achieved?.standard.id).toBe('aa');
    expect(result.next_standard?.standard.id).toBe('aaaa');
  });

  it('has no next standard once every cut is made', () => {
    const result = evaluateTime(5500, standards);
    expect(result.best_achieved?.standard.id).toBe('aaaa');
    expect(result.next_standard).toBeNull();
  });

  it('achieves nothing for an invalid swim', () => {
    const result = evaluateTime(5900, standards, { official: true, dq: true });
    expect(result.valid).toBe(false);
    expect(result.standards.every((entry) => !entry.achieved)).toBe(true);
    expect(result.best_achieved).toBeNull();
    expect(result.next_standard?.standard.id).toBe('aa');
  });

  it('handles an empty standard list', () => {
    const result = evaluateTime(5900, []);
    expect(result.standards).toEqual([]);
    expect(result.best_achieved).toBeNull();
    expect(result.next_standard).toBeNull();
  });
});

describe('buildSwimmerReport', () => {
  const events = new Map<string, EventRow>([
    ['free500y', { id: 'free500y', stroke: 'freestyle', distance: 500, course: 'scy' }],
    ['free400l', { id: 'free400l', stroke: 'freestyle', distance: 400, course: 'lcm' }],
    ['back100y', { id: 'back100y', stroke: 'backstroke', distance: 100, course: 'scy' }],
  ]);

  const standards = [
    standard({ id: 's500', event_id: 'free500y', time_centiseconds: 33000, qualifying_start: '2024-09-01' }),
    standard({ id: 's400', event_id: 'free400l', time_centiseconds: 30000 }),
    standard({ id: 'sback', event_id: 'back100y', time_centiseconds: 6500 }),
    standard({ id: 'boys', event_id: 'back100y', gender: 'M', time_centiseconds: 6000 }),
    standard({ id: 'older', event_id: 'back100y', age_group: '15-16', time_centiseconds: 6200 }),
  ];

  const swims = [
    swim({ id: 'old500', event_id: 'free500y', time_centiseconds: 32000, swim_date: '2024-08-01' }),
    swim({ id: 'new500', event_id: 'free500y', time_centiseconds: 33500, swim_date: '2024-12-01' }),
    swim({ id: 'dqback', event_id: 'back100y', time_centiseconds: 6000, dq: true }),
    swim({ id: 'back', event_id: 'back100y', time_centiseconds: 6400 }),
  ];

  const report = buildSwimmerReport({ gender: 'F', age: 12, standards, events, swims });

  it('groups course equivalents together', () => {
    expect(report.map((group) => group.equivalence_key)).toEqual(['backstroke-100', 'freestyle-400']);
    expect(report[1]?.rows.map((row) => row.standard.id)).toEqual(['s400', 's500']);
  });

  it('skips standards for another gender or age group', () => {
    expect(report[0]?.rows.map((row) => row.standard.id)).toEqual(['sback']);
  });

  it('uses the fastest valid swim inside the window', () => {
    const back = report[0]?.rows[0];
    expect(back?.best_time?.id).toBe('back');
    expect(back?.achieved).toBe(true);
    expect(back?.margin_centiseconds).toBe(-100);

    const free500 = report[1]?.rows.find((row) => row.standard.id === 's500');
    expect(free500?.best_time?.id).toBe('new500');
    expect(free500?.achieved).toBe(false);
    expect(free500?.margin_centiseconds).toBe(500);
    expect(free500?.cut_formatted).toBe('5:30.00');
  });

  it('reports no time when the event was never swum', () => {
    const free400 = report[1]?.rows.find((row) => row.standard.id === 's400');
    expect(free400?.best_time).toBeNull();
    expect(free400?.achieved).toBe(false);
    expect(free400?.margin_seconds).toBeNull();
  });
});
