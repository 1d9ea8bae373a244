import {
  normalizeSplits,
  parseSplitsText,
  SplitValidationError,
  validateSplits,
  withIntervals,
} from '../../src/domain/splits.js';

const splits = [
  { distance: 50, time_centiseconds: 2827 },
  { distance: 100, time_centiseconds: 5844 },
  { distance: 150, time_centiseconds: 8919 },
];

describe('validateSplits', () => {
  it('accepts increasing splits inside the race', () => {
    expect(() => validateSplits(splits, 200, 11950)).not.toThrow();
    expect(() => validateSplits([], 100, 5000)).not.toThrow();
  });

  it('validates regardless of input order', () => {
    expect(() => validateSplits([...splits].reverse(), 200, 11950)).not.toThrow();
  });

  it('rejects times that do not increase', () => {
    expect(() =>
      validateSplits(
        [
          { distance: 50, time_centiseconds: 3000 },
          { distance: 100, time_centiseconds: 2900 },
        ],
        200,
        12000,
      ),
    ).toThrow('Split at 100 (29.00) must be greater than previous split (30.00)');
  });

  it('rejects duplicate distances', () => {
    expect(() =>
      validateSplits(
        [
          { distance: 50, time_centiseconds: 3000 },
          { distance: 50, time_centiseconds: 3100 },
        ],
        200,
        12000,
      ),
    ).toThrow('Duplicate or invalid split distance: 50');
  });

  it('rejects a split at or past the event distance', () => {
    expect(() => validateSplits([{ distance: 100, time_centiseconds: 5000 }], 100, 5500)).toThrow(
      'Split distance 100 must be less than event distance 100',
    );
  });

  it('rejects a split slower than the final time', () => {
    expect(() => validateSplits(splits, 200, 8919)).toThrow(
      'Split at 150 (1:29.19) must be less than final time (1:29.19)',
    );
  });
});

describe('intervals', () => {
  it('derives per-segment intervals from cumulative splits', () => {
    expect(withIntervals(splits)).toEqual([
      { distance: 50, time_centiseconds: 2827, time_formatted: '28.27', interval_centiseconds: 2827, interval_formatted: '28.27' },
      { distance: 100, time_centiseconds: 5844, time_formatted: '58.44', interval_centiseconds: 3017, interval_formatted: '30.17' },
      { distance: 150, time_centiseconds: 8919, time_formatted: '1:29.19', interval_centiseconds: 3075, interval_formatted: '30.75' },
    ]);
  });
});

describe('split text', () => {
  it('parses the distance before the first colon', () => {
    expect(parseSplitsText('50:28.27;100:58.44;150:1:29.19')).toEqual(splits);
  });

  it('ignores empty segments', () => {
    expect(parseSplitsText(' 50:28.27 ; ;')).toEqual([{ distance: 50, time_centiseconds: 2827 }]);
  });

  it('reports malformed segments', () => {
    expect(() => parseSplitsText('50-28.27')).toThrow("Invalid split format: '50-28.27'. Expected 'distance:time'");
    expect(() => parseSplitsText('fifty:28.27')).toThrow("Invalid split distance: 'fifty'");
    expect(() => parseSplitsText('50:abc')).toThrow(SplitValidationError);
  });
});

describe('normalizeSplits', () => {
  it('accepts text or entries', () => {
    expect(normalizeSplits('50:28.27')).toEqual([{ distance: 50, time_centiseconds: 2827 }]);
    expect(
      normalizeSplits([
        { distance: 50, time_formatted: '28.27' },
        { distance: 100, time_centiseconds: 5844 },
      ]),
    ).toEqual(splits.slice(0, 2));
  });

  it('rejects entries without a time', () => {
    expect(() => normalizeSplits([{ distance: 50 }])).toThrow(
      'Split at 50 needs time_centiseconds or time_formatted',
    );
  });
});
