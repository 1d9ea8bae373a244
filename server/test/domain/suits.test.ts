import {
  formatCents,
  isPastPeak,
  lifePercentage,
  remainingRaces,
  suitCategory,
  toSwimmerSuitWithModel,
} from '../../src/domain/suits.js';
import type { SuitModelRow, SwimmerSuitRow } from '../../src/types.js';

const model: SuitModelRow = {
  id: 'm1',
  brand: 'Speedo',
  model_name: 'LZR Pure Intent 2.0',
  suit_type: 'kneeskin',
  is_tech_suit: true,
  gender: 'F',
  release_year: 2023,
  msrp_cents: 55000,
  expected_races_peak: 10,
  expected_races_total: 30,
  fina_approved: true,
  notes: null,
};

function suit(overrides: Partial<SwimmerSuitRow> = {}): SwimmerSuitRow {
  return {
    id: 's1',
    swimmer_id: 'sw1',
    suit_model_id: 'm1',
    nickname: null,
    size: '24',
    color: null,
    purchase_date: '2025-01-10',
    purchase_price_cents: 49999,
    purchase_location: null,
    wear_count: 0,
    race_count: 0,
    condition: 'new',
    retired_date: null,
    retirement_reason: null,
    ...overrides,
  };
}

describe('suit helpers', () => {
  it('formats prices', () => {
    expect(formatCents(55000)).toBe('$550.00');
    expect(formatCents(1999)).toBe('$19.99');
    expect(formatCents(null)).toBeNull();
  });

  it('labels the category', () => {
    expect(suitCategory({ is_tech_suit: true })).toBe('Tech Suit');
    expect(suitCategory({ is_tech_suit: false })).toBe('Racing Suit');
  });

  it('tracks wear against expected races', () => {
    expect(lifePercentage({ race_count: 12 }, 30)).toBe(40);
    expect(lifePercentage({ race_count: 5 }, 0)).toBe(0);
    expect(remainingRaces({ race_count: 12 }, 30)).toBe(18);
    expect(remainingRaces({ race_count: 33 }, 30)).toBe(-3);
    expect(isPastPeak({ race_count: 9 }, 10)).toBe(false);
    expect(isPastPeak({ race_count: 10 }, 10)).toBe(true);
  });
});

describe('toSwimmerSuitWithModel', () => {
  it('adds model details and wear figures', () => {
    const response = toSwimmerSuitWithModel(suit({ race_count: 15, condition: 'good' }), model);
    expect(response.is_current).toBe(true);
    expect(response.purchase_price_formatted).toBe('$499.99');
    expect(response.suit_model?.msrp_formatted).toBe('$550.00');
    expect(response.suit_model?.suit_category).toBe('Tech Suit');
    expect(response.life_percentage).toBe(50);
    expect(response.remaining_races).toBe(15);
    expect(response.is_past_peak).toBe(true);
  });

  it('leaves wear figures empty without a model', () => {
    const response = toSwimmerSuitWithModel(suit({ condition: 'retired' }), null);
    expect(response.is_current).toBe(false);
    expect(response.suit_model).toBeNull();
    expect(response.life_percentage).toBeNull();
    expect(response.remaining_races).toBeNull();
    expect(response.is_past_peak).toBeNull();
  });
});
