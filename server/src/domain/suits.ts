import type { SuitModelRow, SwimmerSuitRow } from '../types.js';

export function formatCents(cents: number | null): string | null {
  if (cents === null) {
    return null;
  }
  return `$${(cents / 100).toFixed(2)}`;
}

export function suitCategory(model: Pick<SuitModelRow, 'is_tech_suit'>) {
  return model.is_tech_suit ? 'Tech Suit' : 'Racing Suit';
}

export function lifePercentage(suit: Pick<SwimmerSuitRow, 'race_count'>, expectedRacesTotal: number) {
  if (expectedRacesTotal <= 0) {
    return 0;
  }
  return (suit.race_count / expectedRacesTotal) * 100;
}

/** Can go negative once a suit outlives its expected race count. */
export function remainingRaces(suit: Pick<SwimmerSuitRow, 'race_count'>, expectedRacesTotal: number) {
  return expectedRacesTotal - suit.race_count;
}

export function isPastPeak(suit: Pick<SwimmerSuitRow, 'race_count'>, expectedRacesPeak: number) {
  return suit.race_count >= expectedRacesPeak;
}

export function toSuitModelResponse(model: SuitModelRow) {
  return {
    ...model,
    msrp_formatted: formatCents(model.msrp_cents),
    suit_category: suitCategory(model),
  };
}

export function toSwimmerSuitResponse(suit: SwimmerSuitRow) {
  return {
    ...suit,
    is_current: suit.condition !== 'retired',
    purchase_price_formatted: formatCents(suit.purchase_price_cents),
  };
}

export function toSwimmerSuitWithModel(suit: SwimmerSuitRow, model: SuitModelRow | null) {
  return {
    ...toSwimmerSuitResponse(suit),
    suit_model: model ? toSuitModelResponse(model) : null,
    life_percentage: model ? lifePercentage(suit, model.expected_races_total) : null,
    remaining_races: model ? remainingRaces(suit, model.expected_races_total) : null,
    is_past_peak: model ? isPastPeak(suit, model.expected_races_peak) : null,
  };
}
