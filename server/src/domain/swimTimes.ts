import type { SwimTimeRow } from '../types.js';
import { differenceSeconds, formatTime } from './time.js';

type SwimStatus = Pick<SwimTimeRow, 'official' | 'dq'>;

export function isValidSwim(swim: SwimStatus) {
  return swim.official && !swim.dq;
}

export function meetsStandard(swim: SwimStatus & Pick<SwimTimeRow, 'time_centiseconds'>, cutCentiseconds: number) {
  return isValidSwim(swim) && swim.time_centiseconds <= cutCentiseconds;
}

/** Seconds off the cut; negative when faster than the standard. */
export function compareToStandard(swim: Pick<SwimTimeRow, 'time_centiseconds'>, cutCentiseconds: number) {
  return differenceSeconds(swim.time_centiseconds, cutCentiseconds);
}

export function toSwimTimeResponse<T extends SwimTimeRow>(swim: T) {
  return {
    ...swim,
    time_formatted: formatTime(swim.time_centiseconds),
  };
}

/** Fastest valid swim per event. Ties go to the earlier swim. */
export function personalBests<T extends SwimTimeRow>(swims: readonly T[]): T[] {
  const best = new Map<string, T>();
  for (const swim of swims) {
    if (!isValidSwim(swim)) {
      continue;
    }
    const current = best.get(swim.event_id);
    if (
      !current ||
      swim.time_centiseconds < current.time_centiseconds ||
      (swim.time_centiseconds === current.time_centiseconds && swim.swim_date < current.swim_date)
    ) {
      best.set(swim.event_id, swim);
    }
  }
  return Array.from(best.values());
}

export interface PersonalBestAnalysis<T> {
  personal_best: T | null;
  is_personal_best: boolean;
  time_off_pb: number | null;
  improvement_percentage: number | null;
}

export function analyzeAgainstPersonalBest<T extends SwimTimeRow>(
  swim: T,
  personalBest: T | null,
): PersonalBestAnalysis<T> {
  const isPersonalBest = personalBest !== null && personalBest.id === swim.id;
  if (!personalBest || isPersonalBest) {
    return {
      personal_best: personalBest,
      is_personal_best: isPersonalBest,
      time_off_pb: null,
      improvement_percentage: null,
    };
  }

  const improvement =
    personalBest.time_centiseconds > 0
      ? ((personalBest.time_centiseconds - swim.time_centiseconds) / personalBest.time_centiseconds) * 100
      : null;

  return {
    personal_best: personalBest,
    is_personal_best: false,
    time_off_pb: differenceSeconds(swim.time_centiseconds, personalBest.time_centiseconds),
    improvement_percentage: improvement,
  };
}

/** A split counts toward a cut only when the swim it belongs to is valid. */
export function splitMeetsStandard(swim: SwimStatus, splitCentiseconds: number, cutCentiseconds: number) {
  return isValidSwim(swim) && splitCentiseconds <= cutCentiseconds;
}
