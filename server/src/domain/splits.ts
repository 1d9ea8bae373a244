import { ValidationError } from '../utils/errors.js';
import { formatTime, parseTime, resolveCentiseconds, TimeFormatError } from './time.js';

export interface Split {
  distance: number;
  time_centiseconds: number;
}

export interface SplitWithInterval extends Split {
  time_formatted: string;
  interval_centiseconds: number;
  interval_formatted: string;
}

export class SplitValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'SplitValidationError';
  }
}

function sortByDistance(splits: readonly Split[]) {
  return [...splits].sort((a, b) => a.distance - b.distance);
}

export function validateSplits(splits: readonly Split[], eventDistance: number, finalTime: number) {
  if (splits.length === 0) {
    return;
  }

  const sorted = sortByDistance(splits);
  let previousDistance = 0;
  let previousTime = 0;
  for (const split of sorted) {
    if (split.distance <= 0 || split.distance === previousDistance) {
      throw new SplitValidationError(`Duplicate or invalid split distance: ${split.distance}`);
    }
    if (split.time_centiseconds <= previousTime) {
      throw new SplitValidationError(
        `Split at ${split.distance} (${formatTime(split.time_centiseconds)}) must be greater than previous split (${formatTime(previousTime)})`,
      );
    }
    previousDistance = split.distance;
    previousTime = split.time_centiseconds;
  }

  const last = sorted[sorted.length - 1];
  if (last && last.distance >= eventDistance) {
    throw new SplitValidationError(
      `Split distance ${last.distance} must be less than event distance ${eventDistance}`,
    );
  }

  for (const split of sorted) {
    if (split.time_centiseconds >= finalTime) {
      throw new SplitValidationError(
        `Split at ${split.distance} (${formatTime(split.time_centiseconds)}) must be less than final time (${formatTime(finalTime)})`,
      );
    }
  }
}

/** Cumulative splits to per-segment intervals; the first interval is the first split. */
export function withIntervals(splits: readonly Split[]): SplitWithInterval[] {
  let previousTime = 0;
  return sortByDistance(splits).map((split) => {
    const interval = split.time_centiseconds - previousTime;
    previousTime = split.time_centiseconds;
    return {
      distance: split.distance,
      time_centiseconds: split.time_centiseconds,
      time_formatted: formatTime(split.time_centiseconds),
      interval_centiseconds: interval,
      interval_formatted: formatTime(interval),
    };
  });
}

/** Parses `50:28.27;100:58.44;150:1:29.19`. The distance is everything before the first colon. */
export function parseSplitsText(text: string): Split[] {
  return text
    .split(';')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const colon = part.indexOf(':');
      if (colon === -1) {
        throw new SplitValidationError(`Invalid split format: '${part}'. Expected 'distance:time'`);
      }
      const distanceText = part.slice(0, colon);
      if (!/^\d+$/.test(distanceText)) {
        throw new SplitValidationError(`Invalid split distance: '${distanceText}'`);
      }
      const distance = Number.parseInt(distanceText, 10);
      try {
        return { distance, time_centiseconds: parseTime(part.slice(colon + 1)) };
      } catch (error) {
        if (error instanceof TimeFormatError) {
          throw new SplitValidationError(`Invalid split time for ${distance}: ${error.message}`);
        }
        throw error;
      }
    });
}

export type SplitInput =
  | string
  | ReadonlyArray<{ distance: number; time_centiseconds?: number | null; time_formatted?: string | null }>;

/** Accepts the text form or a list of entries carrying centiseconds or a formatted time. */
export function normalizeSplits(input: SplitInput): Split[] {
  if (typeof input === 'string') {
    return parseSplitsText(input);
  }
  return input.map((entry) => {
    const time = resolveCentiseconds(entry);
    if (time === null) {
      throw new SplitValidationError(`Split at ${entry.distance} needs time_centiseconds or time_formatted`);
    }
    return { distance: entry.distance, time_centiseconds: time };
  });
}
