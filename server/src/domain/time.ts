import { ValidationError } from '../utils/errors.js';

export class TimeFormatError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeFormatError';
  }
}

const NUMBER_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parses `SS.cc`, `M:SS.cc` or a bare number of seconds into centiseconds.
 * Fractions beyond hundredths are rounded half up.
 */
export function parseTime(input: string): number {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new TimeFormatError('Time is empty');
  }

  const parts = trimmed.split(':');
  if (parts.length > 2) {
    throw new TimeFormatError(`Invalid time format: '${trimmed}'. Expected 'SS.cc' or 'M:SS.cc'`);
  }

  const secondsPart = parts[parts.length - 1] ?? '';
  const minutesPart = parts.length === 2 ? parts[0] ?? '' : '0';

  if (!/^\d+$/.test(minutesPart) || !NUMBER_PATTERN.test(secondsPart)) {
    throw new TimeFormatError(`Invalid time format: '${trimmed}'. Expected 'SS.cc' or 'M:SS.cc'`);
  }

  const minutes = Number.parseInt(minutesPart, 10);
  const seconds = Number.parseFloat(secondsPart);
  if (parts.length === 2 && seconds >= 60) {
    throw new TimeFormatError(`Invalid seconds value: ${secondsPart} (must be < 60)`);
  }

  return Math.round((minutes * 60 + seconds) * 100);
}

export function formatTime(centiseconds: number): string {
  const whole = Math.max(0, Math.round(centiseconds));
  const hundredths = whole % 100;
  const totalSeconds = Math.floor(whole / 100);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  const fraction = hundredths.toString().padStart(2, '0');

  if (minutes > 0) {
    return `${minutes}:${seconds.toString().padStart(2, '0')}.${fraction}`;
  }
  return `${seconds}.${fraction}`;
}

/** Difference in seconds; negative means `time` is faster than `reference`. */
export function differenceSeconds(time: number, reference: number): number {
  return (time - reference) / 100;
}

export function resolveCentiseconds(input: { time_centiseconds?: number | null; time_formatted?: string | null }) {
  if (input.time_centiseconds != null) {
    return input.time_centiseconds;
  }
  if (input.time_formatted != null) {
    return parseTime(input.time_formatted);
  }
  return null;
}

export function requireCentiseconds(input: { time_centiseconds?: number | null; time_formatted?: string | null }) {
  const time = resolveCentiseconds(input);
  if (time === null) {
    throw new TimeFormatError('Either time_centiseconds or time_formatted is required');
  }
  return time;
}
