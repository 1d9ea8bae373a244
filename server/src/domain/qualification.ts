import type { EventRow, Gender, SwimTimeRow, TimeStandardRow } from '../types.js';
import { ageGroupForAge } from './swimmers.js';
import { equivalenceKey, eventLabel } from './events.js';
import { compareToStandard, isValidSwim, meetsStandard } from './swimTimes.js';
import { formatTime } from './time.js';

export interface StandardCriteria {
  eventId: string;
  gender: Gender;
  age: number;
  swimDate: string;
  sanctioningBody?: string;
  standardName?: string;
  effectiveYear?: number;
}

export interface StandardResult {
  standard: TimeStandardRow;
  time_formatted: string;
  achieved: boolean;
  margin_centiseconds: number;
  margin_seconds: number;
}

export interface QualificationResult {
  time_centiseconds: number;
  time_formatted: string;
  valid: boolean;
  standards: StandardResult[];
  best_achieved: StandardResult | null;
  next_standard: StandardResult | null;
}

const RANGE = /^(\d+)\s*-\s*(\d+)$/;
const UNDER = /^(\d+)\s*(?:u|-?\s*under|&\s*under|and\s*under)$/;
const OVER = /^(\d+)\s*(?:\+|o|-?\s*over|&\s*over|and\s*over)$/;

/**
 * Age-group labels on standards come in several spellings: `10U`,
 * `10-under`, `11-12`, `15-18`, `15-over`, `15+`. Null and `Open` match
 * every age.
 */
export function ageGroupIncludes(label: string | null, age: number): boolean {
  if (label === null) {
    return true;
  }
  const normalized = label.trim().toLowerCase();
  if (normalized === '' || normalized === 'open') {
    return true;
  }

  const range = RANGE.exec(normalized);
  if (range) {
    return age >= Number(range[1]) && age <= Number(range[2]);
  }
  const under = UNDER.exec(normalized);
  if (under) {
    return age <= Number(under[1]);
  }
  const over = OVER.exec(normalized);
  if (over) {
    return age >= Number(over[1]);
  }
  return normalized === ageGroupForAge(age).toLowerCase();
}

export function isWithinQualifyingWindow(
  standard: Pick<TimeStandardRow, 'qualifying_start' | 'qualifying_end'>,
  swimDate: string,
) {
  if (standard.qualifying_start && swimDate < standard.qualifying_start) {
    return false;
  }
  if (standard.qualifying_end && swimDate > standard.qualifying_end) {
    return false;
  }
  return true;
}

function sameText(a: string, b: string) {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function isStandardApplicable(standard: TimeStandardRow, criteria: StandardCriteria) {
  if (standard.event_id !== criteria.eventId || standard.gender !== criteria.gender) {
    return false;
  }
  if (criteria.sanctioningBody && !sameText(standard.sanctioning_body, criteria.sanctioningBody)) {
    return false;
  }
  if (criteria.standardName && !sameText(standard.standard_name, criteria.standardName)) {
    return false;
  }
  if (criteria.effectiveYear !== undefined && standard.effective_year !== criteria.effectiveYear) {
    return false;
  }
  return ageGroupIncludes(standard.age_group, criteria.age) && isWithinQualifyingWindow(standard, criteria.swimDate);
}

export function applicableStandards(standards: readonly TimeStandardRow[], criteria: StandardCriteria) {
  return standards.filter((standard) => isStandardApplicable(standard, criteria));
}

function toResult(
  standard: TimeStandardRow,
  swim: Pick<SwimTimeRow, 'official' | 'dq' | 'time_centiseconds'>,
): StandardResult {
  return {
    standard,
    time_formatted: formatTime(standard.time_centiseconds),
    achieved: meetsStandard(swim, standard.time_centiseconds),
    margin_centiseconds: swim.time_centiseconds - standard.time_centiseconds,
    margin_seconds: compareToStandard(swim, standard.time_centiseconds),
  };
}

/**
 * Scores a time against already-filtered standards, hardest cut first. The
 * next standard is the unmet cut closest to the time.
 */
export function evaluateTime(
  time: number,
  standards: readonly TimeStandardRow[],
  swim: { official: boolean; dq: boolean } = { official: true, dq: false },
): QualificationResult {
  const valid = isValidSwim(swim);
  const results = [...standards]
    .sort((a, b) => a.time_centiseconds - b.time_centiseconds)
    .map((standard) => toResult(standard, { ...swim, time_centiseconds: time }));

  const achieved = results.filter((result) => result.achieved);
  const unmet = results.filter((result) => !result.achieved);
  const closestUnmet = unmet.reduce<StandardResult | null>((closest, result) => {
    if (!closest) return result;
    return Math.abs(result.margin_centiseconds) < Math.abs(closest.margin_centiseconds) ? result : closest;
  }, null);

  const faster = unmet.filter((result) => result.margin_centiseconds > 0);
  const nextStandard = valid
    ? faster.reduce<StandardResult | null>(
        (closest, result) => (!closest || result.margin_centiseconds < closest.margin_centiseconds ? result : closest),
        null,
      )
    : closestUnmet;

  return {
    time_centiseconds: time,
    time_formatted: formatTime(time),
    valid,
    standards: results,
    best_achieved: achieved[0] ?? null,
    next_standard: nextStandard,
  };
}

export interface SwimmerQualificationRow {
  equivalence_key: string;
  event: EventRow & { label: string };
  standard: TimeStandardRow;
  cut_formatted: string;
  best_time: (SwimTimeRow & { time_formatted: string }) | null;
  achieved: boolean;
  margin_centiseconds: number | null;
  margin_seconds: number | null;
}

export interface SwimmerQualificationGroup {
  equivalence_key: string;
  rows: SwimmerQualificationRow[];
}

/**
 * For every standard the swimmer is eligible for on `asOf`, finds the fastest
 * valid swim in that exact event inside the qualifying window. Rows are
 * grouped so that course-equivalent events (500 SCY / 400 LCM free) sit
 * together.
 */
export function buildSwimmerReport(params: {
  gender: Gender;
  age: number;
  standards: readonly TimeStandardRow[];
  events: ReadonlyMap<string, EventRow>;
  swims: readonly SwimTimeRow[];
}): SwimmerQualificationGroup[] {
  const groups = new Map<string, SwimmerQualificationRow[]>();

  for (const standard of params.standards) {
    const event = params.events.get(standard.event_id);
    if (!event || standard.gender !== params.gender || !ageGroupIncludes(standard.age_group, params.age)) {
      continue;
    }

    const best = params.swims
      .filter(
        (swim) =>
          swim.event_id === standard.event_id && isValidSwim(swim) && isWithinQualifyingWindow(standard, swim.swim_date),
      )
      .reduce<SwimTimeRow | null>(
        (fastest, swim) => (!fastest || swim.time_centiseconds < fastest.time_centiseconds ? swim : fastest),
        null,
      );

    const key = equivalenceKey(event);
    const margin = best ? best.time_centiseconds - standard.time_centiseconds : null;
    const row: SwimmerQualificationRow = {
      equivalence_key: key,
      event: { ...event, label: eventLabel(event) },
      standard,
      cut_formatted: formatTime(standard.time_centiseconds),
      best_time: best ? { ...best, time_formatted: formatTime(best.time_centiseconds) } : null,
      achieved: margin !== null && margin <= 0,
      margin_centiseconds: margin,
      margin_seconds: margin === null ? null : margin / 100,
    };

    const rows = groups.get(key) ?? [];
    rows.push(row);
    groups.set(key, rows);
  }

  return Array.from(groups, ([key, rows]) => ({
    equivalence_key: key,
    rows: rows.sort(
      (a, b) =>
        a.event.course.localeCompare(b.event.course) || a.standard.time_centiseconds - b.standard.time_centiseconds,
    ),
  })).sort((a, b) => a.equivalence_key.localeCompare(b.equivalence_key));
}
